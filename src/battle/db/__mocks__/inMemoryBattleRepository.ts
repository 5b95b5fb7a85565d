import { ConflictError } from "../../domain/errors";
import type { BattleRecord, BattleRepository } from "../repository";

function clone(record: BattleRecord): BattleRecord {
  return { ...record, unit_stats: record.unit_stats.map((s) => ({ ...s })) };
}

export class InMemoryBattleRepository implements BattleRepository {
  private readonly records = new Map<string, BattleRecord>();

  async saveRecord(record: BattleRecord): Promise<void> {
    if (this.records.has(record.battle_id)) {
      throw new ConflictError(`battle record already saved: ${record.battle_id}`);
    }
    this.records.set(record.battle_id, clone(record));
  }

  async getRecord(battleId: string): Promise<BattleRecord | null> {
    const r = this.records.get(battleId);
    return r ? clone(r) : null;
  }

  async listRecords(limit: number): Promise<BattleRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.ended_at.getTime() - a.ended_at.getTime())
      .slice(0, limit)
      .map(clone);
  }
}
