import type { Pool, PoolClient } from "pg";
import { ConflictError } from "../domain/errors";
import type { UnitBattleStats } from "../statistics/battleStatistics";

export type BattleRecord = {
  battle_id: string;
  player_victory: boolean;
  rounds: number;
  seed: number;
  started_at: Date;
  ended_at: Date;
  unit_stats: UnitBattleStats[];
};

export interface BattleRepository {
  saveRecord(record: BattleRecord): Promise<void>;
  getRecord(battleId: string): Promise<BattleRecord | null>;
  listRecords(limit: number): Promise<BattleRecord[]>;
}

type BattleRow = {
  battle_id: string;
  player_victory: boolean;
  rounds: number;
  seed: string | number;
  started_at: Date;
  ended_at: Date;
};

type UnitStatsRow = {
  battle_id: string;
  unit_id: string;
  faction_id: string;
  damage_dealt: number;
  damage_taken: number;
  healing_done: number;
  kills: number;
  critical_hits: number;
  attacks_landed: number;
  attacks_missed: number;
  skills_used: number;
  died: boolean;
};

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}

export class PgBattleRepository implements BattleRepository {
  constructor(private pool: Pool) {}

  async withTx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  async saveRecord(record: BattleRecord): Promise<void> {
    try {
      await this.withTx(async (client) => {
        await client.query(
          `INSERT INTO battle_records
           (battle_id, player_victory, rounds, seed, started_at, ended_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [record.battle_id, record.player_victory, record.rounds, record.seed, record.started_at, record.ended_at]
        );

        for (const s of record.unit_stats) {
          await client.query(
            `INSERT INTO battle_unit_stats
             (battle_id, unit_id, faction_id, damage_dealt, damage_taken, healing_done,
              kills, critical_hits, attacks_landed, attacks_missed, skills_used, died)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
            [
              record.battle_id,
              s.unit_id,
              s.faction_id,
              s.damage_dealt,
              s.damage_taken,
              s.healing_done,
              s.kills,
              s.critical_hits,
              s.attacks_landed,
              s.attacks_missed,
              s.skills_used,
              s.died,
            ]
          );
        }
      });
    } catch (err) {
      // unique violation (battle_id)
      if (isUniqueViolation(err)) {
        throw new ConflictError(`battle record already saved: ${record.battle_id}`);
      }
      throw err;
    }
  }

  async getRecord(battleId: string): Promise<BattleRecord | null> {
    return this.withTx(async (client) => {
      const r = await client.query<BattleRow>(
        `SELECT battle_id, player_victory, rounds, seed, started_at, ended_at
         FROM battle_records
         WHERE battle_id = $1
         LIMIT 1`,
        [battleId]
      );
      if (r.rows.length === 0) return null;

      const stats = await this.getUnitStats(client, [battleId]);
      return toRecord(r.rows[0], stats.get(battleId) ?? []);
    });
  }

  async listRecords(limit: number): Promise<BattleRecord[]> {
    return this.withTx(async (client) => {
      const r = await client.query<BattleRow>(
        `SELECT battle_id, player_victory, rounds, seed, started_at, ended_at
         FROM battle_records
         ORDER BY ended_at DESC
         LIMIT $1`,
        [limit]
      );
      const stats = await this.getUnitStats(client, r.rows.map((row) => row.battle_id));
      return r.rows.map((row) => toRecord(row, stats.get(row.battle_id) ?? []));
    });
  }

  private async getUnitStats(client: PoolClient, battleIds: string[]): Promise<Map<string, UnitBattleStats[]>> {
    const out = new Map<string, UnitBattleStats[]>();
    if (battleIds.length === 0) return out;

    const r = await client.query<UnitStatsRow>(
      `SELECT battle_id, unit_id, faction_id, damage_dealt, damage_taken, healing_done,
              kills, critical_hits, attacks_landed, attacks_missed, skills_used, died
       FROM battle_unit_stats
       WHERE battle_id = ANY($1)
       ORDER BY unit_id ASC`,
      [battleIds]
    );

    for (const row of r.rows) {
      const { battle_id, ...stats } = row;
      const list = out.get(battle_id) ?? [];
      list.push(stats);
      out.set(battle_id, list);
    }
    return out;
  }
}

function toRecord(row: BattleRow, unitStats: UnitBattleStats[]): BattleRecord {
  return {
    battle_id: row.battle_id,
    player_victory: row.player_victory,
    rounds: row.rounds,
    // BIGINT comes back as a string
    seed: Number(row.seed),
    started_at: row.started_at,
    ended_at: row.ended_at,
    unit_stats: unitStats,
  };
}
