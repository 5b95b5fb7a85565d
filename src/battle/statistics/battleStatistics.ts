import type { CombatantId, FactionId } from "../domain/types";
import { isEventOfType, type BattleEventChannel, type RecordedEvent } from "../events/battleEvents";

export interface UnitBattleStats {
  unit_id: CombatantId;
  faction_id: FactionId;
  damage_dealt: number;
  damage_taken: number;
  healing_done: number;
  kills: number;
  critical_hits: number;
  attacks_landed: number;
  attacks_missed: number;
  skills_used: number;
  died: boolean;
}

export interface PartyTotals {
  damage_dealt: number;
  damage_taken: number;
  kills: number;
  critical_hits: number;
  skills_used: number;
  units_lost: number;
}

export interface BattleStatisticsSnapshot {
  units: UnitBattleStats[];
  party: PartyTotals;
}

function emptyStats(unitId: CombatantId, factionId: FactionId): UnitBattleStats {
  return {
    unit_id: unitId,
    faction_id: factionId,
    damage_dealt: 0,
    damage_taken: 0,
    healing_done: 0,
    kills: 0,
    critical_hits: 0,
    attacks_landed: 0,
    attacks_missed: 0,
    skills_used: 0,
    died: false,
  };
}

/** Counts per-unit battle numbers from the event channel. */
export class BattleStatisticsTracker {
  private readonly stats = new Map<CombatantId, UnitBattleStats>();
  private readonly factionOf: (id: CombatantId) => FactionId | null;
  private unsubscribe: (() => void) | null = null;

  constructor(factionOf: (id: CombatantId) => FactionId | null) {
    this.factionOf = factionOf;
  }

  attach(channel: BattleEventChannel): void {
    this.detach();
    this.unsubscribe = channel.subscribe((e) => this.record(e));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  record(e: RecordedEvent): void {
    if (isEventOfType(e, "ATTACK_RESOLVED")) {
      const attacker = this.entry(e.payload.attacker_id);
      const { result } = e.payload;
      if (!result.hit || result.parried) {
        attacker.attacks_missed += 1;
        return;
      }
      attacker.attacks_landed += 1;
      if (result.criticalHit && !result.criticalDefended) attacker.critical_hits += 1;
      return;
    }

    if (isEventOfType(e, "HP_CHANGED")) {
      const { unit_id, delta, source_unit_id } = e.payload;
      if (delta < 0) {
        this.entry(unit_id).damage_taken += -delta;
        if (source_unit_id) this.entry(source_unit_id).damage_dealt += -delta;
      } else if (delta > 0 && source_unit_id) {
        this.entry(source_unit_id).healing_done += delta;
      }
      return;
    }

    if (isEventOfType(e, "UNIT_DIED")) {
      this.entry(e.payload.unit_id).died = true;
      if (e.payload.killer_id) this.entry(e.payload.killer_id).kills += 1;
      return;
    }

    if (isEventOfType(e, "SKILL_USED")) {
      this.entry(e.payload.user_id).skills_used += 1;
    }
  }

  get(unitId: CombatantId): UnitBattleStats | null {
    const s = this.stats.get(unitId);
    return s ? { ...s } : null;
  }

  snapshot(partyFactionId: FactionId): BattleStatisticsSnapshot {
    const units = [...this.stats.values()].map((s) => ({ ...s }));
    const party: PartyTotals = {
      damage_dealt: 0,
      damage_taken: 0,
      kills: 0,
      critical_hits: 0,
      skills_used: 0,
      units_lost: 0,
    };
    for (const s of units) {
      if (s.faction_id !== partyFactionId) continue;
      party.damage_dealt += s.damage_dealt;
      party.damage_taken += s.damage_taken;
      party.kills += s.kills;
      party.critical_hits += s.critical_hits;
      party.skills_used += s.skills_used;
      if (s.died) party.units_lost += 1;
    }
    return { units, party };
  }

  private entry(unitId: CombatantId): UnitBattleStats {
    let s = this.stats.get(unitId);
    if (!s) {
      s = emptyStats(unitId, this.factionOf(unitId) ?? "unknown");
      this.stats.set(unitId, s);
    }
    return s;
  }
}
