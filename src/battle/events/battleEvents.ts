import type { Logger } from "pino";
import type { ProficiencyTier } from "../domain/proficiency";
import type { CombatantId, CombatResolutionResult, FactionId, Point, WeaponFamily } from "../domain/types";

export interface BaseEvent<T extends string, P> {
  type: T;
  payload: P;
}

export type HpChangeSource = "ATTACK" | "SKILL" | "STATUS_EFFECT" | "HAZARD" | "HEAL";

export type BattleEvent =
  | BaseEvent<"BATTLE_STARTED", { unit_ids: CombatantId[]; round: number }>
  | BaseEvent<"ROUND_STARTED", { round: number }>
  | BaseEvent<"TURN_WINDOW_CHANGED", { unit_ids: CombatantId[]; faction_id: FactionId | null; round: number }>
  | BaseEvent<"CURRENT_UNIT_CHANGED", { unit_id: CombatantId | null }>
  | BaseEvent<"TURN_ENDED", { unit_id: CombatantId; round: number; forced: boolean }>
  | BaseEvent<
      "HP_CHANGED",
      { unit_id: CombatantId; hp: number; max_hp: number; delta: number; source: HpChangeSource; source_unit_id?: CombatantId }
    >
  | BaseEvent<"UNIT_DIED", { unit_id: CombatantId; killer_id?: CombatantId }>
  | BaseEvent<"STATUS_EFFECT_APPLIED", { unit_id: CombatantId; effect_id: string; duration: number; refreshed: boolean }>
  | BaseEvent<"STATUS_EFFECT_TICKED", { unit_id: CombatantId; effect_id: string; damage: number; healing: number; remaining: number }>
  | BaseEvent<
      "ATTACK_RESOLVED",
      { attacker_id: CombatantId; target_id: CombatantId; skill_id?: string; result: CombatResolutionResult }
    >
  | BaseEvent<"SKILL_USED", { user_id: CombatantId; target_id: CombatantId; skill_id: string }>
  | BaseEvent<"UNIT_MOVED", { unit_id: CombatantId; from: Point; to: Point; cost: number }>
  | BaseEvent<
      "PROFICIENCY_ADVANCED",
      { unit_id: CombatantId; weapon_family: WeaponFamily; from_tier: ProficiencyTier; to_tier: ProficiencyTier }
    >
  | BaseEvent<"COMBAT_ENDED", { player_victory: boolean; round: number }>;

export type BattleEventType = BattleEvent["type"];

export type RecordedEvent = BattleEvent & { seq: number; at: Date };

export type BattleEventListener = (event: RecordedEvent) => void;

export interface BattleEventChannelOptions {
  /** newest events kept for replay; 0 or missing keeps all */
  maxHistory?: number;
}

/**
 * Per-battle observer list. Events are numbered from 1 and kept for replay,
 * up to `maxHistory`; sequence numbers keep counting after old events drop.
 * A failing listener is logged and the others still run.
 */
export class BattleEventChannel {
  private listeners: BattleEventListener[] = [];
  private history: RecordedEvent[] = [];
  private lastSeq = 0;
  private readonly maxHistory: number;

  constructor(private readonly log?: Logger, opts: BattleEventChannelOptions = {}) {
    this.maxHistory = opts.maxHistory ?? 0;
  }

  publish(event: BattleEvent): RecordedEvent {
    this.lastSeq += 1;
    const recorded: RecordedEvent = { ...event, seq: this.lastSeq, at: new Date() };
    this.history.push(recorded);
    if (this.maxHistory > 0 && this.history.length > this.maxHistory) {
      this.history = this.history.slice(this.history.length - this.maxHistory);
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(recorded);
      } catch (err) {
        this.log?.error({ err, event_type: event.type }, "battle event listener failed");
      }
    }
    return recorded;
  }

  subscribe(listener: BattleEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  list(from?: number, to?: number): RecordedEvent[] {
    return this.history.filter((e) => {
      if (from != null && e.seq < from) return false;
      if (to != null && e.seq > to) return false;
      return true;
    });
  }

  ofType<T extends BattleEventType>(type: T): Array<Extract<BattleEvent, { type: T }> & { seq: number; at: Date }> {
    const out: Array<Extract<BattleEvent, { type: T }> & { seq: number; at: Date }> = [];
    for (const e of this.history) {
      if (isEventOfType(e, type)) out.push(e);
    }
    return out;
  }

  /** events currently retained */
  get size(): number {
    return this.history.length;
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}

export function isEventOfType<T extends BattleEventType>(
  event: RecordedEvent,
  type: T
): event is Extract<BattleEvent, { type: T }> & { seq: number; at: Date } {
  return event.type === type;
}
