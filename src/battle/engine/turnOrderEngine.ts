import type { Logger } from "pino";
import type { AiTurnDriver, BattleView } from "../ai/aiTurnDriver";
import { AiWindowSequencer } from "../ai/windowSequencer";
import { evaluateVictory } from "../domain/combatEnd";
import type { Combatant } from "../domain/combatant";
import type { FactionRelationshipResolver } from "../domain/factionRelations";
import {
  DEFAULT_ENCOUNTER,
  PLAYER_FACTION_ID,
  type BattlePhase,
  type CombatantId,
  type CombatOutcome,
  type EncounterConfig,
  type FactionId,
  type Point,
} from "../domain/types";
import { isEventOfType, type BattleEventChannel } from "../events/battleEvents";
import type { HazardService } from "../ports/hazardPort";
import { TurnOrder } from "./turnOrder";

export const DEFAULT_AI_TURN_TIMEOUT_MS = 5000;

export interface TurnOrderEngineDeps {
  factions: FactionRelationshipResolver;
  events: BattleEventChannel;
  log: Logger;
  playerFactionId?: FactionId;
  hazards?: HazardService;
  ai?: AiTurnDriver;
  aiTurnTimeoutMs?: number;
}

export interface UnitStateView {
  id: CombatantId;
  name: string;
  faction_id: FactionId;
  hp: number;
  max_hp: number;
  alive: boolean;
  position: Point;
  speed: number;
  has_acted: boolean;
  movement_remaining: number;
  effects: Array<{ id: string; remaining: number }>;
}

export interface BattleStateView {
  phase: BattlePhase;
  round: number;
  cursor: number;
  order: UnitStateView[];
  window: CombatantId[];
  current_unit_id: CombatantId | null;
  outcome: CombatOutcome;
}

/**
 * Owns whose turn it is. Units act in windows: consecutive units of one
 * faction, starting at the cursor. Ending a turn re-queues the unit behind
 * everyone; when no due unit is left the round wraps.
 */
export class TurnOrderEngine implements BattleView {
  private readonly factions: FactionRelationshipResolver;
  private readonly events: BattleEventChannel;
  private readonly log: Logger;
  private readonly playerFactionId: FactionId;
  private readonly hazards?: HazardService;
  private readonly sequencer: AiWindowSequencer;
  private readonly unsubscribe: () => void;

  private readonly units = new Map<CombatantId, Combatant>();
  private readonly order = new TurnOrder();
  private window: CombatantId[] = [];
  private currentRound = 1;
  private lastHazardRound = 0;
  private enginePhase: BattlePhase = "NOT_STARTED";
  private encounter: EncounterConfig = DEFAULT_ENCOUNTER;
  private outcome: CombatOutcome = { over: false };
  private transitioning = false;

  constructor(deps: TurnOrderEngineDeps) {
    this.factions = deps.factions;
    this.events = deps.events;
    this.log = deps.log;
    this.playerFactionId = deps.playerFactionId ?? PLAYER_FACTION_ID;
    this.hazards = deps.hazards;
    this.sequencer = new AiWindowSequencer({
      battle: this,
      driver: deps.ai,
      turnTimeoutMs: deps.aiTurnTimeoutMs ?? DEFAULT_AI_TURN_TIMEOUT_MS,
      log: deps.log,
    });

    this.unsubscribe = this.events.subscribe((e) => {
      if (isEventOfType(e, "UNIT_DIED")) this.handleUnitDeath(e.payload.unit_id);
    });
  }

  get round(): number {
    return this.currentRound;
  }

  get phase(): BattlePhase {
    return this.enginePhase;
  }

  get cursor(): number {
    return this.order.cursor;
  }

  get combatOutcome(): CombatOutcome {
    return { ...this.outcome };
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  initialize(units: readonly Combatant[], encounter: EncounterConfig = DEFAULT_ENCOUNTER): void {
    this.sequencer.cancel();
    this.units.clear();
    this.order.reset([]);
    this.window = [];
    this.currentRound = 1;
    this.lastHazardRound = 0;
    this.outcome = { over: false };
    this.enginePhase = "NOT_STARTED";
    this.encounter = encounter;

    if (units.length === 0) {
      this.log.warn("initialize called without units; battle not started");
      return;
    }

    for (const u of units) {
      if (this.units.has(u.id)) {
        this.log.warn({ unit_id: u.id }, "duplicate unit in initialize; keeping the first");
        continue;
      }
      u.active = true;
      this.units.set(u.id, u);
    }

    const sorted = [...this.units.values()].sort((a, b) => this.compareInitiative(a, b));
    this.order.reset(sorted.map((u) => u.id));
    this.enginePhase = "WINDOW_ACTIVE";

    this.events.publish({
      type: "BATTLE_STARTED",
      payload: { unit_ids: this.order.toArray(), round: this.currentRound },
    });

    this.advanceToNextWindow();
  }

  registerUnit(unit: Combatant): void {
    if (this.units.has(unit.id)) {
      this.log.warn({ unit_id: unit.id }, "unit already registered");
      return;
    }
    if (this.enginePhase === "COMBAT_OVER") {
      this.log.warn({ unit_id: unit.id }, "cannot register a unit after combat ended");
      return;
    }

    unit.active = true;
    this.units.set(unit.id, unit);

    if (this.enginePhase === "NOT_STARTED") {
      this.order.insertDue(unit.id, () => 0);
      return;
    }

    this.order.insertDue(unit.id, (a, b) => this.compareInitiativeById(a, b));
    this.log.debug({ unit_id: unit.id, order: this.order.toArray() }, "unit joined the battle");

    if (this.window.length === 0) this.advanceToNextWindow();
  }

  unregisterUnit(unit: Combatant): void {
    if (!this.units.has(unit.id)) {
      this.log.warn({ unit_id: unit.id }, "unregister of unknown unit");
      return;
    }

    const wasHead = this.window[0] === unit.id;
    const inWindow = this.window.includes(unit.id);

    this.units.delete(unit.id);
    unit.active = false;
    this.order.remove(unit.id);

    if (inWindow) {
      this.window = this.window.filter((id) => id !== unit.id);
      this.sequencer.cancelUnit(unit.id);
    }

    if (this.enginePhase !== "WINDOW_ACTIVE" || this.transitioning) return;
    if (this.isCombatOver()) return;

    if (inWindow) {
      if (this.window.length === 0) this.advanceToNextWindow();
      else if (wasHead) this.announceWindow();
    }
  }

  /** Stops AI work and detaches from the event channel. */
  dispose(): void {
    this.sequencer.cancel();
    this.unsubscribe();
  }

  whenIdle(): Promise<void> {
    return this.sequencer.whenIdle();
  }

  // ============================================================
  // TURNS
  // ============================================================

  endTurn(unit: Combatant, opts: { forced?: boolean } = {}): void {
    if (this.enginePhase !== "WINDOW_ACTIVE") {
      this.log.debug({ unit_id: unit.id, phase: this.enginePhase }, "endTurn ignored: no active window");
      return;
    }
    if (!this.window.includes(unit.id)) {
      this.log.warn({ unit_id: unit.id, window: this.window }, "endTurn for a unit outside the current window");
      return;
    }

    this.transitioning = true;
    try {
      this.applyEndOfTurnHazard(unit);
      this.order.requeue(unit.id);
      this.window = this.window.filter((id) => id !== unit.id);
      this.events.publish({
        type: "TURN_ENDED",
        payload: { unit_id: unit.id, round: this.currentRound, forced: opts.forced ?? false },
      });
    } finally {
      this.transitioning = false;
    }

    if (this.isCombatOver()) return;

    if (this.window.length === 0) this.advanceToNextWindow();
    else this.announceWindow();
  }

  isUnitInCurrentWindow(unit: Combatant): boolean {
    return this.enginePhase === "WINDOW_ACTIVE" && this.window.includes(unit.id);
  }

  getCurrentWindow(): Combatant[] {
    return this.resolveIds(this.window);
  }

  getCurrentUnit(): Combatant | null {
    return this.getCurrentWindow()[0] ?? null;
  }

  getAllUnits(): Combatant[] {
    return this.resolveIds(this.order.toArray());
  }

  getUnit(id: CombatantId): Combatant | null {
    return this.units.get(id) ?? null;
  }

  isPlayerControlled(unit: Combatant): boolean {
    return unit.factionId === this.playerFactionId;
  }

  // ============================================================
  // VICTORY
  // ============================================================

  /** Raises COMBAT_ENDED the first time the battle is found to be over. */
  isCombatOver(): boolean {
    if (this.enginePhase === "COMBAT_OVER") return true;
    if (this.enginePhase === "NOT_STARTED") return false;

    const outcome = evaluateVictory({
      units: [...this.units.values()],
      round: this.currentRound,
      encounter: this.encounter,
      factions: this.factions,
      playerFactionId: this.playerFactionId,
    });
    if (!outcome.over) return false;

    this.enginePhase = "COMBAT_OVER";
    this.outcome = outcome;
    this.window = [];
    this.sequencer.cancel();

    const playerVictory = outcome.playerVictory ?? false;
    this.log.info({ round: this.currentRound, player_victory: playerVictory }, "combat ended");
    this.events.publish({
      type: "COMBAT_ENDED",
      payload: { player_victory: playerVictory, round: this.currentRound },
    });
    return true;
  }

  getState(): BattleStateView {
    return {
      phase: this.enginePhase,
      round: this.currentRound,
      cursor: this.order.cursor,
      order: this.getAllUnits().map((u) => ({
        id: u.id,
        name: u.name,
        faction_id: u.factionId,
        hp: u.hp,
        max_hp: u.stats.maxHp,
        alive: u.isAlive(),
        position: { ...u.position },
        speed: u.stats.speed,
        has_acted: u.hasActed,
        movement_remaining: u.movementRemaining,
        effects: u.statusEffects.active().map((i) => ({ id: i.definition.id, remaining: i.remaining })),
      })),
      window: [...this.window],
      current_unit_id: this.window[0] ?? null,
      outcome: { ...this.outcome },
    };
  }

  // ===== helpers =====

  private advanceToNextWindow(): void {
    this.transitioning = true;
    try {
      // a pass forms a window, wraps the round, or loses a whole window to turn-start ticks
      const maxPasses = this.order.length * 2 + 2;
      for (let pass = 0; pass < maxPasses; pass++) {
        if (this.isCombatOver()) return;
        if (this.order.exhausted) {
          this.startNextRound();
          if (this.isCombatOver()) return;
        }

        this.window = this.computeWindow();
        if (this.window.length === 0) continue;

        this.startWindowTurns();
        if (this.isCombatOver()) return;
        if (this.window.length > 0) break;
      }
    } finally {
      this.transitioning = false;
    }

    if (this.enginePhase !== "WINDOW_ACTIVE") return;
    if (this.window.length === 0) {
      this.log.error({ round: this.currentRound }, "no unit left to act");
      return;
    }
    this.announceWindow();
  }

  private startNextRound(): void {
    this.order.startNextRound();
    this.currentRound += 1;

    if (this.currentRound > this.lastHazardRound) {
      this.lastHazardRound = this.currentRound;
      this.hazards?.tickRoundHazards(this.currentRound);
    }
    this.events.publish({ type: "ROUND_STARTED", payload: { round: this.currentRound } });
  }

  /** Skips dead units at the cursor, then collects living units of the head's faction. */
  private computeWindow(): CombatantId[] {
    for (let id = this.order.current(); id !== null; id = this.order.current()) {
      if (this.isLivingUnit(id)) break;
      this.order.skipCurrent();
    }
    if (this.order.exhausted) return [];

    const [headId, ...rest] = this.order.due();
    const head = this.units.get(headId);
    if (!head) return [];

    const window = [headId];
    for (const id of rest) {
      const u = this.units.get(id);
      if (!u || !u.isAlive()) continue;
      if (u.factionId !== head.factionId) break;
      window.push(id);
    }
    return window;
  }

  private startWindowTurns(): void {
    for (const unit of this.resolveIds(this.window)) {
      for (const tick of unit.beginTurn()) {
        this.events.publish({
          type: "STATUS_EFFECT_TICKED",
          payload: {
            unit_id: unit.id,
            effect_id: tick.effectId,
            damage: tick.damage,
            healing: tick.healing,
            remaining: tick.remaining,
          },
        });
        if (tick.damage > 0) this.publishHp(unit, -tick.damage, "STATUS_EFFECT");
        if (tick.healing > 0) this.publishHp(unit, tick.healing, "STATUS_EFFECT");
      }
      if (!unit.isAlive()) {
        this.events.publish({ type: "UNIT_DIED", payload: { unit_id: unit.id } });
      }
    }
  }

  private announceWindow(): void {
    const head = this.getCurrentUnit();
    this.events.publish({
      type: "TURN_WINDOW_CHANGED",
      payload: { unit_ids: [...this.window], faction_id: head?.factionId ?? null, round: this.currentRound },
    });
    this.events.publish({ type: "CURRENT_UNIT_CHANGED", payload: { unit_id: head?.id ?? null } });

    if (head && !this.isPlayerControlled(head)) {
      this.sequencer.ensureRunning();
    }
  }

  private applyEndOfTurnHazard(unit: Combatant): void {
    if (!this.hazards || !unit.isAlive()) return;
    const damage = this.hazards.applyHazardDamage(unit, unit.position);
    if (damage <= 0) return;

    const dealt = unit.takeDamage(damage);
    if (dealt > 0) this.publishHp(unit, -dealt, "HAZARD");
    if (!unit.isAlive()) {
      this.events.publish({ type: "UNIT_DIED", payload: { unit_id: unit.id } });
    }
  }

  private handleUnitDeath(id: CombatantId): void {
    if (this.enginePhase !== "WINDOW_ACTIVE") return;

    const inWindow = this.window.includes(id);
    if (inWindow) {
      this.window = this.window.filter((w) => w !== id);
      this.sequencer.cancelUnit(id);
    }
    if (this.transitioning) return;
    if (this.isCombatOver()) return;

    if (inWindow) {
      if (this.window.length === 0) this.advanceToNextWindow();
      else this.announceWindow();
    }
  }

  private publishHp(unit: Combatant, delta: number, source: "STATUS_EFFECT" | "HAZARD"): void {
    this.events.publish({
      type: "HP_CHANGED",
      payload: { unit_id: unit.id, hp: unit.hp, max_hp: unit.stats.maxHp, delta, source },
    });
  }

  private isLivingUnit(id: CombatantId): boolean {
    const u = this.units.get(id);
    return u !== undefined && u.isAlive();
  }

  private resolveIds(ids: readonly CombatantId[]): Combatant[] {
    const out: Combatant[] = [];
    for (const id of ids) {
      const u = this.units.get(id);
      if (u) out.push(u);
    }
    return out;
  }

  /** Speed descending, player faction first on equal speed, otherwise input order. */
  private compareInitiative(a: Combatant, b: Combatant): number {
    if (a.stats.speed !== b.stats.speed) return b.stats.speed - a.stats.speed;
    return Number(this.isPlayerControlled(b)) - Number(this.isPlayerControlled(a));
  }

  private compareInitiativeById(a: CombatantId, b: CombatantId): number {
    const ua = this.units.get(a);
    const ub = this.units.get(b);
    if (!ua || !ub) return 0;
    return this.compareInitiative(ua, ub);
  }
}
