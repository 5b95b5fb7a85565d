import { ActionExecutor } from "../actions/actionExecutor";
import { RectGrid } from "../adapters/grid/rectGrid";
import { HazardField } from "../adapters/hazards/hazardField";
import { SeededRandomSource } from "../adapters/random/seededRandomSource";
import { AiTurnRunner } from "../ai/aiTurnRunner";
import type { BattleRecord, BattleRepository } from "../db/repository";
import { Combatant } from "../domain/combatant";
import { resolveCombatConstants } from "../domain/combatConstants";
import { ConflictError, DomainError, NotFoundError, ValidationError } from "../domain/errors";
import { FactionRegistry } from "../domain/factionRelations";
import { pointKey } from "../domain/geometry";
import { getSkillDefinition } from "../domain/skills";
import { getStatusEffectDefinition } from "../domain/statusEffects";
import {
  DEFAULT_ENCOUNTER,
  PLAYER_FACTION_ID,
  type ActionReport,
  type CombatantId,
  type FactionId,
  type Point,
  type SkillDefinition,
} from "../domain/types";
import {
  parseActionRequest,
  parseCreateBattleRequest,
  type BattleActionRequest,
  type CreateBattleRequest,
  type UnitSpec,
} from "../domain/validate";
import { BattleEventChannel, type RecordedEvent } from "../events/battleEvents";
import { TurnOrderEngine, type BattleStateView } from "../engine/turnOrderEngine";
import { BattleStatisticsTracker, type BattleStatisticsSnapshot } from "../statistics/battleStatistics";
import { logger as rootLogger, moduleLogger, type Logger } from "../../logging/logger";
import { env } from "../../config/env";

/** Awaited once before the first turn; a rejection aborts the battle. */
export type StakesGate = (battle: { battle_id: string; unit_ids: CombatantId[] }) => Promise<void>;

export interface BattleServiceOptions {
  logger?: Logger;
  thinkingDelayMs?: number;
  aiTurnTimeoutMs?: number;
  moveStepDelayMs?: number;
  /** how long a finished battle stays readable after its record is saved */
  finishedBattleTtlMs?: number;
  /** events kept per battle; older ones are dropped from the replay history */
  eventHistoryLimit?: number;
  stakesGate?: StakesGate;
}

type BattleSession = {
  id: string;
  seed: number;
  startedAt: Date;
  playerFactionId: FactionId;
  events: BattleEventChannel;
  executor: ActionExecutor;
  engine: TurnOrderEngine;
  stats: BattleStatisticsTracker;
  /** set by the first caller that sees combat over; later callers await it */
  recordSave: Promise<void> | null;
  evictionTimer: NodeJS.Timeout | null;
  log: Logger;
};

export interface BattleActionResult {
  report: ActionReport;
  state: BattleStateView;
}

export class BattleService {
  private readonly sessions = new Map<string, BattleSession>();
  private readonly log: Logger;
  private readonly thinkingDelayMs: number;
  private readonly aiTurnTimeoutMs: number;
  private readonly moveStepDelayMs: number;
  private readonly finishedBattleTtlMs: number;
  private readonly eventHistoryLimit: number;
  private readonly stakesGate?: StakesGate;
  private nextId = 1;

  constructor(private repo: BattleRepository, options: BattleServiceOptions = {}) {
    this.log = moduleLogger(options.logger ?? rootLogger, "battle-service");
    this.thinkingDelayMs = options.thinkingDelayMs ?? env.AI_THINKING_DELAY_MS;
    this.aiTurnTimeoutMs = options.aiTurnTimeoutMs ?? env.AI_TURN_TIMEOUT_MS;
    this.moveStepDelayMs = options.moveStepDelayMs ?? env.MOVE_STEP_DELAY_MS;
    this.finishedBattleTtlMs = options.finishedBattleTtlMs ?? env.FINISHED_BATTLE_TTL_MS;
    this.eventHistoryLimit = options.eventHistoryLimit ?? env.BATTLE_EVENT_HISTORY_LIMIT;
    this.stakesGate = options.stakesGate;
  }

  // ============================================================
  // WRITE
  // ============================================================

  async createBattle(body: unknown): Promise<{ battle_id: string; seed: number; state: BattleStateView }> {
    const req = parseCreateBattleRequest(body);
    const battleId = `battle-${Date.now()}-${this.nextId++}`;
    const seed = req.seed ?? Date.now() >>> 0;
    const log = this.log.child({ battle_id: battleId });

    const playerFactionId = req.player_faction_id
      ?? req.factions?.find((f) => f.playerControlled)?.id
      ?? PLAYER_FACTION_ID;

    const registry = new FactionRegistry(req.factions ?? []);
    for (const u of req.units) {
      if (!registry.get(u.faction_id)) {
        registry.register({ id: u.faction_id, name: u.faction_id, playerControlled: u.faction_id === playerFactionId });
      }
    }
    const factions = registry.createResolver(moduleLogger(log, "factions"));
    for (const r of req.relationships ?? []) {
      factions.setRelationship(r.a, r.b, r.type);
    }

    const events = new BattleEventChannel(moduleLogger(log, "events"), { maxHistory: this.eventHistoryLimit });
    const hazards = new HazardField(moduleLogger(log, "hazards"));
    const grid = new RectGrid({
      width: req.grid.width,
      height: req.grid.height,
      blocked: req.grid.blocked,
      stepDelayMs: this.moveStepDelayMs,
      hazards,
    });

    const units = this.buildUnits(req, grid);
    for (const u of units) grid.place(u);
    for (const h of req.hazards ?? []) {
      if (!grid.isValidPosition(h.at.x, h.at.y)) throw new ValidationError(`hazard outside the grid: ${pointKey(h.at)}`);
      hazards.createHazard(h.at, { damage: h.damage, rounds: h.rounds });
    }

    const random = new SeededRandomSource(seed);
    const executor = new ActionExecutor({
      events,
      factions,
      random,
      log: moduleLogger(log, "actions"),
      constants: resolveCombatConstants(req.constants),
      grid,
      hazards,
    });
    const runner = new AiTurnRunner({
      executor,
      factions,
      random,
      log: moduleLogger(log, "ai"),
      grid,
      thinkingDelayMs: this.thinkingDelayMs,
    });
    const engine = new TurnOrderEngine({
      factions,
      events,
      log: moduleLogger(log, "turn-order"),
      playerFactionId,
      hazards,
      ai: runner,
      aiTurnTimeoutMs: this.aiTurnTimeoutMs,
    });

    const byId = new Map(units.map((u) => [u.id, u]));
    const stats = new BattleStatisticsTracker((id) => byId.get(id)?.factionId ?? null);
    stats.attach(events);

    const session: BattleSession = {
      id: battleId,
      seed,
      startedAt: new Date(),
      playerFactionId,
      events,
      executor,
      engine,
      stats,
      recordSave: null,
      evictionTimer: null,
      log,
    };

    if (this.stakesGate) {
      try {
        await this.stakesGate({ battle_id: battleId, unit_ids: units.map((u) => u.id) });
      } catch (err) {
        stats.detach();
        engine.dispose();
        throw err;
      }
    }

    this.sessions.set(battleId, session);
    engine.initialize(units, req.encounter ?? DEFAULT_ENCOUNTER);
    log.info({ units: units.length, seed, player_faction_id: playerFactionId }, "battle created");

    await this.settle(session);
    return { battle_id: battleId, seed, state: engine.getState() };
  }

  async submitAction(battleId: string, body: unknown): Promise<BattleActionResult> {
    const session = this.requireSession(battleId);
    const action = parseActionRequest(body);
    const { engine } = session;

    if (engine.phase === "COMBAT_OVER") {
      throw new ConflictError(`combat is over: ${battleId}`);
    }

    const actor = this.requireUnit(session, action.actor_id);
    if (!engine.isPlayerControlled(actor)) {
      throw new DomainError(`unit is not player-controlled: ${actor.id}`);
    }
    if (!engine.isUnitInCurrentWindow(actor)) {
      throw new DomainError(`unit is not in the current turn window: ${actor.id}`);
    }

    const report = await this.perform(session, actor, action);
    if (!report.ok) {
      throw new DomainError(report.reason);
    }

    await this.settle(session);
    return { report, state: engine.getState() };
  }

  endBattle(battleId: string): { battle_id: string; ended: true } {
    this.evict(this.requireSession(battleId), "battle closed");
    return { battle_id: battleId, ended: true };
  }

  /** Drops every live battle; stored records are kept. */
  close(): void {
    for (const session of [...this.sessions.values()]) {
      this.evict(session, "service closing");
    }
  }

  // ============================================================
  // READ
  // ============================================================

  getState(battleId: string): BattleStateView {
    return this.requireSession(battleId).engine.getState();
  }

  getEvents(battleId: string, from?: number, to?: number): RecordedEvent[] {
    if (from != null && to != null && from > to) {
      throw new ValidationError(`invalid range: from (${from}) > to (${to})`);
    }
    return this.requireSession(battleId).events.list(from, to);
  }

  getStatistics(battleId: string): BattleStatisticsSnapshot {
    const session = this.requireSession(battleId);
    return session.stats.snapshot(session.playerFactionId);
  }

  async getRecord(battleId: string): Promise<BattleRecord> {
    const record = await this.repo.getRecord(battleId);
    if (!record) throw new NotFoundError(`battle record not found: ${battleId}`);
    return record;
  }

  async listRecords(limit = 20): Promise<BattleRecord[]> {
    if (!Number.isInteger(limit) || limit <= 0) throw new ValidationError("limit must be a positive integer");
    return this.repo.listRecords(limit);
  }

  /** Waits until no AI turn is in flight. */
  async whenIdle(battleId: string): Promise<void> {
    await this.requireSession(battleId).engine.whenIdle();
  }

  // ===== helpers =====

  private async perform(session: BattleSession, actor: Combatant, action: BattleActionRequest): Promise<ActionReport> {
    const { executor, engine } = session;
    switch (action.type) {
      case "ATTACK":
        return executor.meleeAttack(actor, this.requireUnit(session, action.target_id));
      case "SKILL": {
        const skill = actor.skills.find((s) => s.id === action.skill_id);
        if (!skill) throw new DomainError(`unit ${actor.id} does not know skill ${action.skill_id}`);
        return executor.useSkill(actor, skill, this.requireUnit(session, action.target_id));
      }
      case "MOVE":
        return this.moveInWindow(session, actor, action.destination);
      case "END_TURN":
        engine.endTurn(actor);
        return { ok: true };
      default: {
        const _exhaustive: never = action;
        return _exhaustive;
      }
    }
  }

  /** Walks the actor, stopping the walk once it is no longer in the turn window. */
  private async moveInWindow(session: BattleSession, actor: Combatant, destination: Point): Promise<ActionReport> {
    const controller = new AbortController();
    const unsubscribe = session.events.subscribe(() => {
      if (!session.engine.isUnitInCurrentWindow(actor)) controller.abort();
    });
    try {
      return await session.executor.move(actor, destination, controller.signal);
    } finally {
      unsubscribe();
    }
  }

  /** Lets AI windows play out, then stores the record once combat is over. */
  private async settle(session: BattleSession): Promise<void> {
    await session.engine.whenIdle();
    if (session.engine.phase !== "COMBAT_OVER") return;

    if (!session.recordSave) {
      session.recordSave = this.saveRecord(session).then(
        () => this.scheduleEviction(session),
        (err: unknown) => {
          session.recordSave = null;
          throw err;
        }
      );
    }
    await session.recordSave;
  }

  private async saveRecord(session: BattleSession): Promise<void> {
    const outcome = session.engine.combatOutcome;
    const record: BattleRecord = {
      battle_id: session.id,
      player_victory: outcome.playerVictory ?? false,
      rounds: session.engine.round,
      seed: session.seed,
      started_at: session.startedAt,
      ended_at: new Date(),
      unit_stats: session.stats.snapshot(session.playerFactionId).units,
    };
    await this.repo.saveRecord(record);
    session.log.info({ player_victory: record.player_victory, rounds: record.rounds }, "battle record saved");
  }

  private scheduleEviction(session: BattleSession): void {
    if (!this.sessions.has(session.id)) return;
    session.evictionTimer = setTimeout(() => this.evict(session, "retention elapsed"), this.finishedBattleTtlMs);
    session.evictionTimer.unref();
  }

  private evict(session: BattleSession, reason: string): void {
    if (session.evictionTimer) clearTimeout(session.evictionTimer);
    session.evictionTimer = null;
    session.engine.dispose();
    session.stats.detach();
    this.sessions.delete(session.id);
    session.log.info({ reason }, "battle closed");
  }

  private buildUnits(req: CreateBattleRequest, grid: RectGrid): Combatant[] {
    const occupied = new Set<string>();
    return req.units.map((spec, i) => {
      const { x, y } = spec.position;
      const cell = grid.cellAt(x, y);
      if (!cell || !cell.walkable) throw new ValidationError(`units[${i}].position is not a walkable cell`);
      const key = pointKey(spec.position);
      if (occupied.has(key)) throw new ValidationError(`units[${i}].position is already occupied`);
      occupied.add(key);

      const unit = new Combatant({
        id: spec.id,
        name: spec.name,
        factionId: spec.faction_id,
        unitType: spec.unit_type,
        position: spec.position,
        stats: spec.stats,
        hp: spec.hp,
        weaponFamily: spec.weapon_family,
        proficiency: spec.proficiency,
        behavior: spec.behavior,
        skills: this.resolveSkills(spec, i),
      });

      for (const e of spec.effects ?? []) {
        const def = getStatusEffectDefinition(e.effectId);
        if (!def) throw new ValidationError(`units[${i}]: unknown status effect ${e.effectId}`);
        unit.statusEffects.apply(def, e.duration);
      }
      return unit;
    });
  }

  private resolveSkills(spec: UnitSpec, index: number): SkillDefinition[] {
    return (spec.skills ?? []).map((id) => {
      const skill = getSkillDefinition(id);
      if (!skill) throw new ValidationError(`units[${index}]: unknown skill ${id}`);
      return skill;
    });
  }

  private requireSession(battleId: string): BattleSession {
    const session = this.sessions.get(battleId);
    if (!session) throw new NotFoundError(`battle not found: ${battleId}`);
    return session;
  }

  private requireUnit(session: BattleSession, unitId: CombatantId): Combatant {
    const unit = session.engine.getUnit(unitId);
    if (!unit) throw new NotFoundError(`unit not found: ${unitId}`);
    return unit;
  }
}
