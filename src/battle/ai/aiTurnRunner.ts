import type { Logger } from "pino";
import type { ActionExecutor } from "../actions/actionExecutor";
import { delay } from "../async/timing";
import type { Combatant } from "../domain/combatant";
import type { FactionRelationshipResolver } from "../domain/factionRelations";
import { samePoint } from "../domain/geometry";
import type { ActionReport } from "../domain/types";
import type { GridService } from "../ports/gridPort";
import type { RandomSource } from "../ports/randomSourcePort";
import type { AiTurnContext, AiTurnDriver } from "./aiTurnDriver";
import { createBehavior, type ActionChoice } from "./behaviors";

export interface AiTurnRunnerDeps {
  executor: ActionExecutor;
  factions: FactionRelationshipResolver;
  random: RandomSource;
  log: Logger;
  grid?: GridService;
  thinkingDelayMs?: number;
}

/**
 * One AI unit's turn: think, pick a target, move, act, then end the turn.
 * Window membership is checked again after every await; once the unit is no
 * longer in the window the turn stops without ending anything.
 */
export class AiTurnRunner implements AiTurnDriver {
  private readonly thinkingDelayMs: number;

  constructor(private readonly deps: AiTurnRunnerDeps) {
    this.thinkingDelayMs = deps.thinkingDelayMs ?? 0;
  }

  async takeTurn(unit: Combatant, turn: AiTurnContext): Promise<void> {
    const { signal, battle, complete } = turn;
    const log = this.deps.log.child({ unit_id: unit.id });

    if (!battle.isUnitInCurrentWindow(unit)) {
      log.debug("unit is not in the current window; skipping");
      return;
    }
    const stillInWindow = () => !signal.aborted && battle.isUnitInCurrentWindow(unit);

    await delay(this.thinkingDelayMs, signal);
    if (!stillInWindow()) return;

    if (!unit.isAlive() || !unit.active) {
      complete();
      return;
    }
    if (!unit.canAct()) {
      log.debug("unit cannot act this turn");
      complete();
      return;
    }
    if (!unit.behavior) {
      log.error("unit has no AI behavior; ending turn");
      complete();
      return;
    }
    if (!this.deps.grid) {
      log.error("no grid service attached; ending turn");
      complete();
      return;
    }

    const behavior = createBehavior(unit.behavior, {
      self: unit,
      factions: this.deps.factions,
      random: this.deps.random,
    });

    const target = behavior.chooseTarget(battle.getAllUnits());
    if (!target) {
      log.debug("no valid target");
      complete();
      return;
    }

    let action = behavior.chooseAction(target, unit.skills);

    if (unit.canMove() && unit.movementRemaining > 0) {
      const reachable = this.deps.grid.reachableCells(unit, unit.movementRemaining);
      const cell = behavior.evaluateBestMove(target, reachable);
      if (cell && !samePoint(cell, unit.position)) {
        const moved = await this.deps.executor.move(unit, cell, signal);
        if (!stillInWindow()) return;
        if (moved.ok) action = behavior.chooseAction(target, unit.skills);
      }
    }

    if (!unit.isAlive() || !target.isAlive() || !target.active) {
      complete();
      return;
    }

    if (!this.relationshipAllows(unit, target, action)) {
      log.debug({ target_id: target.id, action: action.kind }, "target no longer fits the action");
      complete();
      return;
    }

    const report = this.execute(unit, target, action);
    if (report && !report.ok) {
      log.debug({ target_id: target.id, action: action.kind, reason: report.reason }, "AI action failed");
    }
    complete();
  }

  private relationshipAllows(unit: Combatant, target: Combatant, action: ActionChoice): boolean {
    const relationship = this.deps.factions.getRelationship(unit.factionId, target.factionId);
    switch (action.kind) {
      case "MELEE_ATTACK":
      case "RANGED_SKILL":
        return relationship === "HOSTILE";
      case "SUPPORT":
        return relationship === "ALLY";
      case "MOVE":
      case "WAIT":
        return true;
      default: {
        const _exhaustive: never = action.kind;
        return _exhaustive;
      }
    }
  }

  private execute(unit: Combatant, target: Combatant, action: ActionChoice): ActionReport | null {
    switch (action.kind) {
      case "MELEE_ATTACK":
        return this.deps.executor.meleeAttack(unit, target);
      case "RANGED_SKILL":
      case "SUPPORT":
        return this.deps.executor.useSkill(unit, action.skill, target);
      case "MOVE":
      case "WAIT":
        return null;
      default: {
        const _exhaustive: never = action.kind;
        return _exhaustive;
      }
    }
  }
}
