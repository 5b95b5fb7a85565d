import type { Logger } from "pino";
import type { Combatant } from "../domain/combatant";
import type { CombatConstants } from "../domain/combatConstants";
import { DEFAULT_COMBAT_CONSTANTS } from "../domain/combatConstants";
import {
  effectiveAttackPower,
  gatherAttackerStats,
  gatherDefenderStats,
  resolveAttack,
} from "../domain/combatResolver";
import type { FactionRelationshipResolver } from "../domain/factionRelations";
import { areaCells } from "../domain/areaPatterns";
import { TurnCancelledError } from "../domain/errors";
import { chebyshev, samePoint } from "../domain/geometry";
import { isMeaningfulEncounter } from "../domain/proficiency";
import { roundHalfEven } from "../domain/rounding";
import { getStatusEffectDefinition } from "../domain/statusEffects";
import type { ActionReport, CombatantId, CombatResolutionResult, Point, SkillArea, SkillDefinition } from "../domain/types";
import type { BattleEventChannel, HpChangeSource } from "../events/battleEvents";
import type { GridService } from "../ports/gridPort";
import type { HazardService } from "../ports/hazardPort";
import type { RandomSource } from "../ports/randomSourcePort";

export interface ActionExecutorDeps {
  events: BattleEventChannel;
  factions: FactionRelationshipResolver;
  random: RandomSource;
  log: Logger;
  constants?: CombatConstants;
  grid?: GridService;
  hazards?: HazardService;
}

function fail(reason: string): ActionReport {
  return { ok: false, reason };
}

function landed(result: CombatResolutionResult): boolean {
  return result.hit && !result.parried;
}

/**
 * Applies attacks, skills and moves for player requests and AI turns alike.
 * Invalid requests return `{ ok: false }` and log a warning; nothing throws.
 */
export class ActionExecutor {
  private readonly events: BattleEventChannel;
  private readonly factions: FactionRelationshipResolver;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private readonly constants: CombatConstants;
  private readonly grid?: GridService;
  private readonly hazards?: HazardService;

  constructor(deps: ActionExecutorDeps) {
    this.events = deps.events;
    this.factions = deps.factions;
    this.random = deps.random;
    this.log = deps.log;
    this.constants = deps.constants ?? DEFAULT_COMBAT_CONSTANTS;
    this.grid = deps.grid;
    this.hazards = deps.hazards;
  }

  meleeAttack(attacker: Combatant | null | undefined, target: Combatant | null | undefined): ActionReport {
    const invalid = this.validateActor(attacker) ?? this.validateTarget(attacker, target);
    if (invalid || !attacker || !target) return this.reject(invalid ?? "missing unit", attacker, target);

    if (this.factions.isAlly(attacker.factionId, target.factionId)) {
      return this.reject("target is an ally", attacker, target);
    }
    if (chebyshev(attacker.position, target.position) !== 1) {
      return this.reject("target is not adjacent", attacker, target);
    }

    attacker.hasActed = true;
    const result = this.strike(attacker, target, effectiveAttackPower(attacker), "ATTACK");
    return { ok: true, result };
  }

  useSkill(user: Combatant | null | undefined, skill: SkillDefinition | null | undefined, target: Combatant | null | undefined): ActionReport {
    const invalid = this.validateActor(user) ?? this.validateTarget(user, target, skill?.kind === "SUPPORT");
    if (invalid || !user || !target) return this.reject(invalid ?? "missing unit", user, target);
    if (!skill) return this.reject("unknown skill", user, target);
    if (!user.skills.some((s) => s.id === skill.id)) return this.reject(`skill ${skill.id} not known`, user, target);
    if (!user.canUseSkill(skill)) return this.reject(`skill ${skill.id} not usable by ${user.unitType}`, user, target);

    const distance = chebyshev(user.position, target.position);
    if (distance > skill.range) return this.reject(`target out of range (${distance} > ${skill.range})`, user, target);

    const relationship = this.factions.getRelationship(user.factionId, target.factionId);
    if (skill.kind === "ATTACK" && relationship !== "HOSTILE") return this.reject("target is not hostile", user, target);
    if (skill.kind === "SUPPORT" && relationship !== "ALLY") return this.reject("target is not an ally", user, target);

    const targets = skill.area ? this.unitsInArea(user, skill, skill.area, target) : [target];
    const affected = skill.area ? { affected: targets.map((t) => t.id) } : {};

    user.hasActed = true;
    this.events.publish({
      type: "SKILL_USED",
      payload: { user_id: user.id, target_id: target.id, skill_id: skill.id },
    });

    if (skill.kind === "SUPPORT") {
      let healed = 0;
      for (const t of targets) {
        const restored = t.heal(skill.healing);
        if (restored > 0) this.publishHp(t, restored, "HEAL", user.id);
        this.applyEffect(t, skill);
        healed += restored;
      }
      return { ok: true, healed, ...affected };
    }

    const baseDamage = skill.baseDamage + roundHalfEven(user.stats.attackPower * skill.statScaling);
    let aimed: CombatResolutionResult | undefined;
    for (const t of targets) {
      const result = this.strike(user, t, baseDamage, "SKILL", skill.id);
      if (t === target) aimed = result;
      if (landed(result) && t.isAlive()) this.applyEffect(t, skill);
    }

    if (aimed && landed(aimed) && skill.createsHazard) {
      if (this.hazards) this.hazards.createHazard(target.position, skill.createsHazard, user.id);
      else this.log.error({ skill_id: skill.id }, "skill creates a hazard but no hazard service is attached");
    }

    return { ok: true, result: aimed, ...affected };
  }

  /**
   * Walks to `destination`. When `signal` aborts mid-walk the unit stops where
   * it stands, unwalked cells are refunded and the move reports failure.
   */
  async move(unit: Combatant | null | undefined, destination: Point, signal?: AbortSignal): Promise<ActionReport> {
    const invalid = this.validateActor(unit, { ignoreActed: true });
    if (invalid || !unit) return this.reject(invalid ?? "missing unit", unit, null);
    if (!this.grid) {
      this.log.error({ unit_id: unit.id }, "move requested without a grid service");
      return fail("no grid service");
    }
    if (!unit.canMove()) return this.reject("unit cannot move", unit, null);
    if (!this.grid.isValidPosition(destination.x, destination.y)) {
      return this.reject(`position (${destination.x},${destination.y}) is off the grid`, unit, null);
    }

    const path = this.grid.path(unit, destination);
    if (path.length === 0) return this.reject("destination unreachable", unit, null);
    if (path.length > unit.movementRemaining) {
      return this.reject(`move costs ${path.length}, ${unit.movementRemaining} left`, unit, null);
    }

    const from = { ...unit.position };
    unit.movementRemaining -= path.length;
    try {
      await this.grid.moveUnit(unit, path, signal);
    } catch (err) {
      if (!(err instanceof TurnCancelledError)) throw err;
    }

    const walked = path.findIndex((p) => samePoint(p, unit.position)) + 1;
    unit.movementRemaining += path.length - walked;
    if (walked > 0) {
      this.events.publish({
        type: "UNIT_MOVED",
        payload: { unit_id: unit.id, from, to: { ...unit.position }, cost: walked },
      });
    }
    if (signal?.aborted) {
      this.log.warn({ unit_id: unit.id, walked, planned: path.length }, "move interrupted");
      return fail("move interrupted: unit left the turn window");
    }
    return { ok: true };
  }

  // ===== helpers =====

  private validateActor(unit: Combatant | null | undefined, opts: { ignoreActed?: boolean } = {}): string | null {
    if (!unit) return "no acting unit";
    if (!unit.active) return "acting unit left the battle";
    if (!unit.isAlive()) return "acting unit is dead";
    if (!opts.ignoreActed && unit.hasActed) return "unit already acted this turn";
    if (!opts.ignoreActed && !unit.canAct()) return "unit cannot act";
    return null;
  }

  private validateTarget(actor: Combatant | null | undefined, target: Combatant | null | undefined, allowSelf = false): string | null {
    if (!target) return "no target";
    if (!target.active) return "target left the battle";
    if (!target.isAlive()) return "target is dead";
    if (!allowSelf && actor && actor.id === target.id) return "cannot target self";
    return null;
  }

  private reject(reason: string, actor: Combatant | null | undefined, target: Combatant | null | undefined): ActionReport {
    this.log.warn({ actor_id: actor?.id, target_id: target?.id, reason }, "action rejected");
    return fail(reason);
  }

  /** One resolved attack: draws, damage, death and weapon training. */
  private strike(
    attacker: Combatant,
    target: Combatant,
    baseDamage: number,
    source: HpChangeSource,
    skillId?: string
  ): CombatResolutionResult {
    const meaningful = isMeaningfulEncounter(attacker.stats, target.stats);
    const result = resolveAttack({
      attacker: gatherAttackerStats(attacker),
      target: gatherDefenderStats(target),
      baseDamage,
      proficiencyTier: attacker.proficiencyWith(),
      random: this.random,
      constants: this.constants,
    });

    this.events.publish({
      type: "ATTACK_RESOLVED",
      payload: { attacker_id: attacker.id, target_id: target.id, ...(skillId ? { skill_id: skillId } : {}), result },
    });
    this.applyResult(attacker, target, result, source);
    if (meaningful) this.train(attacker, target, result);
    return result;
  }

  private applyResult(attacker: Combatant, target: Combatant, result: CombatResolutionResult, source: HpChangeSource): void {
    if (result.finalDamage <= 0) return;
    const dealt = target.takeDamage(result.finalDamage);
    if (dealt > 0) this.publishHp(target, -dealt, source, attacker.id);
    if (!target.isAlive()) {
      this.events.publish({ type: "UNIT_DIED", payload: { unit_id: target.id, killer_id: attacker.id } });
    }
  }

  private train(attacker: Combatant, target: Combatant, result: CombatResolutionResult): void {
    const family = attacker.weaponFamily;
    const change = attacker.recordProficiencyOutcome(family, {
      hit: landed(result),
      kill: !target.isAlive(),
      crit: result.criticalHit && !result.criticalDefended,
    });
    if (!change) return;
    this.log.info({ unit_id: attacker.id, weapon_family: family, from: change.from, to: change.to }, "proficiency advanced");
    this.events.publish({
      type: "PROFICIENCY_ADVANCED",
      payload: { unit_id: attacker.id, weapon_family: family, from_tier: change.from, to_tier: change.to },
    });
  }

  /** Living units in the area whose relationship fits the skill, user excluded. */
  private unitsInArea(user: Combatant, skill: SkillDefinition, area: SkillArea, aimed: Combatant): Combatant[] {
    if (!this.grid) {
      this.log.error({ skill_id: skill.id }, "area skill used without a grid service; striking the aimed unit only");
      return [aimed];
    }
    const wanted = skill.kind === "ATTACK" ? "HOSTILE" : "ALLY";
    const seen = new Set<CombatantId>();
    const out: Combatant[] = [];
    for (const p of areaCells(area, user.position, aimed.position, this.grid)) {
      const unit = this.grid.unitAt(p);
      if (!unit || unit.id === user.id || seen.has(unit.id)) continue;
      seen.add(unit.id);
      if (this.factions.getRelationship(user.factionId, unit.factionId) === wanted) out.push(unit);
    }
    return out;
  }

  private publishHp(unit: Combatant, delta: number, source: HpChangeSource, sourceUnitId?: string): void {
    this.events.publish({
      type: "HP_CHANGED",
      payload: { unit_id: unit.id, hp: unit.hp, max_hp: unit.stats.maxHp, delta, source, source_unit_id: sourceUnitId },
    });
  }

  private applyEffect(target: Combatant, skill: SkillDefinition): void {
    if (!skill.appliesEffect) return;
    const definition = getStatusEffectDefinition(skill.appliesEffect.effectId);
    if (!definition) {
      this.log.warn({ effect_id: skill.appliesEffect.effectId, skill_id: skill.id }, "unknown status effect");
      return;
    }
    const outcome = target.statusEffects.apply(definition, skill.appliesEffect.duration);
    this.events.publish({
      type: "STATUS_EFFECT_APPLIED",
      payload: {
        unit_id: target.id,
        effect_id: definition.id,
        duration: skill.appliesEffect.duration,
        refreshed: outcome === "REFRESHED",
      },
    });
  }
}
