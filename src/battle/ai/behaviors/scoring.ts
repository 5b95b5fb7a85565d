import type { Combatant } from "../../domain/combatant";
import type { FactionRelationshipResolver } from "../../domain/factionRelations";
import { chebyshev, manhattan } from "../../domain/geometry";
import type { ActionKind, Point, SkillDefinition, SkillKind } from "../../domain/types";
import type { RandomSource } from "../../ports/randomSourcePort";
import type { Cell } from "../../ports/gridPort";
import type { BehaviorKind } from "./behaviorConfig";

export interface ActionChoice {
  kind: ActionKind;
  skill?: SkillDefinition;
}

export interface BehaviorContext {
  self: Combatant;
  factions: FactionRelationshipResolver;
  random: RandomSource;
}

export interface AiBehavior {
  readonly kind: BehaviorKind;
  chooseTarget(allUnits: readonly Combatant[]): Combatant | null;
  chooseAction(target: Combatant, skills: readonly SkillDefinition[]): ActionChoice;
  /** null when no cell was scored; the unit's own cell when staying is best */
  evaluateBestMove(target: Combatant | null, reachable: readonly Cell[]): Cell | null;
}

export const HAZARD_PENALTY = 1000;

/** Highest score wins; on a tie the earlier item stays. -Infinity never wins. */
export function pickBest<T>(items: Iterable<T>, score: (item: T) => number): T | null {
  let best: T | null = null;
  let bestScore = -Infinity;
  for (const item of items) {
    const s = score(item);
    if (s > bestScore) {
      best = item;
      bestScore = s;
    }
  }
  return best;
}

function isCandidate(self: Combatant, unit: Combatant): boolean {
  return unit.id !== self.id && unit.active && unit.isAlive();
}

export function enemiesOf(ctx: BehaviorContext, units: readonly Combatant[]): Combatant[] {
  return units.filter((u) => isCandidate(ctx.self, u) && ctx.factions.isHostile(ctx.self.factionId, u.factionId));
}

export function alliesOf(ctx: BehaviorContext, units: readonly Combatant[]): Combatant[] {
  return units.filter((u) => isCandidate(ctx.self, u) && ctx.factions.isAlly(ctx.self.factionId, u.factionId));
}

/** (1 - hp%) x 100 - manhattan x 10 for a living hostile unit, -Infinity for anything else. */
export function baseTargetScore(ctx: BehaviorContext, target: Combatant): number {
  if (!isCandidate(ctx.self, target)) return -Infinity;
  if (!ctx.factions.isHostile(ctx.self.factionId, target.factionId)) return -Infinity;
  return (1 - target.hpRatio) * 100 - manhattan(ctx.self.position, target.position) * 10;
}

/** Closer is better, ending adjacent to the target is worth 100. */
export function baseMoveScore(cell: Point, target: Combatant | null): number {
  if (!target) return 0;
  let score = -manhattan(cell, target.position) * 10;
  if (chebyshev(cell, target.position) === 1) score += 100;
  return score;
}

export function hazardScore(cell: Cell, avoidance: number): number {
  return cell.hazard ? -HAZARD_PENALTY * avoidance : 0;
}

export function isAdjacent(a: Point, b: Point): boolean {
  return chebyshev(a, b) === 1;
}

export function usableSkills(self: Combatant, skills: readonly SkillDefinition[], kind: SkillKind): SkillDefinition[] {
  return skills.filter((s) => s.kind === kind && self.canUseSkill(s));
}

/** Strongest skill of `kind` that reaches `distance`, first one on ties. */
export function skillInReach(
  self: Combatant,
  skills: readonly SkillDefinition[],
  kind: SkillKind,
  distance: number
): SkillDefinition | null {
  const inReach = usableSkills(self, skills, kind).filter((s) => s.range >= distance);
  return pickBest(inReach, (s) => (kind === "SUPPORT" ? s.healing : s.baseDamage));
}

/** Strongest ATTACK skill with melee reach (range 1 or less). */
export function meleeSkill(self: Combatant, skills: readonly SkillDefinition[]): SkillDefinition | null {
  const melee = usableSkills(self, skills, "ATTACK").filter((s) => s.range <= 1);
  return pickBest(melee, (s) => s.baseDamage);
}

export function countWithin(units: readonly Combatant[], around: Point, radius: number): number {
  return units.filter((u) => manhattan(u.position, around) <= radius).length;
}
