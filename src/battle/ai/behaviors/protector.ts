import type { Combatant } from "../../domain/combatant";
import { chebyshev, manhattan } from "../../domain/geometry";
import type { SkillDefinition } from "../../domain/types";
import type { Cell } from "../../ports/gridPort";
import { PROTECTOR_DEFAULTS, type ProtectorTuning } from "./behaviorConfig";
import {
  alliesOf,
  baseTargetScore,
  countWithin,
  enemiesOf,
  hazardScore,
  isAdjacent,
  meleeSkill,
  pickBest,
  type ActionChoice,
  type AiBehavior,
  type BehaviorContext,
} from "./scoring";

const DANGER_RADIUS = 2;
const WOUNDED_HP = 0.7;

/**
 * Guards allies: engages whoever threatens the ally in most danger,
 * otherwise the enemy that sits closest to its own side.
 */
export class ProtectorBehavior implements AiBehavior {
  readonly kind = "PROTECTOR";
  readonly tuning: ProtectorTuning;

  constructor(private readonly ctx: BehaviorContext, tuning: Partial<ProtectorTuning> = {}) {
    this.tuning = {
      hazardAvoidance: tuning.hazardAvoidance ?? PROTECTOR_DEFAULTS.hazardAvoidance,
      skillPreference: tuning.skillPreference ?? PROTECTOR_DEFAULTS.skillPreference,
    };
  }

  chooseTarget(allUnits: readonly Combatant[]): Combatant | null {
    const { self } = this.ctx;
    const enemies = enemiesOf(this.ctx, allUnits);
    const allies = alliesOf(this.ctx, allUnits);

    const endangered = allies.filter(
      (a) => a.hpRatio < WOUNDED_HP || countWithin(enemies, a.position, DANGER_RADIUS) > 0
    );
    const ward = pickBest(
      endangered,
      (a) => (1 - a.hpRatio) * 100 + countWithin(enemies, a.position, DANGER_RADIUS) * 50
    );

    if (ward) {
      const threats = enemies.filter((e) => manhattan(e.position, ward.position) <= DANGER_RADIUS);
      const closest = pickBest(threats, (e) => -manhattan(e.position, ward.position));
      if (closest) return closest;
    }

    return pickBest(enemies, (t) => {
      const dist = manhattan(self.position, t.position);
      return baseTargetScore(this.ctx, t) - dist * 15 + countWithin(allies, t.position, DANGER_RADIUS) * 30;
    });
  }

  chooseAction(target: Combatant, skills: readonly SkillDefinition[]): ActionChoice {
    const { self, random } = this.ctx;
    if (!isAdjacent(self.position, target.position)) return { kind: "MOVE" };

    const skill = meleeSkill(self, skills);
    if (skill && random.next() < this.tuning.skillPreference) {
      return { kind: "RANGED_SKILL", skill };
    }
    return { kind: "MELEE_ATTACK" };
  }

  evaluateBestMove(target: Combatant | null, reachable: readonly Cell[]): Cell | null {
    return pickBest(reachable, (cell) => {
      let score = hazardScore(cell, this.tuning.hazardAvoidance);
      if (!target) return score;
      score += isAdjacent(cell, target.position) ? 150 : -chebyshev(cell, target.position) * 10;
      return score;
    });
  }
}
