import type { Combatant } from "../../domain/combatant";
import { manhattan } from "../../domain/geometry";
import type { SkillDefinition } from "../../domain/types";
import type { Cell } from "../../ports/gridPort";
import { BERSERKER_DEFAULTS, type BerserkerTuning } from "./behaviorConfig";
import {
  baseMoveScore,
  baseTargetScore,
  enemiesOf,
  hazardScore,
  isAdjacent,
  meleeSkill,
  pickBest,
  type ActionChoice,
  type AiBehavior,
  type BehaviorContext,
} from "./scoring";

/** Goes for the weakest nearby enemy and closes to melee. */
export class BerserkerBehavior implements AiBehavior {
  readonly kind = "BERSERKER";
  readonly tuning: BerserkerTuning;

  constructor(private readonly ctx: BehaviorContext, tuning: Partial<BerserkerTuning> = {}) {
    this.tuning = {
      lowHpWeight: tuning.lowHpWeight ?? BERSERKER_DEFAULTS.lowHpWeight,
      proximityWeight: tuning.proximityWeight ?? BERSERKER_DEFAULTS.proximityWeight,
      hazardAvoidance: tuning.hazardAvoidance ?? BERSERKER_DEFAULTS.hazardAvoidance,
      aggression: tuning.aggression ?? BERSERKER_DEFAULTS.aggression,
      skillPreference: tuning.skillPreference ?? BERSERKER_DEFAULTS.skillPreference,
    };
  }

  chooseTarget(allUnits: readonly Combatant[]): Combatant | null {
    const { self } = this.ctx;
    return pickBest(enemiesOf(this.ctx, allUnits), (t) => {
      const base = baseTargetScore(this.ctx, t);
      const dist = manhattan(self.position, t.position);
      return (
        base +
        (1 - t.hpRatio) * 100 * this.tuning.lowHpWeight -
        dist * 10 * (1 - this.tuning.proximityWeight)
      );
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
      let score = baseMoveScore(cell, target) + hazardScore(cell, this.tuning.hazardAvoidance);
      if (target && isAdjacent(cell, target.position)) score += 100 * this.tuning.aggression;
      return score;
    });
  }
}
