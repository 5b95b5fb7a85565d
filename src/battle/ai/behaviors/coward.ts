import type { Combatant } from "../../domain/combatant";
import { chebyshev, manhattan } from "../../domain/geometry";
import type { SkillDefinition } from "../../domain/types";
import type { Cell } from "../../ports/gridPort";
import { COWARD_DEFAULTS, type CowardTuning } from "./behaviorConfig";
import {
  baseTargetScore,
  enemiesOf,
  hazardScore,
  pickBest,
  skillInReach,
  type ActionChoice,
  type AiBehavior,
  type BehaviorContext,
} from "./scoring";

const SKILL_REACH = 3;
const BRAVE_ENOUGH_HP = 0.6;

/** Picks on the weak from range and runs once its own HP drops under the threshold. */
export class CowardBehavior implements AiBehavior {
  readonly kind = "COWARD";
  readonly tuning: CowardTuning;

  constructor(private readonly ctx: BehaviorContext, tuning: Partial<CowardTuning> = {}) {
    this.tuning = {
      retreatThreshold: tuning.retreatThreshold ?? COWARD_DEFAULTS.retreatThreshold,
      hazardAvoidance: tuning.hazardAvoidance ?? COWARD_DEFAULTS.hazardAvoidance,
    };
  }

  get retreating(): boolean {
    return this.ctx.self.hpRatio < this.tuning.retreatThreshold;
  }

  chooseTarget(allUnits: readonly Combatant[]): Combatant | null {
    const { self } = this.ctx;
    return pickBest(enemiesOf(this.ctx, allUnits), (t) => {
      const dist = manhattan(self.position, t.position);
      let score = baseTargetScore(this.ctx, t) + (1 - t.hpRatio) * 120 + dist * 15;
      if (this.retreating && t.hpRatio > 0.5) score -= 200;
      return score;
    });
  }

  chooseAction(target: Combatant, skills: readonly SkillDefinition[]): ActionChoice {
    const { self } = this.ctx;
    const dist = chebyshev(self.position, target.position);

    if (this.retreating) {
      if (dist === 1) return { kind: "MOVE" };
      const skill = skillInReach(self, skills, "ATTACK", dist);
      return skill ? { kind: "RANGED_SKILL", skill } : { kind: "WAIT" };
    }

    if (dist === 1) {
      return self.hpRatio > BRAVE_ENOUGH_HP ? { kind: "MELEE_ATTACK" } : { kind: "MOVE" };
    }
    if (dist <= SKILL_REACH) {
      const skill = skillInReach(self, skills, "ATTACK", dist);
      if (skill) return { kind: "RANGED_SKILL", skill };
    }
    return { kind: "MOVE" };
  }

  evaluateBestMove(target: Combatant | null, reachable: readonly Cell[]): Cell | null {
    return pickBest(reachable, (cell) => {
      let score = hazardScore(cell, this.tuning.hazardAvoidance);
      if (!target) return score + 10;

      const d = chebyshev(cell, target.position);
      if (this.retreating) return score + d * 50 - 100;

      if (d === 1) score -= 50;
      else if (d <= SKILL_REACH) score += 40;
      else score -= 20;
      return score;
    });
  }
}
