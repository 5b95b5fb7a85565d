import type { Combatant } from "../../domain/combatant";
import { chebyshev, manhattan } from "../../domain/geometry";
import type { SkillDefinition } from "../../domain/types";
import type { Cell } from "../../ports/gridPort";
import { SUPPORT_DEFAULTS, type SupportTuning } from "./behaviorConfig";
import {
  alliesOf,
  baseTargetScore,
  enemiesOf,
  hazardScore,
  isAdjacent,
  pickBest,
  skillInReach,
  type ActionChoice,
  type AiBehavior,
  type BehaviorContext,
} from "./scoring";

const SKILL_REACH = 3;

/** Heals wounded allies when it decides to; otherwise harasses from a distance. */
export class SupportBehavior implements AiBehavior {
  readonly kind = "SUPPORT";
  readonly tuning: SupportTuning;

  constructor(private readonly ctx: BehaviorContext, tuning: Partial<SupportTuning> = {}) {
    this.tuning = {
      supportPreference: tuning.supportPreference ?? SUPPORT_DEFAULTS.supportPreference,
      healThreshold: tuning.healThreshold ?? SUPPORT_DEFAULTS.healThreshold,
      hazardAvoidance: tuning.hazardAvoidance ?? SUPPORT_DEFAULTS.hazardAvoidance,
    };
  }

  chooseTarget(allUnits: readonly Combatant[]): Combatant | null {
    const { self, random } = this.ctx;

    if (random.next() < this.tuning.supportPreference) {
      const wounded = alliesOf(this.ctx, allUnits).filter((a) => a.hpRatio < this.tuning.healThreshold);
      const ally = pickBest(wounded, (a) => -a.hpRatio);
      if (ally) return ally;
    }

    return pickBest(enemiesOf(this.ctx, allUnits), (t) => {
      const dist = manhattan(self.position, t.position);
      return baseTargetScore(this.ctx, t) + (1 - t.hpRatio) * 150 + dist * 5;
    });
  }

  chooseAction(target: Combatant, skills: readonly SkillDefinition[]): ActionChoice {
    const { self, factions } = this.ctx;
    const dist = chebyshev(self.position, target.position);

    if (factions.isAlly(self.factionId, target.factionId)) {
      const heal = skillInReach(self, skills, "SUPPORT", dist);
      if (heal) return { kind: "SUPPORT", skill: heal };
      return { kind: "WAIT" };
    }

    if (dist === 1) return { kind: "MELEE_ATTACK" };
    if (dist <= SKILL_REACH) {
      const skill = skillInReach(self, skills, "ATTACK", dist);
      if (skill) return { kind: "RANGED_SKILL", skill };
    }
    return { kind: "MOVE" };
  }

  evaluateBestMove(target: Combatant | null, reachable: readonly Cell[]): Cell | null {
    const { self, factions } = this.ctx;
    const healing = target !== null && factions.isAlly(self.factionId, target.factionId);

    return pickBest(reachable, (cell) => {
      let score = hazardScore(cell, this.tuning.hazardAvoidance);
      if (!target) return score;

      const d = chebyshev(cell, target.position);
      if (healing) {
        score += d <= 2 ? 50 : -manhattan(cell, target.position) * 5;
      } else if (isAdjacent(cell, target.position)) {
        score -= 20;
      } else if (d <= SKILL_REACH) {
        score += 30;
      } else {
        score -= manhattan(cell, target.position) * 5;
      }
      return score;
    });
  }
}
