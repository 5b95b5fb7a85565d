import type { BehaviorConfig } from "./behaviorConfig";
import { BerserkerBehavior } from "./berserker";
import { CowardBehavior } from "./coward";
import { ProtectorBehavior } from "./protector";
import type { AiBehavior, BehaviorContext } from "./scoring";
import { SupportBehavior } from "./support";

export function createBehavior(config: BehaviorConfig, ctx: BehaviorContext): AiBehavior {
  switch (config.kind) {
    case "BERSERKER":
      return new BerserkerBehavior(ctx, config);
    case "SUPPORT":
      return new SupportBehavior(ctx, config);
    case "COWARD":
      return new CowardBehavior(ctx, config);
    case "PROTECTOR":
      return new ProtectorBehavior(ctx, config);
    default: {
      const _exhaustive: never = config;
      return _exhaustive;
    }
  }
}

export type { AiBehavior, ActionChoice, BehaviorContext } from "./scoring";
export type { BehaviorConfig, BehaviorKind } from "./behaviorConfig";
export { BerserkerBehavior, CowardBehavior, ProtectorBehavior, SupportBehavior };
