import pino, { type Logger } from "pino";
import { env } from "../config/env";

export type { Logger };

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "battle-core" },
});

export function moduleLogger(parent: Logger, module: string, bindings: Record<string, unknown> = {}): Logger {
  return parent.child({ module, ...bindings });
}
