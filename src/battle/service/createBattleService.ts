import { createRepositoryFromEnv } from "../db/repoFactory";
import type { BattleRepository } from "../db/repository";
import { BattleService, type BattleServiceOptions } from "./battle.service";

export function createBattleService(
  options?: BattleServiceOptions & { repo?: BattleRepository }
): { battles: BattleService; close?: () => Promise<void> } {
  if (options?.repo) {
    return { battles: new BattleService(options.repo, options) };
  }

  const { repo, close } = createRepositoryFromEnv();
  return { battles: new BattleService(repo, options), close };
}
