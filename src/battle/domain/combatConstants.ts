export interface CombatConstants {
  baseHitChance: number;
  finesseHitChancePerPoint: number;
  baseParryChance: number;
  finesseParryChancePerPoint: number;
  baseCritChance: number;
  luckCritChancePerPoint: number;
  baseCritDefense: number;
  focusCritDefensePerPoint: number;
  criticalHitMultiplier: number;
  minimumDamage: number;
}

export const DEFAULT_COMBAT_CONSTANTS: Readonly<CombatConstants> = Object.freeze({
  baseHitChance: 90,
  finesseHitChancePerPoint: 1,
  baseParryChance: 5,
  finesseParryChancePerPoint: 0.5,
  baseCritChance: 5,
  luckCritChancePerPoint: 0.5,
  baseCritDefense: 10,
  focusCritDefensePerPoint: 0.5,
  criticalHitMultiplier: 1.5,
  minimumDamage: 1,
});

export const HIT_CHANCE_RANGE = { min: 5, max: 95 } as const;
export const PARRY_CHANCE_RANGE = { min: 0, max: 30 } as const;
export const CRIT_CHANCE_RANGE = { min: 0, max: 50 } as const;
export const CRIT_DEFENSE_RANGE = { min: 0, max: 50 } as const;

export function resolveCombatConstants(overrides?: Partial<CombatConstants>): CombatConstants {
  return { ...DEFAULT_COMBAT_CONSTANTS, ...(overrides ?? {}) };
}
