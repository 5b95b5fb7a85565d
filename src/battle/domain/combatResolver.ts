import type { RandomSource } from "../ports/randomSourcePort";
import type { Combatant } from "./combatant";
import {
  CRIT_CHANCE_RANGE,
  CRIT_DEFENSE_RANGE,
  DEFAULT_COMBAT_CONSTANTS,
  HIT_CHANCE_RANGE,
  PARRY_CHANCE_RANGE,
  type CombatConstants,
} from "./combatConstants";
import { getHitVarianceBonus, getStatMultiplier, type ProficiencyTier } from "./proficiency";
import { roundHalfEven } from "./rounding";
import type { CombatResolutionResult, WeaponFamily } from "./types";

export interface AttackerCombatStats {
  finesse: number;
  luck: number;
  hitModifier: number;
  critModifier: number;
}

export interface DefenderCombatStats {
  finesse: number;
  focus: number;
  defensePower: number;
  parryModifier: number;
  critDefenseModifier: number;
}

export interface ResolveAttackParams {
  attacker: AttackerCombatStats;
  target: DefenderCombatStats;
  baseDamage: number;
  proficiencyTier?: ProficiencyTier | number | null;
  random: RandomSource;
  constants?: CombatConstants;
}

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, value));
}

function roll(random: RandomSource): number {
  return random.next() * 100;
}

export function calculateHitChance(
  attacker: AttackerCombatStats,
  proficiencyTier: ProficiencyTier | number | null | undefined,
  c: CombatConstants = DEFAULT_COMBAT_CONSTANTS
): number {
  const variance = proficiencyTier == null ? 0 : getHitVarianceBonus(proficiencyTier);
  return clamp(
    c.baseHitChance + attacker.finesse * c.finesseHitChancePerPoint + attacker.hitModifier + variance,
    HIT_CHANCE_RANGE
  );
}

export function calculateParryChance(target: DefenderCombatStats, c: CombatConstants = DEFAULT_COMBAT_CONSTANTS): number {
  return clamp(c.baseParryChance + target.finesse * c.finesseParryChancePerPoint + target.parryModifier, PARRY_CHANCE_RANGE);
}

export function calculateCritChance(attacker: AttackerCombatStats, c: CombatConstants = DEFAULT_COMBAT_CONSTANTS): number {
  return clamp(c.baseCritChance + attacker.luck * c.luckCritChancePerPoint + attacker.critModifier, CRIT_CHANCE_RANGE);
}

export function calculateCritDefense(target: DefenderCombatStats, c: CombatConstants = DEFAULT_COMBAT_CONSTANTS): number {
  return clamp(
    c.baseCritDefense + target.focus * c.focusCritDefensePerPoint + target.critDefenseModifier,
    CRIT_DEFENSE_RANGE
  );
}

/**
 * One attack. Draws happen in a fixed order (hit, parry, crit, crit defense)
 * and stop at the first one that ends the attack.
 */
export function resolveAttack(params: ResolveAttackParams): CombatResolutionResult {
  const { attacker, target, baseDamage, proficiencyTier, random } = params;
  const c = params.constants ?? DEFAULT_COMBAT_CONSTANTS;

  const result: CombatResolutionResult = {
    hit: false,
    parried: false,
    criticalHit: false,
    criticalDefended: false,
    finalDamage: 0,
  };

  if (roll(random) > calculateHitChance(attacker, proficiencyTier, c)) {
    return result;
  }
  result.hit = true;

  if (roll(random) <= calculateParryChance(target, c)) {
    result.parried = true;
    return result;
  }

  result.criticalHit = roll(random) <= calculateCritChance(attacker, c);
  result.criticalDefended = roll(random) <= calculateCritDefense(target, c);

  let damage = baseDamage;
  if (result.criticalHit && !result.criticalDefended) {
    damage = roundHalfEven(damage * c.criticalHitMultiplier);
  }
  result.finalDamage = Math.max(c.minimumDamage, damage - target.defensePower);

  return result;
}

// ---- stat gathering ----

export function gatherAttackerStats(unit: Combatant, family: WeaponFamily = unit.weaponFamily): AttackerCombatStats {
  const efficiency = getStatMultiplier(unit.proficiencyWith(family));
  const mods = unit.statusEffects.modifiers();
  return {
    finesse: unit.stats.finesse * efficiency,
    luck: unit.stats.luck * efficiency,
    hitModifier: mods.hitChance,
    critModifier: mods.critChance,
  };
}

export function gatherDefenderStats(unit: Combatant): DefenderCombatStats {
  const mods = unit.statusEffects.modifiers();
  return {
    finesse: unit.stats.finesse,
    focus: unit.stats.focus,
    defensePower: unit.stats.defensePower,
    parryModifier: mods.parryChance,
    critDefenseModifier: mods.critDefense,
  };
}

/** Attack power after the proficiency multiplier, rounded half to even. */
export function effectiveAttackPower(unit: Combatant, family: WeaponFamily = unit.weaponFamily): number {
  return roundHalfEven(unit.stats.attackPower * getStatMultiplier(unit.proficiencyWith(family)));
}
