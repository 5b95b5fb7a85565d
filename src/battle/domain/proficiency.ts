import advancementTable from "../data/proficiency-advancement.json";
import tierTable from "../data/proficiency-tiers.json";
import type { CombatStats } from "./types";

export const PROFICIENCY_TIERS = [
  "UNTRAINED",
  "FAMILIAR",
  "TRAINED",
  "COMPETENT",
  "PROFICIENT",
  "ADVANCED",
  "EXPERT",
  "MASTER",
  "GRANDMASTER",
  "LEGENDARY",
] as const;

export type ProficiencyTier = (typeof PROFICIENCY_TIERS)[number];

export interface ProficiencyModifiers {
  /** scales attacker finesse, luck and attack power before combat math */
  statMultiplier: number;
  /** added to hit chance */
  hitVarianceBonus: number;
  /** not consumed by the resolver yet */
  fumbleReduction: number;
  recoveryBonus: number;
  staminaBonus: number;
}

/** Counters a tier needs before the next one; every field must be met. */
export interface AdvancementThreshold {
  hits: number;
  /** hits + kills */
  outcomes: number;
  crits: number;
}

const TABLE: Record<ProficiencyTier, ProficiencyModifiers> = tierTable;
const ADVANCEMENT: Partial<Record<ProficiencyTier, AdvancementThreshold>> = advancementTable;

export function isProficiencyTier(value: unknown): value is ProficiencyTier {
  return typeof value === "string" && PROFICIENCY_TIERS.some((t) => t === value);
}

/** Accepts a tier name or its ordinal (0 = UNTRAINED). Anything else reads as FAMILIAR. */
export function normalizeTier(tier: ProficiencyTier | number | null | undefined): ProficiencyTier {
  if (typeof tier === "number") {
    return Number.isInteger(tier) && tier >= 0 && tier < PROFICIENCY_TIERS.length
      ? PROFICIENCY_TIERS[tier]
      : "FAMILIAR";
  }
  return isProficiencyTier(tier) ? tier : "FAMILIAR";
}

export function tierOrdinal(tier: ProficiencyTier): number {
  return PROFICIENCY_TIERS.indexOf(tier);
}

export function getProficiencyModifiers(tier: ProficiencyTier | number | null | undefined): ProficiencyModifiers {
  return TABLE[normalizeTier(tier)];
}

export function getStatMultiplier(tier: ProficiencyTier | number | null | undefined): number {
  return getProficiencyModifiers(tier).statMultiplier;
}

export function getHitVarianceBonus(tier: ProficiencyTier | number | null | undefined): number {
  return getProficiencyModifiers(tier).hitVarianceBonus;
}

export function getFumbleReduction(tier: ProficiencyTier | number | null | undefined): number {
  return getProficiencyModifiers(tier).fumbleReduction;
}

export function getRecoveryBonus(tier: ProficiencyTier | number | null | undefined): number {
  return getProficiencyModifiers(tier).recoveryBonus;
}

export function getStaminaBonus(tier: ProficiencyTier | number | null | undefined): number {
  return getProficiencyModifiers(tier).staminaBonus;
}

export function nextTier(tier: ProficiencyTier): ProficiencyTier | null {
  const i = tierOrdinal(tier);
  return i + 1 < PROFICIENCY_TIERS.length ? PROFICIENCY_TIERS[i + 1] : null;
}

/** null at the top tier */
export function getAdvancementThreshold(tier: ProficiencyTier): AdvancementThreshold | null {
  return ADVANCEMENT[tier] ?? null;
}

// ---- progression ----

export interface ProficiencyOutcome {
  hit: boolean;
  kill: boolean;
  crit: boolean;
}

export const MEANINGFUL_ENCOUNTER = {
  /** targets below this share of the attacker's max HP never count */
  minHpRatio: 0.5,
  /** weak on both axes at once: attack below attackRatio and HP below hpRatio */
  weakAttackRatio: 0.6,
  weakHpRatio: 0.7,
} as const;

type EncounterStats = Pick<CombatStats, "maxHp" | "attackPower">;

/** Fights against much weaker targets do not train a weapon. */
export function isMeaningfulEncounter(attacker: EncounterStats, target: EncounterStats): boolean {
  if (target.maxHp < attacker.maxHp * MEANINGFUL_ENCOUNTER.minHpRatio) return false;
  const weakAttack = target.attackPower < attacker.attackPower * MEANINGFUL_ENCOUNTER.weakAttackRatio;
  const weakHp = target.maxHp < attacker.maxHp * MEANINGFUL_ENCOUNTER.weakHpRatio;
  return !(weakAttack && weakHp);
}

/**
 * Lifetime counters for one weapon family. Counters never reset, and a single
 * outcome advances at most one tier.
 */
export class WeaponProficiencyProgress {
  hits = 0;
  kills = 0;
  crits = 0;

  constructor(public tier: ProficiencyTier) {}

  get outcomes(): number {
    return this.hits + this.kills;
  }

  /** Returns the new tier when this outcome advanced it. */
  record(outcome: ProficiencyOutcome): ProficiencyTier | null {
    if (outcome.hit) this.hits += 1;
    if (outcome.kill) this.kills += 1;
    if (outcome.crit) this.crits += 1;

    const threshold = getAdvancementThreshold(this.tier);
    const next = nextTier(this.tier);
    if (!threshold || !next) return null;
    if (this.hits < threshold.hits || this.outcomes < threshold.outcomes || this.crits < threshold.crits) {
      return null;
    }
    this.tier = next;
    return next;
  }
}
