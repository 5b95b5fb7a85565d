import type { BehaviorConfig } from "../ai/behaviors/behaviorConfig";
import {
  WeaponProficiencyProgress,
  normalizeTier,
  type ProficiencyOutcome,
  type ProficiencyTier,
} from "./proficiency";
import { roundHalfEven } from "./rounding";
import { StatusEffectSet, type EffectTarget, type EffectTick } from "./statusEffects";
import type {
  CombatantId,
  CombatStats,
  FactionId,
  Point,
  SkillDefinition,
  UnitType,
  WeaponFamily,
} from "./types";

export interface CombatantInit {
  id: CombatantId;
  name?: string;
  factionId: FactionId;
  unitType?: UnitType;
  position: Point;
  stats: CombatStats;
  /** defaults to maxHp */
  hp?: number;
  weaponFamily?: WeaponFamily;
  proficiency?: Partial<Record<WeaponFamily, ProficiencyTier | number>>;
  behavior?: BehaviorConfig;
  skills?: SkillDefinition[];
}

export interface TurnFlags {
  actionsPrevented: boolean;
  movementPrevented: boolean;
}

export class Combatant implements EffectTarget {
  readonly id: CombatantId;
  readonly name: string;
  factionId: FactionId;
  readonly unitType: UnitType;
  position: Point;
  readonly stats: CombatStats;
  readonly weaponFamily: WeaponFamily;
  readonly behavior: BehaviorConfig | null;
  readonly skills: SkillDefinition[];
  readonly statusEffects = new StatusEffectSet();

  movementRemaining = 0;
  hasActed = false;
  /** false once the unit leaves the battle (unregistered) */
  active = true;

  private currentHp: number;
  private readonly proficiency = new Map<WeaponFamily, WeaponProficiencyProgress>();
  private turnFlags: TurnFlags = { actionsPrevented: false, movementPrevented: false };

  constructor(init: CombatantInit) {
    this.id = init.id;
    this.name = init.name ?? init.id;
    this.factionId = init.factionId;
    this.unitType = init.unitType ?? "SOLDIER";
    this.position = { ...init.position };
    this.stats = { ...init.stats };
    this.weaponFamily = init.weaponFamily ?? "UNARMED";
    this.behavior = init.behavior ?? null;
    this.skills = init.skills ?? [];
    this.currentHp = clamp(init.hp ?? init.stats.maxHp, 0, init.stats.maxHp);

    for (const [family, tier] of Object.entries(init.proficiency ?? {})) {
      if (isWeaponFamily(family) && tier !== undefined) {
        this.proficiency.set(family, new WeaponProficiencyProgress(normalizeTier(tier)));
      }
    }
  }

  get hp(): number {
    return this.currentHp;
  }

  get hpRatio(): number {
    return this.stats.maxHp > 0 ? this.currentHp / this.stats.maxHp : 0;
  }

  isAlive(): boolean {
    return this.currentHp > 0;
  }

  /** Returns the HP actually lost. */
  takeDamage(amount: number): number {
    if (amount <= 0 || !this.isAlive()) return 0;
    const before = this.currentHp;
    this.currentHp = clamp(this.currentHp - roundHalfEven(amount), 0, this.stats.maxHp);
    return before - this.currentHp;
  }

  /** Returns the HP actually restored. Dead units cannot be healed. */
  heal(amount: number): number {
    if (amount <= 0 || !this.isAlive()) return 0;
    const before = this.currentHp;
    this.currentHp = clamp(this.currentHp + roundHalfEven(amount), 0, this.stats.maxHp);
    return this.currentHp - before;
  }

  proficiencyWith(family: WeaponFamily = this.weaponFamily): ProficiencyTier {
    return this.proficiency.get(family)?.tier ?? "FAMILIAR";
  }

  /** Counts one meaningful exchange with the family; returns the tier change, if any. */
  recordProficiencyOutcome(
    family: WeaponFamily,
    outcome: ProficiencyOutcome
  ): { from: ProficiencyTier; to: ProficiencyTier } | null {
    let progress = this.proficiency.get(family);
    if (!progress) {
      progress = new WeaponProficiencyProgress("FAMILIAR");
      this.proficiency.set(family, progress);
    }
    const from = progress.tier;
    const to = progress.record(outcome);
    return to ? { from, to } : null;
  }

  /**
   * Turn-start bookkeeping: flags are captured before effects tick, so an effect
   * that expires on this tick still holds the unit for this turn.
   */
  beginTurn(): EffectTick[] {
    this.hasActed = false;
    this.turnFlags = {
      actionsPrevented: this.statusEffects.preventsActions(),
      movementPrevented: this.statusEffects.preventsMovement(),
    };
    const ticks = this.statusEffects.tickTurnStart(this);
    this.movementRemaining = this.turnFlags.movementPrevented || this.statusEffects.preventsMovement()
      ? 0
      : Math.max(0, Math.floor(this.stats.movement * this.statusEffects.movementMultiplier()));
    return ticks;
  }

  canAct(): boolean {
    return this.isAlive() && this.active && !this.turnFlags.actionsPrevented && !this.statusEffects.preventsActions();
  }

  canMove(): boolean {
    return this.isAlive() && this.active && !this.turnFlags.movementPrevented && !this.statusEffects.preventsMovement();
  }

  canUseSkill(skill: SkillDefinition): boolean {
    return !skill.suitableFor || skill.suitableFor.length === 0 || skill.suitableFor.includes(this.unitType);
  }
}

const WEAPON_FAMILIES: readonly WeaponFamily[] = ["SWORD", "AXE", "SPEAR", "DAGGER", "BOW", "STAFF", "UNARMED"];

export function isWeaponFamily(value: unknown): value is WeaponFamily {
  return typeof value === "string" && WEAPON_FAMILIES.some((f) => f === value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
