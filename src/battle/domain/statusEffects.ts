import effectLibrary from "../data/status-effects.json";

export interface StatusEffectDefinition {
  id: string;
  name: string;
  damagePerTurn?: number;
  healingPerTurn?: number;
  preventsActions?: boolean;
  preventsMovement?: boolean;
  /** 1 when missing */
  movementMultiplier?: number;
  hitChanceModifier?: number;
  critChanceModifier?: number;
  parryChanceModifier?: number;
  critDefenseModifier?: number;
}

export interface StatModifiers {
  hitChance: number;
  critChance: number;
  parryChance: number;
  critDefense: number;
}

export const NO_MODIFIERS: StatModifiers = { hitChance: 0, critChance: 0, parryChance: 0, critDefense: 0 };

/** What an effect needs from the unit it sits on. */
export interface EffectTarget {
  isAlive(): boolean;
  takeDamage(amount: number): number;
  heal(amount: number): number;
}

export interface EffectTick {
  effectId: string;
  damage: number;
  healing: number;
  remaining: number;
  expired: boolean;
}

export class StatusEffectInstance {
  private remainingTurns: number;

  constructor(public readonly definition: StatusEffectDefinition, duration: number) {
    this.remainingTurns = Math.max(0, Math.floor(duration));
  }

  get remaining(): number {
    return this.remainingTurns;
  }

  get expired(): boolean {
    return this.remainingTurns <= 0;
  }

  /** Apply, then count down. A duration of 1 fires once. */
  onTurnStart(unit: EffectTarget): EffectTick {
    if (this.expired || !unit.isAlive()) {
      return { effectId: this.definition.id, damage: 0, healing: 0, remaining: this.remainingTurns, expired: this.expired };
    }

    let damage = 0;
    let healing = 0;
    if (this.definition.damagePerTurn && this.definition.damagePerTurn > 0) {
      damage = unit.takeDamage(this.definition.damagePerTurn);
    }
    if (this.definition.healingPerTurn && this.definition.healingPerTurn > 0 && unit.isAlive()) {
      healing = unit.heal(this.definition.healingPerTurn);
    }

    this.remainingTurns -= 1;
    return { effectId: this.definition.id, damage, healing, remaining: this.remainingTurns, expired: this.expired };
  }

  refresh(duration: number): void {
    this.remainingTurns = Math.max(this.remainingTurns, Math.floor(duration));
  }
}

export type ApplyResult = "APPLIED" | "REFRESHED";

export class StatusEffectSet {
  private readonly instances: StatusEffectInstance[] = [];

  apply(definition: StatusEffectDefinition, duration: number): ApplyResult {
    const existing = this.instances.find((i) => i.definition.id === definition.id && !i.expired);
    if (existing) {
      existing.refresh(duration);
      return "REFRESHED";
    }
    this.instances.push(new StatusEffectInstance(definition, duration));
    return "APPLIED";
  }

  remove(effectId: string): boolean {
    const idx = this.instances.findIndex((i) => i.definition.id === effectId);
    if (idx === -1) return false;
    this.instances.splice(idx, 1);
    return true;
  }

  clear(): void {
    this.instances.length = 0;
  }

  has(effectId: string): boolean {
    return this.active().some((i) => i.definition.id === effectId);
  }

  active(): StatusEffectInstance[] {
    return this.instances.filter((i) => !i.expired);
  }

  tickTurnStart(unit: EffectTarget): EffectTick[] {
    const ticks = this.instances.map((i) => i.onTurnStart(unit));
    for (let i = this.instances.length - 1; i >= 0; i--) {
      if (this.instances[i].expired) this.instances.splice(i, 1);
    }
    return ticks;
  }

  preventsActions(): boolean {
    return this.active().some((i) => i.definition.preventsActions === true);
  }

  preventsMovement(): boolean {
    return this.active().some((i) => i.definition.preventsMovement === true);
  }

  movementMultiplier(): number {
    return this.active().reduce((acc, i) => acc * (i.definition.movementMultiplier ?? 1), 1);
  }

  modifiers(): StatModifiers {
    return this.active().reduce<StatModifiers>(
      (acc, i) => ({
        hitChance: acc.hitChance + (i.definition.hitChanceModifier ?? 0),
        critChance: acc.critChance + (i.definition.critChanceModifier ?? 0),
        parryChance: acc.parryChance + (i.definition.parryChanceModifier ?? 0),
        critDefense: acc.critDefense + (i.definition.critDefenseModifier ?? 0),
      }),
      { ...NO_MODIFIERS }
    );
  }
}

// ---- library ----

const LIBRARY = new Map<string, StatusEffectDefinition>(
  effectLibrary.map((d): [string, StatusEffectDefinition] => [d.id, d])
);

export function getStatusEffectDefinition(id: string): StatusEffectDefinition | null {
  return LIBRARY.get(id) ?? null;
}

export function listStatusEffectDefinitions(): StatusEffectDefinition[] {
  return [...LIBRARY.values()];
}
