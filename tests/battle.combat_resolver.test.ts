import { describe, it, expect } from "vitest";
import {
  calculateCritChance,
  calculateCritDefense,
  calculateHitChance,
  calculateParryChance,
  effectiveAttackPower,
  gatherAttackerStats,
  gatherDefenderStats,
  resolveAttack,
  type AttackerCombatStats,
  type DefenderCombatStats,
} from "../src/battle/domain/combatResolver";
import { resolveCombatConstants } from "../src/battle/domain/combatConstants";
import { roundHalfEven } from "../src/battle/domain/rounding";
import { getStatusEffectDefinition } from "../src/battle/domain/statusEffects";
import { ScriptedRandom, makeUnit } from "./_battleTestUtils";

function attacker(overrides: Partial<AttackerCombatStats> = {}): AttackerCombatStats {
  return { finesse: 5, luck: 0, hitModifier: 0, critModifier: 0, ...overrides };
}

function defender(overrides: Partial<DefenderCombatStats> = {}): DefenderCombatStats {
  return { finesse: 0, focus: 0, defensePower: 5, parryModifier: 0, critDefenseModifier: 0, ...overrides };
}

describe("combat chances", () => {
  it("hit chance adds finesse and clamps to [5, 95]", () => {
    expect(calculateHitChance(attacker({ finesse: 3 }), null)).toBe(93);
    expect(calculateHitChance(attacker({ finesse: 10 }), null)).toBe(95);
    expect(calculateHitChance(attacker({ finesse: 0, hitModifier: -100 }), null)).toBe(5);
  });

  it("hit chance includes the proficiency variance bonus", () => {
    expect(calculateHitChance(attacker({ finesse: 0 }), "ADVANCED")).toBe(95);
    expect(calculateHitChance(attacker({ finesse: 0 }), "TRAINED")).toBe(91);
  });

  it("parry, crit and crit defense follow their formulas and ranges", () => {
    expect(calculateParryChance(defender({ finesse: 10 }))).toBe(10);
    expect(calculateParryChance(defender({ finesse: 100 }))).toBe(30);
    expect(calculateCritChance(attacker({ luck: 10 }))).toBe(10);
    expect(calculateCritChance(attacker({ luck: 200 }))).toBe(50);
    expect(calculateCritDefense(defender({ focus: 10 }))).toBe(15);
    expect(calculateCritDefense(defender({ focus: 0, critDefenseModifier: -30 }))).toBe(0);
  });

  it("honours constant overrides", () => {
    const c = resolveCombatConstants({ baseHitChance: 50 });
    expect(calculateHitChance(attacker({ finesse: 0 }), null, c)).toBe(50);
    expect(c.baseParryChance).toBe(5);
  });
});

describe("resolveAttack", () => {
  it("lands a critical hit: round(20 x 1.5) - 5 = 25", () => {
    const random = new ScriptedRandom([0.1, 0.5, 0.01, 0.99]);
    const result = resolveAttack({ attacker: attacker(), target: defender(), baseDamage: 20, random });

    expect(result).toEqual({
      hit: true,
      parried: false,
      criticalHit: true,
      criticalDefended: false,
      finalDamage: 25,
    });
    expect(random.draws).toBe(4);
  });

  it("rounds an exact half of crit damage to the even integer", () => {
    const odd = resolveAttack({
      attacker: attacker(),
      target: defender({ defensePower: 0 }),
      baseDamage: 3,
      random: new ScriptedRandom([0.1, 0.5, 0.01, 0.99]),
    });
    const even = resolveAttack({
      attacker: attacker(),
      target: defender({ defensePower: 0 }),
      baseDamage: 5,
      random: new ScriptedRandom([0.1, 0.5, 0.01, 0.99]),
    });

    expect(odd.finalDamage).toBe(4);
    expect(even.finalDamage).toBe(8);
  });

  it("stops after the hit draw on a miss", () => {
    const random = new ScriptedRandom([0.96, 0.5, 0.5, 0.5]);
    const result = resolveAttack({ attacker: attacker(), target: defender(), baseDamage: 20, random });

    expect(result.hit).toBe(false);
    expect(result.finalDamage).toBe(0);
    expect(random.draws).toBe(1);
  });

  it("stops after the parry draw when parried", () => {
    const random = new ScriptedRandom([0.1, 0.04, 0.5, 0.5]);
    const result = resolveAttack({ attacker: attacker(), target: defender(), baseDamage: 20, random });

    expect(result).toEqual({
      hit: true,
      parried: true,
      criticalHit: false,
      criticalDefended: false,
      finalDamage: 0,
    });
    expect(random.draws).toBe(2);
  });

  it("a defended critical deals normal damage", () => {
    const random = new ScriptedRandom([0.1, 0.5, 0.01, 0.05]);
    const result = resolveAttack({ attacker: attacker(), target: defender(), baseDamage: 20, random });

    expect(result.criticalHit).toBe(true);
    expect(result.criticalDefended).toBe(true);
    expect(result.finalDamage).toBe(15);
  });

  it("never deals less than the minimum damage on a hit", () => {
    const random = new ScriptedRandom([0.1, 0.5, 0.9, 0.9]);
    const result = resolveAttack({
      attacker: attacker(),
      target: defender({ defensePower: 10 }),
      baseDamage: 3,
      random,
    });
    expect(result.finalDamage).toBe(1);
  });

  it("a draw equal to the hit chance still hits", () => {
    const random = new ScriptedRandom([0.9, 0.5, 0.9, 0.9]);
    const result = resolveAttack({
      attacker: attacker({ finesse: 0 }),
      target: defender(),
      baseDamage: 10,
      random,
    });
    expect(result.hit).toBe(true);
    expect(result.finalDamage).toBe(5);
  });

  it("proficiency turns a borderline miss into a hit", () => {
    const familiar = resolveAttack({
      attacker: attacker({ finesse: 0 }),
      target: defender(),
      baseDamage: 10,
      proficiencyTier: "FAMILIAR",
      random: new ScriptedRandom([0.93]),
    });
    expect(familiar.hit).toBe(false);

    const advanced = resolveAttack({
      attacker: attacker({ finesse: 0 }),
      target: defender(),
      baseDamage: 10,
      proficiencyTier: "ADVANCED",
      random: new ScriptedRandom([0.93, 0.5, 0.9, 0.9]),
    });
    expect(advanced.hit).toBe(true);
  });
});

describe("stat gathering", () => {
  it("scales attack power, finesse and luck by the weapon proficiency", () => {
    const unit = makeUnit("a", "player", {
      weaponFamily: "SWORD",
      proficiency: { SWORD: "MASTER" },
      stats: { attackPower: 20, finesse: 10, luck: 4 },
    });

    expect(effectiveAttackPower(unit)).toBe(26);
    const stats = gatherAttackerStats(unit);
    expect(stats.finesse).toBe(13);
    expect(stats.luck).toBeCloseTo(5.2);
  });

  it("an untrained weapon halves attack power; unknown families read as FAMILIAR", () => {
    const unit = makeUnit("a", "player", { weaponFamily: "AXE", proficiency: { AXE: 0 }, stats: { attackPower: 20 } });
    expect(effectiveAttackPower(unit)).toBe(10);
    expect(effectiveAttackPower(unit, "BOW")).toBe(20);
  });

  it("folds status effect modifiers into both sides", () => {
    const haste = getStatusEffectDefinition("HASTE");
    const shield = getStatusEffectDefinition("SHIELD");
    if (!haste || !shield) throw new Error("effect library missing entries");

    const a = makeUnit("a", "player");
    a.statusEffects.apply(haste, 2);
    const d = makeUnit("d", "enemy", { stats: { finesse: 4, focus: 6, defensePower: 3 } });
    d.statusEffects.apply(shield, 2);

    expect(gatherAttackerStats(a).hitModifier).toBe(5);
    expect(gatherDefenderStats(d)).toEqual({
      finesse: 4,
      focus: 6,
      defensePower: 3,
      parryModifier: 10,
      critDefenseModifier: 10,
    });
  });
});

describe("roundHalfEven", () => {
  it("sends exact halves to the even neighbour and everything else to the nearest", () => {
    expect(roundHalfEven(4.5)).toBe(4);
    expect(roundHalfEven(5.5)).toBe(6);
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(-0.5)).toBe(0);
    expect(roundHalfEven(7)).toBe(7);
  });
});
