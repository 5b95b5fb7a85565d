import { describe, it, expect } from "vitest";
import {
  BerserkerBehavior,
  CowardBehavior,
  ProtectorBehavior,
  SupportBehavior,
  createBehavior,
  type BehaviorContext,
} from "../src/battle/ai/behaviors";
import type { Combatant } from "../src/battle/domain/combatant";
import { FactionRelationshipResolver } from "../src/battle/domain/factionRelations";
import { getSkillDefinition } from "../src/battle/domain/skills";
import type { SkillDefinition } from "../src/battle/domain/types";
import { ScriptedRandom, cell, makeUnit, silentLog } from "./_battleTestUtils";

function ctx(self: Combatant, random = new ScriptedRandom()): BehaviorContext {
  return { self, factions: new FactionRelationshipResolver(silentLog), random };
}

function skill(id: string): SkillDefinition {
  const s = getSkillDefinition(id);
  if (!s) throw new Error(`missing skill ${id}`);
  return s;
}

describe("BerserkerBehavior", () => {
  it("prefers the weakened enemy over the closer healthy one", () => {
    const self = makeUnit("b", "enemy", { position: { x: 0, y: 0 } });
    const healthy = makeUnit("healthy", "player", { position: { x: 1, y: 0 } });
    const weak = makeUnit("weak", "player", { hp: 20, position: { x: 3, y: 0 } });

    const target = new BerserkerBehavior(ctx(self)).chooseTarget([self, healthy, weak]);
    expect(target?.id).toBe("weak");
  });

  it("ignores allies and the dead", () => {
    const self = makeUnit("b", "enemy");
    const ally = makeUnit("ally", "enemy", { hp: 1 });
    const dead = makeUnit("dead", "player", { hp: 0 });
    expect(new BerserkerBehavior(ctx(self)).chooseTarget([self, ally, dead])).toBeNull();
  });

  it("moves when not adjacent and rolls for a skill when it is", () => {
    const self = makeUnit("b", "enemy", { position: { x: 0, y: 0 } });
    const far = makeUnit("far", "player", { position: { x: 3, y: 0 } });
    const near = makeUnit("near", "player", { position: { x: 1, y: 1 } });
    const strike = skill("power_strike");

    expect(new BerserkerBehavior(ctx(self)).chooseAction(far, [strike])).toEqual({ kind: "MOVE" });
    expect(new BerserkerBehavior(ctx(self, new ScriptedRandom([0.1]))).chooseAction(near, [strike])).toEqual({
      kind: "RANGED_SKILL",
      skill: strike,
    });
    expect(new BerserkerBehavior(ctx(self, new ScriptedRandom([0.9]))).chooseAction(near, [strike])).toEqual({
      kind: "MELEE_ATTACK",
    });
  });

  it("swings in melee rather than using a ranged skill at point-blank range", () => {
    const self = makeUnit("b", "enemy", { position: { x: 0, y: 0 } });
    const near = makeUnit("near", "player", { position: { x: 1, y: 0 } });
    const random = new ScriptedRandom([0.1]);

    expect(new BerserkerBehavior(ctx(self, random)).chooseAction(near, [skill("arrow_shot")])).toEqual({
      kind: "MELEE_ATTACK",
    });
    expect(random.draws).toBe(0);
  });

  it("picks the adjacent cell that avoids a hazard", () => {
    const self = makeUnit("b", "enemy", { position: { x: 0, y: 0 } });
    const target = makeUnit("t", "player", { position: { x: 3, y: 0 } });
    const best = new BerserkerBehavior(ctx(self)).evaluateBestMove(target, [cell(1, 0), cell(2, 0, true), cell(2, 1)]);
    expect(best).toMatchObject({ x: 2, y: 1 });
  });
});

describe("SupportBehavior", () => {
  it("targets the most wounded ally when it decides to support", () => {
    const self = makeUnit("s", "enemy", { unitType: "MAGI" });
    const a = makeUnit("a", "enemy", { hp: 50 });
    const b = makeUnit("b", "enemy", { hp: 70 });
    const foe = makeUnit("foe", "player");

    expect(new SupportBehavior(ctx(self, new ScriptedRandom([0.1]))).chooseTarget([self, b, a, foe])?.id).toBe("a");
    expect(new SupportBehavior(ctx(self, new ScriptedRandom([0.9]))).chooseTarget([self, b, a, foe])?.id).toBe("foe");
  });

  it("heals an ally in reach and waits otherwise", () => {
    const self = makeUnit("s", "enemy", { unitType: "MAGI", position: { x: 0, y: 0 } });
    const near = makeUnit("near", "enemy", { hp: 50, position: { x: 2, y: 0 } });
    const away = makeUnit("away", "enemy", { hp: 50, position: { x: 6, y: 0 } });
    const mend = skill("mend");
    const behavior = new SupportBehavior(ctx(self));

    expect(behavior.chooseAction(near, [mend])).toEqual({ kind: "SUPPORT", skill: mend });
    expect(behavior.chooseAction(away, [mend])).toEqual({ kind: "WAIT" });
  });

  it("keeps its distance from an enemy", () => {
    const self = makeUnit("s", "enemy", { position: { x: 0, y: 0 } });
    const foe = makeUnit("foe", "player", { position: { x: 4, y: 0 } });
    const best = new SupportBehavior(ctx(self)).evaluateBestMove(foe, [cell(0, 0), cell(1, 0), cell(3, 0)]);
    expect(best).toMatchObject({ x: 1, y: 0 });
  });
});

describe("CowardBehavior", () => {
  it("fights while healthy and runs when hurt", () => {
    const brave = makeUnit("c", "enemy", { position: { x: 0, y: 0 } });
    const scared = makeUnit("c2", "enemy", { hp: 20, position: { x: 0, y: 0 } });
    const foe = makeUnit("foe", "player", { position: { x: 1, y: 0 } });

    expect(new CowardBehavior(ctx(brave)).chooseAction(foe, [])).toEqual({ kind: "MELEE_ATTACK" });

    const running = new CowardBehavior(ctx(scared));
    expect(running.retreating).toBe(true);
    expect(running.chooseAction(foe, [])).toEqual({ kind: "MOVE" });
    expect(running.evaluateBestMove(foe, [cell(0, 0), cell(0, 2)])).toMatchObject({ x: 0, y: 2 });
  });

  it("shoots from range when it has a skill", () => {
    const self = makeUnit("c", "enemy", { position: { x: 0, y: 0 } });
    const foe = makeUnit("foe", "player", { position: { x: 3, y: 0 } });
    const arrow = skill("arrow_shot");
    expect(new CowardBehavior(ctx(self)).chooseAction(foe, [arrow])).toEqual({ kind: "RANGED_SKILL", skill: arrow });
  });
});

describe("ProtectorBehavior", () => {
  it("engages the enemy threatening a wounded ally", () => {
    const self = makeUnit("g", "enemy", { position: { x: 1, y: 0 } });
    const ward = makeUnit("ward", "enemy", { hp: 40, position: { x: 5, y: 5 } });
    const threat = makeUnit("threat", "player", { position: { x: 5, y: 6 } });
    const bystander = makeUnit("bystander", "player", { position: { x: 0, y: 0 } });

    const target = new ProtectorBehavior(ctx(self)).chooseTarget([self, ward, threat, bystander]);
    expect(target?.id).toBe("threat");
  });

  it("falls back to the nearest enemy when nobody is in danger", () => {
    const self = makeUnit("g", "enemy", { position: { x: 0, y: 0 } });
    const ally = makeUnit("ally", "enemy", { position: { x: 9, y: 9 } });
    const near = makeUnit("near", "player", { position: { x: 3, y: 0 } });
    const far = makeUnit("far", "player", { position: { x: 6, y: 0 } });

    expect(new ProtectorBehavior(ctx(self)).chooseTarget([self, ally, near, far])?.id).toBe("near");
  });

  it("uses only melee skills on an adjacent enemy", () => {
    const self = makeUnit("g", "enemy", { position: { x: 0, y: 0 } });
    const foe = makeUnit("foe", "player", { position: { x: 0, y: 1 } });
    const bash = skill("shield_bash");
    const arrow = skill("arrow_shot");

    expect(new ProtectorBehavior(ctx(self, new ScriptedRandom([0.1]))).chooseAction(foe, [arrow, bash])).toEqual({
      kind: "RANGED_SKILL",
      skill: bash,
    });
    expect(new ProtectorBehavior(ctx(self, new ScriptedRandom([0.1]))).chooseAction(foe, [arrow])).toEqual({
      kind: "MELEE_ATTACK",
    });
  });
});

describe("createBehavior", () => {
  it("builds the configured behavior and keeps defaults for unset tuning", () => {
    const self = makeUnit("x", "enemy");
    expect(createBehavior({ kind: "COWARD" }, ctx(self)).kind).toBe("COWARD");

    const berserker = new BerserkerBehavior(ctx(self), { lowHpWeight: undefined, aggression: 1 });
    expect(berserker.tuning.lowHpWeight).toBe(0.5);
    expect(berserker.tuning.aggression).toBe(1);
  });
});
