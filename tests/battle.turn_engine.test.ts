import { describe, it, expect } from "vitest";
import { HazardField } from "../src/battle/adapters/hazards/hazardField";
import type { AiTurnDriver } from "../src/battle/ai/aiTurnDriver";
import type { Combatant } from "../src/battle/domain/combatant";
import { FactionRelationshipResolver } from "../src/battle/domain/factionRelations";
import { getStatusEffectDefinition } from "../src/battle/domain/statusEffects";
import type { EncounterConfig } from "../src/battle/domain/types";
import { BattleEventChannel } from "../src/battle/events/battleEvents";
import { TurnOrderEngine } from "../src/battle/engine/turnOrderEngine";
import { makeUnit, silentLog } from "./_battleTestUtils";

/** AI stand-in that ends every turn straight away. */
function finishingDriver(calls: string[]): AiTurnDriver {
  return {
    takeTurn: async (unit, turn) => {
      calls.push(unit.id);
      turn.complete();
    },
  };
}

function setup(opts: { driver?: AiTurnDriver; hazards?: HazardField } = {}) {
  const events = new BattleEventChannel(silentLog);
  const factions = new FactionRelationshipResolver(silentLog);
  const engine = new TurnOrderEngine({
    factions,
    events,
    log: silentLog,
    hazards: opts.hazards,
    ai: opts.driver,
  });
  return { engine, events };
}

const ids = (units: Combatant[]) => units.map((u) => u.id);

describe("TurnOrderEngine: order and windows", () => {
  it("sorts by speed, groups same-faction runs and wraps the round", async () => {
    const calls: string[] = [];
    const { engine, events } = setup({ driver: finishingDriver(calls) });

    const p1 = makeUnit("p1", "player", { stats: { speed: 12 } });
    const p2 = makeUnit("p2", "player", { stats: { speed: 10 } });
    const e1 = makeUnit("e1", "enemy", { stats: { speed: 8 } });
    const e2 = makeUnit("e2", "enemy", { stats: { speed: 8 } });
    const p3 = makeUnit("p3", "player", { stats: { speed: 4 } });

    engine.initialize([e1, p3, p2, e2, p1]);
    expect(ids(engine.getAllUnits())).toEqual(["p1", "p2", "e1", "e2", "p3"]);
    expect(ids(engine.getCurrentWindow())).toEqual(["p1", "p2"]);
    expect(engine.phase).toBe("WINDOW_ACTIVE");

    engine.endTurn(p2);
    expect(ids(engine.getCurrentWindow())).toEqual(["p1"]);

    engine.endTurn(p1);
    await engine.whenIdle();

    expect(calls).toEqual(["e1", "e2"]);
    expect(ids(engine.getCurrentWindow())).toEqual(["p3"]);
    expect(engine.round).toBe(1);

    engine.endTurn(p3);
    expect(engine.round).toBe(2);
    expect(ids(engine.getCurrentWindow())).toEqual(["p2", "p1"]);

    const ended = events.ofType("TURN_ENDED").map((e) => e.payload);
    expect(ended.map((p) => p.unit_id)).toEqual(["p2", "p1", "e1", "e2", "p3"]);
    expect(ended.every((p) => p.round === 1 && !p.forced)).toBe(true);
    expect(events.ofType("ROUND_STARTED").map((e) => e.payload.round)).toEqual([2]);
  });

  it("puts the player first on equal speed", () => {
    const { engine } = setup();
    engine.initialize([makeUnit("e", "enemy", { stats: { speed: 5 } }), makeUnit("p", "player", { stats: { speed: 5 } })]);
    expect(ids(engine.getAllUnits())).toEqual(["p", "e"]);
    expect(engine.getCurrentUnit()?.id).toBe("p");
  });

  it("skips dead units without splitting a window", () => {
    const { engine } = setup();
    engine.initialize([
      makeUnit("p1", "player", { stats: { speed: 10 } }),
      makeUnit("e1", "enemy", { hp: 0, stats: { speed: 9 } }),
      makeUnit("p2", "player", { stats: { speed: 8 } }),
      makeUnit("e2", "enemy", { stats: { speed: 1 } }),
    ]);
    expect(ids(engine.getCurrentWindow())).toEqual(["p1", "p2"]);
  });

  it("ignores endTurn for a unit outside the window", () => {
    const { engine, events } = setup();
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    const e1 = makeUnit("e1", "enemy", { stats: { speed: 5 } });
    engine.initialize([p1, e1]);

    engine.endTurn(e1);
    expect(events.ofType("TURN_ENDED")).toHaveLength(0);
    expect(engine.isUnitInCurrentWindow(p1)).toBe(true);
  });

  it("announces the window and the current unit", () => {
    const { engine, events } = setup();
    engine.initialize([makeUnit("p1", "player", { stats: { speed: 10 } }), makeUnit("e1", "enemy", { stats: { speed: 5 } })]);

    expect(events.list().map((e) => e.type)).toEqual(["BATTLE_STARTED", "TURN_WINDOW_CHANGED", "CURRENT_UNIT_CHANGED"]);
    expect(events.ofType("TURN_WINDOW_CHANGED")[0].payload).toEqual({ unit_ids: ["p1"], faction_id: "player", round: 1 });
    expect(engine.getState().current_unit_id).toBe("p1");
  });
});

describe("TurnOrderEngine: joining and leaving", () => {
  it("registers a unit among the units still due this round", () => {
    const { engine } = setup();
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    const e1 = makeUnit("e1", "enemy", { stats: { speed: 5 } });
    engine.initialize([p1, e1]);

    const p2 = makeUnit("p2", "player", { stats: { speed: 7 } });
    engine.registerUnit(p2);
    expect(ids(engine.getAllUnits())).toEqual(["p1", "p2", "e1"]);
    expect(ids(engine.getCurrentWindow())).toEqual(["p1"]);

    engine.endTurn(p1);
    expect(ids(engine.getCurrentWindow())).toEqual(["p2"]);
  });

  it("hands the window to the next unit when the head leaves", () => {
    const { engine, events } = setup();
    const p1 = makeUnit("p1", "player", { stats: { speed: 12 } });
    const p2 = makeUnit("p2", "player", { stats: { speed: 10 } });
    engine.initialize([p1, p2, makeUnit("e1", "enemy", { stats: { speed: 5 } })]);

    engine.unregisterUnit(p1);
    expect(p1.active).toBe(false);
    expect(ids(engine.getCurrentWindow())).toEqual(["p2"]);
    expect(ids(engine.getAllUnits())).toEqual(["p2", "e1"]);
    expect(events.ofType("CURRENT_UNIT_CHANGED").at(-1)?.payload.unit_id).toBe("p2");
  });
});

describe("TurnOrderEngine: victory", () => {
  it("ends combat once when the last hostile unit dies", () => {
    const { engine, events } = setup();
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    const e1 = makeUnit("e1", "enemy", { stats: { speed: 5 } });
    engine.initialize([p1, e1]);

    e1.takeDamage(999);
    events.publish({ type: "UNIT_DIED", payload: { unit_id: "e1" } });

    expect(engine.phase).toBe("COMBAT_OVER");
    expect(engine.combatOutcome).toEqual({ over: true, playerVictory: true });
    expect(engine.isCombatOver()).toBe(true);
    expect(events.ofType("COMBAT_ENDED").map((e) => e.payload)).toEqual([{ player_victory: true, round: 1 }]);

    engine.endTurn(p1);
    expect(events.ofType("TURN_ENDED")).toHaveLength(0);
  });

  it("is a defeat when every player unit is down", () => {
    const { engine, events } = setup();
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    engine.initialize([p1, makeUnit("e1", "enemy", { stats: { speed: 5 } })]);

    p1.takeDamage(999);
    events.publish({ type: "UNIT_DIED", payload: { unit_id: "p1" } });

    expect(engine.combatOutcome).toEqual({ over: true, playerVictory: false });
    expect(engine.getCurrentWindow()).toEqual([]);
  });

  it("wins a survival encounter once the round count is passed", async () => {
    const { engine } = setup({ driver: finishingDriver([]) });
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    const encounter: EncounterConfig = { victory: { type: "SURVIVE_ROUNDS", rounds: 1 } };
    engine.initialize([p1, makeUnit("e1", "enemy", { stats: { speed: 5 } })], encounter);

    engine.endTurn(p1);
    await engine.whenIdle();

    expect(engine.round).toBe(2);
    expect(engine.combatOutcome).toEqual({ over: true, playerVictory: true });
  });

  it("loses when the round limit passes without a win", async () => {
    const { engine } = setup({ driver: finishingDriver([]) });
    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    engine.initialize([p1, makeUnit("e1", "enemy", { stats: { speed: 5 } })], {
      victory: { type: "KILL_ALL" },
      roundLimit: 1,
    });

    engine.endTurn(p1);
    await engine.whenIdle();

    expect(engine.combatOutcome).toEqual({ over: true, playerVictory: false });
  });
});

describe("TurnOrderEngine: turn start and hazards", () => {
  it("ticks effects when a window opens", () => {
    const { engine, events } = setup();
    const stun = getStatusEffectDefinition("STUN");
    if (!stun) throw new Error("missing STUN");

    const p1 = makeUnit("p1", "player", { stats: { speed: 10 } });
    p1.statusEffects.apply(stun, 1);
    engine.initialize([p1, makeUnit("e1", "enemy", { stats: { speed: 5 } })]);

    expect(p1.canAct()).toBe(false);
    expect(events.ofType("STATUS_EFFECT_TICKED").map((e) => e.payload)).toEqual([
      { unit_id: "p1", effect_id: "STUN", damage: 0, healing: 0, remaining: 0 },
    ]);
  });

  it("burns a unit that ends its turn on a hazard and decays hazards each round", async () => {
    const hazards = new HazardField(silentLog);
    hazards.createHazard({ x: 0, y: 0 }, { damage: 7, rounds: 2 });
    const { engine, events } = setup({ driver: finishingDriver([]), hazards });

    const p1 = makeUnit("p1", "player", { position: { x: 0, y: 0 }, stats: { speed: 10 } });
    const e1 = makeUnit("e1", "enemy", { position: { x: 3, y: 3 }, stats: { speed: 5 } });
    engine.initialize([p1, e1]);

    engine.endTurn(p1);
    expect(p1.hp).toBe(93);
    expect(events.ofType("HP_CHANGED").map((e) => e.payload)).toEqual([
      { unit_id: "p1", hp: 93, max_hp: 100, delta: -7, source: "HAZARD" },
    ]);

    await engine.whenIdle();
    expect(engine.round).toBe(2);
    expect(hazards.hazardAt({ x: 0, y: 0 })?.remainingRounds).toBe(1);
  });
});
