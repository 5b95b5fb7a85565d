import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { AiTurnDriver } from "../src/battle/ai/aiTurnDriver";
import { delay } from "../src/battle/async/timing";
import { FactionRelationshipResolver } from "../src/battle/domain/factionRelations";
import { BattleEventChannel } from "../src/battle/events/battleEvents";
import { TurnOrderEngine } from "../src/battle/engine/turnOrderEngine";
import { makeUnit, silentLog } from "./_battleTestUtils";

function setup(driver: AiTurnDriver | undefined, aiTurnTimeoutMs = 1000) {
  const events = new BattleEventChannel(silentLog);
  const engine = new TurnOrderEngine({
    factions: new FactionRelationshipResolver(silentLog),
    events,
    log: silentLog,
    ai: driver,
    aiTurnTimeoutMs,
  });
  const e1 = makeUnit("e1", "enemy", { stats: { speed: 10 } });
  const p1 = makeUnit("p1", "player", { stats: { speed: 5 } });
  const e2 = makeUnit("e2", "enemy", { stats: { speed: 1 } });
  return { engine, events, e1, p1, e2 };
}

describe("AI window sequencer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("forces the end of a turn that never completes, exactly once", async () => {
    const never: AiTurnDriver = { takeTurn: () => new Promise<void>(() => undefined) };
    const { engine, events, e1, p1, e2 } = setup(never);
    engine.initialize([e1, p1, e2]);

    await vi.advanceTimersByTimeAsync(999);
    expect(events.ofType("TURN_ENDED")).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await engine.whenIdle();

    expect(events.ofType("TURN_ENDED").map((e) => e.payload)).toEqual([{ unit_id: "e1", round: 1, forced: true }]);
    expect(engine.getCurrentUnit()?.id).toBe("p1");
  });

  it("drops a completion that arrives after the timeout", async () => {
    const seen: { signal?: AbortSignal } = {};
    const slow: AiTurnDriver = {
      takeTurn: async (_unit, turn) => {
        seen.signal = turn.signal;
        await new Promise<void>((resolve) => setTimeout(resolve, 3000));
        turn.complete();
      },
    };
    const { engine, events, e1, p1, e2 } = setup(slow);
    engine.initialize([e1, p1, e2]);

    await vi.advanceTimersByTimeAsync(1000);
    await engine.whenIdle();
    expect(seen.signal?.aborted).toBe(true);

    await vi.advanceTimersByTimeAsync(5000);
    expect(events.ofType("TURN_ENDED")).toHaveLength(1);
    expect(engine.getCurrentUnit()?.id).toBe("p1");
  });

  it("aborts a unit's turn when it dies and does not end it on its behalf", async () => {
    const waiting: AiTurnDriver = { takeTurn: (_unit, turn) => delay(10_000, turn.signal) };
    const { engine, events, e1, p1, e2 } = setup(waiting);
    engine.initialize([e1, p1, e2]);
    await vi.advanceTimersByTimeAsync(0);

    e1.takeDamage(999);
    events.publish({ type: "UNIT_DIED", payload: { unit_id: "e1" } });
    await engine.whenIdle();

    expect(events.ofType("TURN_ENDED")).toHaveLength(0);
    expect(engine.getCurrentUnit()?.id).toBe("p1");
    expect(engine.phase).toBe("WINDOW_ACTIVE");
  });

  it("stops driving on dispose", async () => {
    const waiting: AiTurnDriver = { takeTurn: (_unit, turn) => delay(10_000, turn.signal) };
    const { engine, events, e1, p1, e2 } = setup(waiting);
    engine.initialize([e1, p1, e2]);
    await vi.advanceTimersByTimeAsync(0);

    engine.dispose();
    await engine.whenIdle();
    await vi.advanceTimersByTimeAsync(20_000);

    expect(events.ofType("TURN_ENDED")).toHaveLength(0);
  });

  it("ends the turn when no driver is attached", async () => {
    const { engine, events, e1, p1, e2 } = setup(undefined);
    engine.initialize([e1, p1, e2]);
    await vi.advanceTimersByTimeAsync(0);
    await engine.whenIdle();

    expect(events.ofType("TURN_ENDED").map((e) => e.payload)).toEqual([{ unit_id: "e1", round: 1, forced: true }]);
  });
});
