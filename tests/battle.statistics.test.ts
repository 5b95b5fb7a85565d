import { describe, it, expect } from "vitest";
import { BattleEventChannel } from "../src/battle/events/battleEvents";
import { BattleStatisticsTracker } from "../src/battle/statistics/battleStatistics";
import type { CombatResolutionResult } from "../src/battle/domain/types";

const FACTIONS: Record<string, string> = { a: "player", e: "enemy" };

function hit(overrides: Partial<CombatResolutionResult> = {}): CombatResolutionResult {
  return { hit: true, parried: false, criticalHit: false, criticalDefended: false, finalDamage: 10, ...overrides };
}

function setup() {
  const channel = new BattleEventChannel();
  const tracker = new BattleStatisticsTracker((id) => FACTIONS[id] ?? null);
  tracker.attach(channel);
  return { channel, tracker };
}

describe("BattleStatisticsTracker", () => {
  it("tallies attacks, damage, healing and kills per unit", () => {
    const { channel, tracker } = setup();

    channel.publish({ type: "ATTACK_RESOLVED", payload: { attacker_id: "a", target_id: "e", result: hit({ criticalHit: true }) } });
    channel.publish({
      type: "HP_CHANGED",
      payload: { unit_id: "e", hp: 70, max_hp: 100, delta: -30, source: "ATTACK", source_unit_id: "a" },
    });
    channel.publish({ type: "ATTACK_RESOLVED", payload: { attacker_id: "e", target_id: "a", result: hit({ parried: true }) } });
    channel.publish({ type: "SKILL_USED", payload: { user_id: "a", target_id: "a", skill_id: "mend" } });
    channel.publish({
      type: "HP_CHANGED",
      payload: { unit_id: "a", hp: 100, max_hp: 100, delta: 5, source: "HEAL", source_unit_id: "a" },
    });
    channel.publish({
      type: "HP_CHANGED",
      payload: { unit_id: "e", hp: 0, max_hp: 100, delta: -70, source: "SKILL", source_unit_id: "a" },
    });
    channel.publish({ type: "UNIT_DIED", payload: { unit_id: "e", killer_id: "a" } });

    const snapshot = tracker.snapshot("player");
    expect(snapshot.units.map((u) => u.unit_id)).toEqual(["a", "e"]);
    expect(tracker.get("a")).toEqual({
      unit_id: "a",
      faction_id: "player",
      damage_dealt: 100,
      damage_taken: 0,
      healing_done: 5,
      kills: 1,
      critical_hits: 1,
      attacks_landed: 1,
      attacks_missed: 0,
      skills_used: 1,
      died: false,
    });
    expect(tracker.get("e")).toMatchObject({ damage_taken: 100, attacks_missed: 1, died: true });
    expect(snapshot.party).toEqual({
      damage_dealt: 100,
      damage_taken: 0,
      kills: 1,
      critical_hits: 1,
      skills_used: 1,
      units_lost: 0,
    });
  });

  it("does not count a critical that was defended", () => {
    const { channel, tracker } = setup();
    channel.publish({
      type: "ATTACK_RESOLVED",
      payload: { attacker_id: "a", target_id: "e", result: hit({ criticalHit: true, criticalDefended: true }) },
    });
    expect(tracker.get("a")?.critical_hits).toBe(0);
    expect(tracker.get("a")?.attacks_landed).toBe(1);
  });

  it("stops counting once detached", () => {
    const { channel, tracker } = setup();
    tracker.detach();
    channel.publish({ type: "UNIT_DIED", payload: { unit_id: "e" } });
    expect(tracker.get("e")).toBeNull();
    expect(channel.listenerCount).toBe(0);
  });
});

describe("BattleEventChannel history", () => {
  it("keeps only the newest events once the limit is reached, numbering on", () => {
    const channel = new BattleEventChannel(undefined, { maxHistory: 2 });
    for (const round of [1, 2, 3]) channel.publish({ type: "ROUND_STARTED", payload: { round } });

    expect(channel.size).toBe(2);
    expect(channel.list().map((e) => [e.seq, e.payload])).toEqual([
      [2, { round: 2 }],
      [3, { round: 3 }],
    ]);
    expect(channel.list(1, 2).map((e) => e.seq)).toEqual([2]);
  });
});
