import type { Combatant } from "./combatant";
import type { FactionRelationshipResolver } from "./factionRelations";
import type { CombatOutcome, EncounterConfig, FactionId } from "./types";

export interface VictoryInput {
  units: readonly Combatant[];
  round: number;
  encounter: EncounterConfig;
  factions: FactionRelationshipResolver;
  playerFactionId: FactionId;
}

export function getAliveFactions(units: readonly Combatant[]): Set<FactionId> {
  const factions = new Set<FactionId>();
  for (const u of units) {
    if (u.active && u.isAlive()) factions.add(u.factionId);
  }
  return factions;
}

function killAll(input: VictoryInput, alive: Set<FactionId>): CombatOutcome {
  const hostileLeft = input.factions.getHostileFactions(input.playerFactionId, alive);
  if (hostileLeft.length === 0) return { over: true, playerVictory: true };
  return { over: false };
}

/**
 * Pure victory check. Losing every player unit is always a defeat; a
 * round limit, when set, turns any unresolved battle past it into a defeat.
 */
export function evaluateVictory(input: VictoryInput): CombatOutcome {
  const alive = getAliveFactions(input.units);

  if (!alive.has(input.playerFactionId)) {
    return { over: true, playerVictory: false };
  }

  let outcome: CombatOutcome;
  const condition = input.encounter.victory;
  switch (condition.type) {
    case "KILL_ALL":
      outcome = killAll(input, alive);
      break;
    case "SURVIVE_ROUNDS":
      outcome = input.round > condition.rounds ? { over: true, playerVictory: true } : { over: false };
      break;
    // no dedicated rules yet: both resolve like KILL_ALL
    case "PROTECT_TARGET":
    case "REACH_LOCATION":
      outcome = killAll(input, alive);
      break;
    default: {
      const _exhaustive: never = condition;
      return _exhaustive;
    }
  }

  const limit = input.encounter.roundLimit ?? 0;
  if (!outcome.over && limit > 0 && input.round > limit) {
    return { over: true, playerVictory: false };
  }
  return outcome;
}
