import type { Combatant } from "../domain/combatant";

/** The slice of the turn engine an AI turn may read or drive. */
export interface BattleView {
  readonly round: number;
  isUnitInCurrentWindow(unit: Combatant): boolean;
  getCurrentWindow(): Combatant[];
  getAllUnits(): Combatant[];
  isCombatOver(): boolean;
  isPlayerControlled(unit: Combatant): boolean;
  endTurn(unit: Combatant, opts?: { forced?: boolean }): void;
}

export interface AiTurnContext {
  signal: AbortSignal;
  /** ends the unit's turn; only the first call has an effect */
  complete: () => void;
  battle: BattleView;
}

export interface AiTurnDriver {
  takeTurn(unit: Combatant, turn: AiTurnContext): Promise<void>;
}
