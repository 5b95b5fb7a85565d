import type { Combatant } from "../domain/combatant";
import type { CombatantId, Point } from "../domain/types";

export interface HazardInfo {
  id: string;
  damage: number;
  remainingRounds: number;
}

export interface Cell {
  x: number;
  y: number;
  walkable: boolean;
  occupantId: CombatantId | null;
  hazard: HazardInfo | null;
}

export interface GridService {
  /** cells the unit can end its move on, its own cell included */
  reachableCells(unit: Combatant, budget: number): Cell[];
  /** cells stepped through, start excluded; empty when unreachable or already there */
  path(unit: Combatant, target: Point): Point[];
  isValidPosition(x: number, y: number): boolean;
  cellAt(x: number, y: number): Cell | null;
  /** the living unit standing on the cell */
  unitAt(at: Point): Combatant | null;
  /** walks the path; rejects with TurnCancelledError when the signal aborts */
  moveUnit(unit: Combatant, path: Point[], signal?: AbortSignal): Promise<void>;
}
