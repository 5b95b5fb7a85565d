import type { Combatant } from "../domain/combatant";
import type { HazardSpec, Point } from "../domain/types";

export interface HazardService {
  /** once per round, when the round is first reached */
  tickRoundHazards(round: number): void;
  /** damage the hazard under `cell` deals to `unit` at the end of its turn (0 when none) */
  applyHazardDamage(unit: Combatant, cell: Point): number;
  createHazard(at: Point, spec: HazardSpec, sourceId?: string): void;
}
