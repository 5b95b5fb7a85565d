import type { Logger } from "pino";
import type { Combatant } from "../../domain/combatant";
import { pointKey } from "../../domain/geometry";
import type { HazardSpec, Point } from "../../domain/types";
import type { HazardInfo } from "../../ports/gridPort";
import type { HazardService } from "../../ports/hazardPort";

type PlacedHazard = HazardInfo & { at: Point; sourceId?: string };

/** Timed ground hazards keyed by cell. One hazard per cell; a new one replaces the old. */
export class HazardField implements HazardService {
  private readonly hazards = new Map<string, PlacedHazard>();
  private nextId = 1;

  constructor(private readonly log?: Logger) {}

  createHazard(at: Point, spec: HazardSpec, sourceId?: string): void {
    if (spec.rounds <= 0 || spec.damage <= 0) return;
    const hazard: PlacedHazard = {
      id: `hz_${this.nextId++}`,
      damage: spec.damage,
      remainingRounds: spec.rounds,
      at: { ...at },
      sourceId,
    };
    this.hazards.set(pointKey(at), hazard);
    this.log?.debug({ at, hazard_id: hazard.id }, "hazard created");
  }

  hazardAt(at: Point): HazardInfo | null {
    const h = this.hazards.get(pointKey(at));
    return h ? { id: h.id, damage: h.damage, remainingRounds: h.remainingRounds } : null;
  }

  tickRoundHazards(round: number): void {
    for (const [key, h] of this.hazards) {
      h.remainingRounds -= 1;
      if (h.remainingRounds <= 0) {
        this.hazards.delete(key);
        this.log?.debug({ round, hazard_id: h.id }, "hazard expired");
      }
    }
  }

  applyHazardDamage(unit: Combatant, cell: Point): number {
    if (!unit.isAlive()) return 0;
    return this.hazards.get(pointKey(cell))?.damage ?? 0;
  }

  get count(): number {
    return this.hazards.size;
  }
}
