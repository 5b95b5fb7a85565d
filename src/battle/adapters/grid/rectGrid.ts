import { delay, throwIfAborted } from "../../async/timing";
import type { Combatant } from "../../domain/combatant";
import { pointKey, samePoint } from "../../domain/geometry";
import type { CombatantId, Point } from "../../domain/types";
import type { HazardField } from "../hazards/hazardField";
import type { Cell, GridService } from "../../ports/gridPort";

export interface RectGridOptions {
  width: number;
  height: number;
  blocked?: Point[];
  /** simulated time per cell walked; 0 moves instantly */
  stepDelayMs?: number;
  hazards?: HazardField;
}

const STEPS: readonly Point[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
];

/**
 * Rectangular board. Movement is 4-neighbour, one point per cell; other living
 * units block both passage and the destination.
 */
export class RectGrid implements GridService {
  readonly width: number;
  readonly height: number;
  private readonly blocked: Set<string>;
  private readonly stepDelayMs: number;
  private readonly hazards?: HazardField;
  private readonly units = new Map<CombatantId, Combatant>();

  constructor(opts: RectGridOptions) {
    this.width = opts.width;
    this.height = opts.height;
    this.blocked = new Set((opts.blocked ?? []).map(pointKey));
    this.stepDelayMs = opts.stepDelayMs ?? 0;
    this.hazards = opts.hazards;
  }

  place(unit: Combatant): void {
    this.units.set(unit.id, unit);
  }

  remove(unitId: CombatantId): void {
    this.units.delete(unitId);
  }

  isValidPosition(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  cellAt(x: number, y: number): Cell | null {
    if (!this.isValidPosition(x, y)) return null;
    const at = { x, y };
    return {
      x,
      y,
      walkable: !this.blocked.has(pointKey(at)),
      occupantId: this.unitAt(at)?.id ?? null,
      hazard: this.hazards?.hazardAt(at) ?? null,
    };
  }

  reachableCells(unit: Combatant, budget: number): Cell[] {
    const out: Cell[] = [];
    for (const [key, cost] of this.explore(unit)) {
      if (cost > budget) continue;
      const [x, y] = key.split(",").map(Number);
      const cell = this.cellAt(x, y);
      if (cell) out.push(cell);
    }
    return out;
  }

  path(unit: Combatant, target: Point): Point[] {
    if (samePoint(unit.position, target)) return [];
    const parents = new Map<string, Point | null>([[pointKey(unit.position), null]]);
    const queue: Point[] = [unit.position];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      for (const next of this.neighbours(unit, current)) {
        const key = pointKey(next);
        if (parents.has(key)) continue;
        parents.set(key, current);
        if (samePoint(next, target)) return this.unwind(parents, next);
        queue.push(next);
      }
    }
    return [];
  }

  unitAt(at: Point): Combatant | null {
    for (const u of this.units.values()) {
      if (u.active && u.isAlive() && samePoint(u.position, at)) return u;
    }
    return null;
  }

  async moveUnit(unit: Combatant, path: Point[], signal?: AbortSignal): Promise<void> {
    for (const step of path) {
      if (this.stepDelayMs > 0) {
        await delay(this.stepDelayMs, signal);
      } else {
        throwIfAborted(signal);
      }
      unit.position = { ...step };
    }
  }

  // ===== helpers =====

  private neighbours(mover: Combatant, from: Point): Point[] {
    const out: Point[] = [];
    for (const d of STEPS) {
      const p = { x: from.x + d.x, y: from.y + d.y };
      if (!this.isValidPosition(p.x, p.y)) continue;
      if (this.blocked.has(pointKey(p))) continue;
      const occupant = this.unitAt(p);
      if (occupant && occupant.id !== mover.id) continue;
      out.push(p);
    }
    return out;
  }

  /** BFS cost (cells walked) to every cell the unit can reach, in visit order. */
  private explore(unit: Combatant): Map<string, number> {
    const cost = new Map<string, number>([[pointKey(unit.position), 0]]);
    const queue: Point[] = [unit.position];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      const base = cost.get(pointKey(current)) ?? 0;
      for (const next of this.neighbours(unit, current)) {
        const key = pointKey(next);
        if (cost.has(key)) continue;
        cost.set(key, base + 1);
        queue.push(next);
      }
    }
    return cost;
  }

  private unwind(parents: Map<string, Point | null>, end: Point): Point[] {
    const out: Point[] = [];
    let cursor: Point | null = end;
    while (cursor) {
      const parent: Point | null = parents.get(pointKey(cursor)) ?? null;
      if (parent === null) break;
      out.push(cursor);
      cursor = parent;
    }
    return out.reverse();
  }
}
