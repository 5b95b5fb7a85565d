import type { Combatant } from "./combatant";
import { chebyshev, manhattan, samePoint } from "./geometry";
import { roundHalfEven } from "./rounding";
import type { Point, SkillArea } from "./types";

export interface AreaBoard {
  isValidPosition(x: number, y: number): boolean;
  unitAt(at: Point): Combatant | null;
}

/**
 * Cells an area skill covers when `source` aims at `target`, in the order
 * units are struck. The source cell itself is never part of the area.
 */
export function areaCells(area: SkillArea, source: Point, target: Point, board: AreaBoard): Point[] {
  let cells: Point[];
  switch (area.pattern) {
    case "LINE_PASSTHROUGH":
      cells = lineCells(source, target, area.size);
      break;
    case "LINE_LIMITED":
      cells = firstOccupied(lineCells(source, target, area.size), source, board);
      break;
    case "CLOUD":
      cells = cloudCells(area.origin === "TARGET" ? target : source, area.size);
      break;
    case "FAN":
      cells = fanCells(source, target, area.size);
      break;
    default: {
      const _exhaustive: never = area.pattern;
      return _exhaustive;
    }
  }
  return cells.filter((p) => board.isValidPosition(p.x, p.y) && !samePoint(p, source));
}

// ===== patterns =====

/** Bresenham from source towards target, cut to `maxLength` cells; source excluded. */
export function lineCells(source: Point, target: Point, maxLength: number): Point[] {
  let dx = target.x - source.x;
  let dy = target.y - source.y;
  if (dx === 0 && dy === 0) return [];

  const distance = chebyshev(source, target);
  if (distance > maxLength) {
    const scale = maxLength / distance;
    dx = roundHalfEven(dx * scale);
    dy = roundHalfEven(dy * scale);
  }
  const end = { x: source.x + dx, y: source.y + dy };

  const stepX = Math.sign(dx);
  const stepY = Math.sign(dy);
  const spanX = Math.abs(dx);
  const spanY = Math.abs(dy);
  let error = spanX - spanY;
  let x = source.x;
  let y = source.y;

  const out: Point[] = [];
  while (x !== end.x || y !== end.y) {
    const doubled = error * 2;
    if (doubled > -spanY) {
      error -= spanY;
      x += stepX;
    }
    if (doubled < spanX) {
      error += spanX;
      y += stepY;
    }
    out.push({ x, y });
  }
  return out;
}

/** Every cell within Chebyshev `radius` of the centre, centre included. */
export function cloudCells(center: Point, radius: number): Point[] {
  const out: Point[] = [];
  for (let x = center.x - radius; x <= center.x + radius; x++) {
    for (let y = center.y - radius; y <= center.y + radius; y++) {
      out.push({ x, y });
    }
  }
  return out;
}

/**
 * Widening cone along a cardinal direction: 3 cells at depth 1, 5 at depth 2,
 * and so on. A diagonal aim covers nothing.
 */
export function fanCells(source: Point, target: Point, depth: number): Point[] {
  const dx = target.x - source.x;
  const dy = target.y - source.y;
  if ((dx === 0 && dy === 0) || (dx !== 0 && dy !== 0)) return [];

  const stepX = Math.sign(dx);
  const stepY = Math.sign(dy);
  const out: Point[] = [];
  for (let d = 1; d <= depth; d++) {
    const center = { x: source.x + stepX * d, y: source.y + stepY * d };
    for (let offset = -d; offset <= d; offset++) {
      out.push(dx === 0 ? { x: center.x + offset, y: center.y } : { x: center.x, y: center.y + offset });
    }
  }
  return out;
}

function firstOccupied(line: Point[], source: Point, board: AreaBoard): Point[] {
  let best: Point | null = null;
  for (const p of line) {
    if (!board.unitAt(p)) continue;
    if (!best || manhattan(p, source) < manhattan(best, source)) best = p;
  }
  return best ? [best] : [];
}
