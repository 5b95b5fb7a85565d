import type { RandomSource } from "../../ports/randomSourcePort";

function mulberry32(seed: number) {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * One mulberry32 draw per (seed + cursor), so a battle can be replayed from
 * its seed and the cursor it reached.
 */
export class SeededRandomSource implements RandomSource {
  private position: number;

  constructor(public readonly seed: number, cursor = 0) {
    this.position = cursor;
  }

  get cursor(): number {
    return this.position;
  }

  next(): number {
    const value = mulberry32((this.seed + this.position) >>> 0)();
    this.position += 1;
    return value;
  }
}
