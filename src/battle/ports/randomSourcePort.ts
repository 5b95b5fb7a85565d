/** Uniform source in [0, 1). Injected wherever combat or AI draws a number. */
export interface RandomSource {
  next(): number;
}
