export type CoordinateBuffer = Float32Array | Float64Array;

/** A single conformation: N atoms, xyz interleaved. */
export interface Conformation {
  count: number;
  positions: CoordinateBuffer; // length = count * 3
}

export interface BondTopology {
  count: number;
  pairs: Uint32Array; // length = count * 2, unordered (i, j)
  idealLength: Float64Array; // length = count, Å
}

export interface AngleTopology {
  count: number;
  triples: Uint32Array; // length = count * 3, (i, vertex, k)
  idealAngle: Float64Array; // length = count, radians in (0, π)
}

/**
 * Rectangular batch of rings sharing one atom count.
 * Rings of another size go in a separate RingSet.
 */
export interface RingSet {
  count: number;
  size: number; // atoms per ring, >= 3
  atoms: Uint32Array; // length = count * size
}

/** Ring coordinates gathered out of a conformation. */
export interface RingBatch {
  count: number;
  size: number;
  positions: Float64Array; // length = count * size * 3
}

export interface ChiralCenters {
  count: number;
  centers: Uint32Array; // length = count
  /** Four neighbours per center; only the first three orient the signed volume. */
  neighbors: Uint32Array; // length = count * 4
}

export interface LossWeights {
  bondLength: number;
  bondAngle: number;
  ringPlanarity: number;
  stericClash: number;
  chirality: number;
}

export type LossTerm = keyof LossWeights;

export interface LossEvaluation {
  value: number;
  /** dValue/dPositions, same layout as the input positions. */
  gradient: Float64Array;
  /** Numeric degeneracies met on the way; at most MAX_WARNINGS entries plus a dropped-count line. */
  warnings: string[];
}

export interface TermBreakdown {
  value: number;
  weight: number;
  weighted: number;
  /** True when the term's topology was absent or empty and it was never evaluated. */
  skipped: boolean;
}

export interface TotalLossEvaluation extends LossEvaluation {
  terms: Record<LossTerm, TermBreakdown>;
}
