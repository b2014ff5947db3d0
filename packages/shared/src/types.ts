/** n×n grid of non-negative finite costs; task i → resource j costs [i][j]. */
export type CostMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** Mutable square grid used for activations and potentials. */
export type Grid = number[][];

/** Uniform draws in [0, 1). */
export type RandomSource = () => number;

export type PenaltyWeights = {
  A: number; // one resource per task (row)
  B: number; // one task per resource (column)
  C: number; // n active cells overall
  D: number; // cost
};

export type SolverConfig = PenaltyWeights & {
  maxIterations: number;
  convergenceThreshold: number;
  stepSize: number;
  temperature: number;
  annealingRate: number;
  minTemperature: number;
  noise: number;
  seed: number;
  normalizeCosts: boolean;
  maxSize: number;
};

export type SolverOptions = Partial<SolverConfig> & {
  onIteration?: (snap: IterationSnapshot) => void;
};

export type IterationSnapshot = {
  iteration: number;
  maxDelta: number;
  temperature: number;
  energy: number;
};

export type SolveResult = Readonly<{
  assignment: readonly number[];
  totalCost: number;
  iterations: number;
  converged: boolean;
  repaired: boolean;
}>;

export type Problem = { id: string; costMatrix: unknown };

export type BatchItem =
  | { id: string; success: true; result: SolveResult }
  | { id: string; success: false; error: string };

export type BatchSummary = { total: number; successful: number; failed: number };

export type BatchReport = { results: BatchItem[]; summary: BatchSummary };
