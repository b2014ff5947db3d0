export { validateBatch, solveProblem, InvalidBatchError } from './problems';
export { runBatch, summarize, spawnThreadWorker } from './batch';
export type { BatchOpts, SolveWorker, SpawnWorker } from './batch';
export { handleTask } from './solveWorker';
export type { TaskMsg, ReplyMsg } from './solveWorker';
export { readJson, writeJson, loadMatrix, loadProblems } from './loadProblems';
export { runBench, randomMatrix, formatBench, formatBenchRow } from './bench';
export type { BenchOpts, BenchRow, BenchReport } from './bench';
