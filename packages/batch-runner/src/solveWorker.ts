import { parentPort } from 'worker_threads';
import type { Problem, SolveResult, SolverConfig } from '@hopnet/shared';
import { solveProblem } from './problems';

export type TaskMsg = {
  id: number;             // slot in the batch
  problem: Problem;
  options: Partial<SolverConfig>;
};

export type ReplyMsg =
  | { ok: true; id: number; result: SolveResult }
  | { ok: true; id: number; error: string }          // caller error, item failed
  | { ok: false; id: number; error: string };        // unexpected failure

export function handleTask(msg: TaskMsg): ReplyMsg {
  try {
    const item = solveProblem(msg.problem, msg.options);
    return item.success
      ? { ok: true, id: msg.id, result: item.result }
      : { ok: true, id: msg.id, error: item.error };
  } catch (e) {
    return {
      ok: false,
      id: msg.id,
      error: e instanceof Error && e.stack ? e.stack : String(e),
    };
  }
}

if (parentPort) {
  const port = parentPort;
  port.on('message', (msg: TaskMsg) => {
    port.postMessage(handleTask(msg));
  });
}
