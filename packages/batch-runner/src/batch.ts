import { Worker } from 'worker_threads';
import type { BatchItem, BatchReport, Problem, SolverConfig } from '@hopnet/shared';
import { solveProblem } from './problems';
import type { ReplyMsg, TaskMsg } from './solveWorker';

/** The slice of a worker thread the pool talks to. */
export interface SolveWorker {
  onMessage(cb: (msg: unknown) => void): void;
  onError(cb: (err: Error) => void): void;
  onExit(cb: (code: number) => void): void;
  post(task: TaskMsg): void;
  terminate(): Promise<unknown>;
}

export type SpawnWorker = () => SolveWorker;

export type BatchOpts = {
  options?: Partial<SolverConfig>;
  jobs?: number;               // 1 = solve inline on this thread
  spawnWorker?: SpawnWorker;
};

const workerUrl = new URL('./worker-bootstrap.mjs', import.meta.url);

export const spawnThreadWorker: SpawnWorker = () => {
  const w = new Worker(workerUrl);
  return {
    onMessage: cb => { w.on('message', cb); },
    onError: cb => { w.on('error', cb); },
    onExit: cb => { w.on('exit', cb); },
    post: task => { w.postMessage(task); },
    terminate: () => w.terminate(),
  };
};

function isReply(msg: unknown): msg is ReplyMsg {
  return typeof msg === 'object' && msg !== null && 'ok' in msg && 'id' in msg && typeof msg.id === 'number';
}

function toItem(problem: Problem, msg: unknown): BatchItem {
  if (!isReply(msg)) return { id: problem.id, success: false, error: 'Malformed worker reply' };
  if (!msg.ok) return { id: problem.id, success: false, error: `Worker error: ${msg.error}` };
  if ('result' in msg) return { id: problem.id, success: true, result: msg.result };
  return { id: problem.id, success: false, error: msg.error };
}

export function summarize(results: BatchItem[]) {
  const successful = results.filter(r => r.success).length;
  return { total: results.length, successful, failed: results.length - successful };
}

/**
 * Solve every problem, results in input order. With jobs > 1 each problem
 * runs on its own worker, at most `jobs` at a time. A failing problem (bad
 * matrix, crashed worker) fails its own item only.
 */
export async function runBatch(problems: Problem[], opts: BatchOpts = {}): Promise<BatchReport> {
  const options = opts.options ?? {};
  const jobs = Math.max(1, Math.floor(opts.jobs ?? 1));

  const results = jobs === 1
    ? problems.map(p => solveProblem(p, options))
    : await runPool(problems, options, jobs, opts.spawnWorker ?? spawnThreadWorker);

  return { results, summary: summarize(results) };
}

async function runPool(
  problems: Problem[],
  options: Partial<SolverConfig>,
  jobs: number,
  spawnWorker: SpawnWorker,
): Promise<BatchItem[]> {
  const results: Array<BatchItem | undefined> = new Array(problems.length).fill(undefined);
  const queue = problems.map((_, i) => i);
  const stopping: Promise<unknown>[] = [];
  let running = 0;

  if (queue.length > 0) {
    await new Promise<void>(resolve => {
      const spawn = () => {
        while (running < jobs && queue.length) {
          const slot = queue.shift();
          if (slot === undefined) break;
          running++;
          const problem = problems[slot];
          const w = spawnWorker();
          let settled = false;

          const finish = (item: BatchItem) => {
            if (settled) return;
            settled = true;
            results[slot] = item;
            stopping.push(w.terminate());
            running--;
            if (queue.length) spawn();
            else if (running === 0) resolve();
          };

          w.onMessage(msg => finish(toItem(problem, msg)));
          w.onError(e => finish({ id: problem.id, success: false, error: `Worker error: ${e.message}` }));
          // no-op once a reply settled the slot
          w.onExit(code => finish({ id: problem.id, success: false, error: `Worker error: exited with code ${code}` }));
          w.post({ id: slot, problem, options });
        }
      };
      spawn();
    });
  }

  await Promise.all(stopping);
  return results.map((r, i) => r ?? { id: problems[i].id, success: false, error: 'No result' });
}
