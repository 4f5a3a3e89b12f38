/**
 * Pool queue: sequential processor per pool.
 *
 * Each poolId has one FIFO queue and one consumer. A task runs only after the
 * previous task for the same pool has settled, so a pool's (params, state) pair
 * is never read and written by two operations at once. Tasks for different
 * pools run independently.
 */

interface QueuedTask {
  run: () => Promise<void>;
}

interface PoolQueue {
  pending: QueuedTask[];
  processing: boolean;
}

const queues = new Map<string, PoolQueue>();

function getOrCreateQueue(poolId: string): PoolQueue {
  let q = queues.get(poolId);
  if (q === undefined) {
    q = { pending: [], processing: false };
    queues.set(poolId, q);
  }
  return q;
}

/** Take the next task, run it, then schedule another drain if more are pending. */
async function drainQueue(poolId: string): Promise<void> {
  const q = queues.get(poolId);
  if (q === undefined || q.processing) return;
  const next = q.pending.shift();
  if (next === undefined) return;

  q.processing = true;
  try {
    await next.run();
  } finally {
    q.processing = false;
    if (q.pending.length > 0) {
      setImmediate(() => void drainQueue(poolId));
    } else {
      queues.delete(poolId);
    }
  }
}

/**
 * Submit a task for one pool. It is appended to that pool's queue and run in
 * FIFO order; the returned promise settles with the task's own result.
 */
export function enqueuePoolTask<T>(poolId: string, task: () => T | Promise<T>): Promise<T> {
  const q = getOrCreateQueue(poolId);
  return new Promise<T>((resolve, reject) => {
    q.pending.push({
      run: async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      },
    });
    setImmediate(() => void drainQueue(poolId));
  });
}

/** Number of tasks waiting (not running) for a pool. */
export function pendingPoolTasks(poolId: string): number {
  return queues.get(poolId)?.pending.length ?? 0;
}
