/**
 * Bounded worker pool
 *
 * A fixed number of async workers pull tasks from a shared queue in submission
 * order. Each worker lazily creates one resource (e.g. an SDK client) on its
 * first task and keeps it for the life of the pool; resources are never shared
 * between workers.
 *
 * Results come back per task, in submission order, as promises. Tasks that throw
 * settle their own promise with the error; they never stop other workers.
 */

export type TaskOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

export interface PoolRun<R> {
  /** One promise per submitted task, same order as the input; never rejects */
  readonly outcomes: ReadonlyArray<Promise<TaskOutcome<R>>>;
  /** Resolves once every task has finished and all workers have exited */
  readonly drained: Promise<void>;
}

export interface WorkerPoolOptions<Resource> {
  /** Maximum number of tasks running at the same time */
  size: number;
  /** Creates the resource owned by one worker; called at most once per worker */
  createResource: (workerId: number) => Resource;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export class WorkerPool<Resource> {
  private readonly size: number;
  private readonly createResource: (workerId: number) => Resource;

  constructor(options: WorkerPoolOptions<Resource>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error('WorkerPool size must be a positive integer');
    }
    this.size = options.size;
    this.createResource = options.createResource;
  }

  /**
   * Run `work` over every task. Tasks start in input order; no more than `size`
   * run at once. Workers beyond the number of tasks are never started.
   */
  run<T, R>(tasks: readonly T[], work: (task: T, resource: Resource) => Promise<R>): PoolRun<R> {
    const slots = tasks.map(() => deferred<TaskOutcome<R>>());
    let cursor = 0;

    const worker = async (workerId: number): Promise<void> => {
      let resource: Resource | undefined;

      while (cursor < tasks.length) {
        const index = cursor++;
        try {
          if (resource === undefined) {
            resource = this.createResource(workerId);
          }
          const value = await work(tasks[index], resource);
          slots[index].resolve({ ok: true, value });
        } catch (error) {
          slots[index].resolve({ ok: false, error });
        }
      }
    };

    const workerCount = Math.min(this.size, tasks.length);
    const workers: Promise<void>[] = [];
    for (let workerId = 0; workerId < workerCount; workerId++) {
      workers.push(worker(workerId));
    }

    return {
      outcomes: slots.map((slot) => slot.promise),
      drained: Promise.all(workers).then(() => undefined),
    };
  }
}
