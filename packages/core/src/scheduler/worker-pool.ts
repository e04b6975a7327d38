/**
 * WorkerPool runs sync jobs with bounded concurrency
 *
 * submit() never blocks: jobs beyond `maxWorkers` wait in a FIFO queue until a
 * slot frees. Completion is observed by polling isDone() / result() with the
 * handle submit() returned, so the caller decides when to reconcile.
 */

import { toError } from "../errors.js";
import type { JobOutcome, SyncOutcome } from "../sync/index.js";
import { SchedulerConfigError } from "./errors.js";

/**
 * Work function executed for each submitted target
 */
export type WorkerFunction = (target: string) => Promise<SyncOutcome>;

/**
 * Options for WorkerPool
 */
export interface WorkerPoolOptions {
  /** Maximum number of jobs running at once; must be an integer >= 1 */
  maxWorkers: number;

  /** Function executed for every submitted target */
  run: WorkerFunction;
}

/**
 * Opaque handle for one submitted job
 */
export class JobHandle {
  constructor(
    /** Sequence number, unique within a pool */
    readonly id: number,
    /** Target the job runs against */
    readonly target: string
  ) {}
}

interface JobRecord {
  promise: Promise<JobOutcome>;
  outcome?: JobOutcome;
}

/**
 * Validate a worker count, throwing SchedulerConfigError when it is unusable
 */
export function assertValidMaxWorkers(maxWorkers: number): void {
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new SchedulerConfigError(
      `maxWorkers must be an integer >= 1, got ${maxWorkers}`,
      "maxWorkers",
      maxWorkers
    );
  }
}

export class WorkerPool {
  readonly maxWorkers: number;
  private readonly work: WorkerFunction;
  private readonly jobs = new Map<JobHandle, JobRecord>();
  private readonly waiting: Array<() => void> = [];
  private nextId = 1;
  private active = 0;

  constructor(options: WorkerPoolOptions) {
    assertValidMaxWorkers(options.maxWorkers);
    this.maxWorkers = options.maxWorkers;
    this.work = options.run;
  }

  /** Jobs currently executing */
  get activeCount(): number {
    return this.active;
  }

  /** Jobs submitted but waiting for a free worker */
  get queuedCount(): number {
    return this.waiting.length;
  }

  /** Jobs submitted and not yet forgotten */
  get size(): number {
    return this.jobs.size;
  }

  /**
   * Queue a target for execution
   */
  submit(target: string): JobHandle {
    const handle = new JobHandle(this.nextId++, target);
    const record: JobRecord = {
      promise: this.execute(target).then((outcome) => {
        record.outcome = outcome;
        return outcome;
      }),
    };
    this.jobs.set(handle, record);
    return handle;
  }

  /**
   * Whether the job has reached a terminal outcome
   */
  isDone(handle: JobHandle): boolean {
    return this.record(handle).outcome !== undefined;
  }

  /**
   * Wait for the job's terminal outcome
   *
   * Never rejects: an exception thrown by the work function becomes an
   * outcome with status "error".
   */
  result(handle: JobHandle): Promise<JobOutcome> {
    return this.record(handle).promise;
  }

  /**
   * Drop a finished job from the pool's bookkeeping
   */
  forget(handle: JobHandle): void {
    this.jobs.delete(handle);
  }

  /**
   * Wait until every submitted job has finished
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.jobs.values(), (record) => record.promise));
  }

  private record(handle: JobHandle): JobRecord {
    const record = this.jobs.get(handle);
    if (!record) {
      throw new Error(`Unknown job handle ${handle.id} (${handle.target})`);
    }
    return record;
  }

  private async execute(target: string): Promise<JobOutcome> {
    await this.acquire();
    try {
      return await this.work(target);
    } catch (error) {
      return { status: "error", error: toError(error) };
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxWorkers) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next queued job
      next();
    } else {
      this.active--;
    }
  }
}
