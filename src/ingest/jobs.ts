import { randomUUID } from "node:crypto";
import type { IngestionOutcome } from "./types.js";
import type { IngestConfigInput } from "../utils/config.js";
import { ErrorCode, getErrorCode, getErrorMessage } from "../utils/errors.js";
import { createErrorTracker, getLogger } from "../utils/logger.js";

export type JobStatus = "queued" | "running" | "completed" | "failed";

export interface IngestionJob {
  id: string;
  url: string;
  status: JobStatus;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  outcome?: IngestionOutcome;
  error?: string;
  /** UNKNOWN when the run failed with something other than a PagevaultError */
  errorCode?: ErrorCode;
}

/**
 * Keyed state store for background jobs
 */
export interface IJobStore<T> {
  get(id: string): Promise<T | undefined>;
  put(id: string, state: T): Promise<void>;
}

/**
 * Process-local job store
 */
export class InMemoryJobStore<T> implements IJobStore<T> {
  private entries: Map<string, T> = new Map();

  async get(id: string): Promise<T | undefined> {
    return this.entries.get(id);
  }

  async put(id: string, state: T): Promise<void> {
    this.entries.set(id, state);
  }
}

export interface IngestionRunner {
  ingest(url: string, config?: IngestConfigInput): Promise<IngestionOutcome>;
}

/**
 * Runs ingestions in the background and records their lifecycle
 * (queued -> running -> completed | failed) in a job store.
 */
export class IngestionJobRunner {
  private readonly tasks: Map<string, Promise<void>> = new Map();
  private readonly trackError = createErrorTracker("IngestionJobRunner");

  constructor(
    private readonly pipeline: IngestionRunner,
    private readonly store: IJobStore<IngestionJob> = new InMemoryJobStore<IngestionJob>(),
    private readonly createId: () => string = randomUUID
  ) {}

  /**
   * Queue an ingestion and start it. Resolves with the job id once the job is recorded.
   */
  async submit(url: string, config: IngestConfigInput = {}): Promise<string> {
    const job: IngestionJob = {
      id: this.createId(),
      url,
      status: "queued",
      createdAt: new Date().toISOString(),
    };
    await this.store.put(job.id, job);
    getLogger().child({ job: job.id }).debug("Job queued", { url });

    const task = this.execute(job, config).catch((err) => this.trackError(err, "execute", url));
    this.tasks.set(job.id, task);
    return job.id;
  }

  async get(id: string): Promise<IngestionJob | undefined> {
    return await this.store.get(id);
  }

  /**
   * Wait for a submitted job to settle and return its final state.
   */
  async wait(id: string): Promise<IngestionJob | undefined> {
    const task = this.tasks.get(id);
    if (task) {
      await task;
      this.tasks.delete(id);
    }
    return await this.store.get(id);
  }

  private async execute(job: IngestionJob, config: IngestConfigInput): Promise<void> {
    const running: IngestionJob = { ...job, status: "running", startedAt: new Date().toISOString() };
    await this.store.put(job.id, running);

    try {
      const outcome = await this.pipeline.ingest(job.url, config);
      await this.store.put(job.id, {
        ...running,
        status: "completed",
        finishedAt: new Date().toISOString(),
        outcome,
      });
    } catch (err) {
      await this.store.put(job.id, {
        ...running,
        status: "failed",
        finishedAt: new Date().toISOString(),
        error: getErrorMessage(err),
        errorCode: getErrorCode(err),
      });
    }
  }
}
