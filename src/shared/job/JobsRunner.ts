import { createLimiter } from "../concurrency/limiter";
import type { Job } from "./Job";
import { RunnerStatus } from "./RunnerStatus";

export const DEFAULT_RUNNER_CONCURRENCY = 8;

export type JobsRunnerOptions<T> = {
  concurrency?: number;
  onSuccess?: (results: T[]) => void | Promise<void>;
  onError: (error: unknown) => void;
};

export type JobsRunnerReport<T> = {
  results: T[];
  errors: unknown[];
};

/**
 * Runs independent top-level jobs with bounded parallelism. A failing job is
 * reported through `onError` once and never cancels its siblings.
 */
export class JobsRunner<T> {
  private readonly controller = new AbortController();
  private readonly completion: Promise<JobsRunnerReport<T>>;
  private running = true;

  private constructor(jobs: Array<Job<T>>, opts: JobsRunnerOptions<T>) {
    const limit = createLimiter(opts.concurrency ?? DEFAULT_RUNNER_CONCURRENCY);
    const status = new RunnerStatus(this.controller.signal);

    const launched = jobs.map((job) =>
      limit(() => job.launch(status)).catch((err: unknown) => {
        opts.onError(err);
        throw err;
      })
    );

    this.completion = Promise.allSettled(launched)
      .then(async (outcomes) => {
        const report: JobsRunnerReport<T> = { results: [], errors: [] };
        for (const outcome of outcomes) {
          if (outcome.status === "fulfilled") {
            report.results.push(outcome.value);
          } else {
            report.errors.push(outcome.reason);
          }
        }

        if (opts.onSuccess) {
          try {
            await opts.onSuccess(report.results);
          } catch (err) {
            report.errors.push(err);
            opts.onError(err);
          }
        }
        return report;
      })
      .finally(() => {
        this.running = false;
      });
  }

  static launchAsync<T>(jobs: Array<Job<T>>, opts: JobsRunnerOptions<T>): JobsRunner<T> {
    return new JobsRunner(jobs, opts);
  }

  static launchSync<T>(jobs: Array<Job<T>>, opts: JobsRunnerOptions<T>): Promise<JobsRunnerReport<T>> {
    return JobsRunner.launchAsync(jobs, opts).waitForCompletion();
  }

  cancel(): void {
    this.controller.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  waitForCompletion(): Promise<JobsRunnerReport<T>> {
    return this.completion;
  }
}
