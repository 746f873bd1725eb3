import { RunnerStatus } from "./RunnerStatus";

export type JobWork<T> = (status: RunnerStatus) => T | Promise<T>;

/**
 * A deferred unit of work. Nothing runs until `launch` is called, and every
 * composed job shares the `RunnerStatus` it was launched with.
 */
export class Job<T> {
  private constructor(private readonly work: JobWork<T>) {}

  static supply<T>(work: JobWork<T>): Job<T> {
    return new Job(work);
  }

  static run(work: JobWork<void>): Job<void> {
    return new Job(work);
  }

  /**
   * Launches every job concurrently and resolves with their results in
   * argument order, typed per position.
   */
  static allOf<T extends unknown[]>(...jobs: { [K in keyof T]: Job<T[K]> }): Job<T>;
  static allOf(...jobs: Array<Job<unknown>>): Job<unknown[]> {
    return new Job((status) => Promise.all(jobs.map((job) => job.launch(status))));
  }

  async launch(status: RunnerStatus = RunnerStatus.running()): Promise<T> {
    return this.work(status);
  }

  thenApply<U>(fn: (status: RunnerStatus, value: T) => U | Promise<U>): Job<U> {
    return new Job(async (status) => fn(status, await this.launch(status)));
  }

  thenAccept(fn: (status: RunnerStatus, value: T) => void | Promise<void>): Job<void> {
    return new Job(async (status) => {
      await fn(status, await this.launch(status));
    });
  }
}
