import { Job } from "../../src/shared/job/Job";
import { JobsRunner } from "../../src/shared/job/JobsRunner";
import { RunnerStatus } from "../../src/shared/job/RunnerStatus";

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe("Job", () => {
  it("does nothing until launched", async () => {
    const work = jest.fn().mockReturnValue(1);
    const job = Job.supply(work);

    expect(work).not.toHaveBeenCalled();
    await expect(job.launch()).resolves.toBe(1);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it("joins jobs into a tuple in argument order", async () => {
    const slow = Job.supply(async () => {
      await new Promise((r) => setTimeout(r, 10));
      return "form";
    });
    const fast = Job.supply(() => 3);

    await expect(Job.allOf(slow, fast).launch()).resolves.toEqual(["form", 3]);
  });

  it("chains results through thenApply and thenAccept", async () => {
    const seen: number[] = [];
    const job = Job.supply(() => 2)
      .thenApply((_status, value) => value * 10)
      .thenAccept((_status, value) => {
        seen.push(value);
      });

    await expect(job.launch()).resolves.toBeUndefined();
    expect(seen).toEqual([20]);
  });

  it("shares the launch status with every composed step", async () => {
    const statuses: boolean[] = [];
    const job = Job.allOf(
      Job.supply((status) => status.isCancelled()),
      Job.run((status) => {
        statuses.push(status.isCancelled());
      })
    ).thenApply((status, [first]) => [first, status.isCancelled()]);

    await expect(job.launch(RunnerStatus.cancelled())).resolves.toEqual([true, true]);
    expect(statuses).toEqual([true]);
  });

  it("fails the joined job when one part fails", async () => {
    const job = Job.allOf(Job.supply(() => 1), Job.supply<number>(() => Promise.reject(new Error("boom"))));

    await expect(job.launch()).rejects.toThrow("boom");
  });
});

describe("JobsRunner", () => {
  it("runs jobs with bounded parallelism and collects results", async () => {
    let active = 0;
    let maxActive = 0;
    const jobs = Array.from({ length: 6 }, (_, index) => Job.supply(async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 10));
      active -= 1;
      return index;
    }));

    const report = await JobsRunner.launchSync(jobs, { concurrency: 2, onError: () => undefined });

    expect(report).toEqual({ results: [0, 1, 2, 3, 4, 5], errors: [] });
    expect(maxActive).toBe(2);
  });

  it("reports each failure once without stopping the other jobs", async () => {
    const failure = new Error("form failed");
    const onError = jest.fn();
    const onSuccess = jest.fn();

    const report = await JobsRunner.launchSync(
      [Job.supply(() => "a"), Job.supply<string>(() => Promise.reject(failure)), Job.supply(() => "c")],
      { onError, onSuccess }
    );

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure);
    expect(onSuccess).toHaveBeenCalledWith(["a", "c"]);
    expect(report).toEqual({ results: ["a", "c"], errors: [failure] });
  });

  it("routes a failing onSuccess to onError", async () => {
    const onError = jest.fn();
    const failure = new Error("store failed");

    const report = await JobsRunner.launchSync([Job.supply(() => 1)], {
      onSuccess: () => Promise.reject(failure),
      onError
    });

    expect(onError).toHaveBeenCalledWith(failure);
    expect(report.errors).toEqual([failure]);
  });

  it("lets running jobs observe cancellation", async () => {
    const gate = deferred<void>();
    const runner = JobsRunner.launchAsync(
      [Job.supply(async (status) => {
        await gate.promise;
        return status.isCancelled();
      })],
      { onError: () => undefined }
    );

    expect(runner.isRunning()).toBe(true);
    runner.cancel();
    gate.resolve();

    await expect(runner.waitForCompletion()).resolves.toEqual({ results: [true], errors: [] });
    expect(runner.isRunning()).toBe(false);
  });
});
