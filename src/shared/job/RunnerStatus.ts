/**
 * Cooperative cancellation signal shared by every job launched from one runner.
 * Work polls it before each network call or file write; nothing is interrupted.
 */
export class RunnerStatus {
  constructor(private readonly signal: AbortSignal) {}

  static running(): RunnerStatus {
    return new RunnerStatus(new AbortController().signal);
  }

  static cancelled(): RunnerStatus {
    return new RunnerStatus(AbortSignal.abort());
  }

  isCancelled(): boolean {
    return this.signal.aborted;
  }

  isStillRunning(): boolean {
    return !this.signal.aborted;
  }
}
