import type { RunnerStatus } from "../shared/job/RunnerStatus";

export type Credentials = {
  username: string;
  password: string;
};

export type ResponseBody = {
  text: () => Promise<string>;
  bytes: () => Promise<Uint8Array>;
};

export type Request<T> = {
  method: "GET" | "HEAD";
  url: URL;
  credentials?: Credentials;
  headers?: Record<string, string>;
  // turns a 2xx body into the typed result; a throw here yields a Failure
  readBody: (body: ResponseBody) => Promise<T>;
};

export type Success<T> = {
  ok: true;
  status: number;
  body: T;
};

export type Failure = {
  ok: false;
  // 0 when no HTTP response was received
  status: number;
  statusPhrase: string;
  error?: Error;
};

export type Response<T> = Success<T> | Failure;

export interface Http {
  /**
   * Never rejects for HTTP or network failures: those resolve to a Failure.
   * `runnerStatus` is polled before each retry, so a cancelled run starts no retry.
   */
  execute<T>(request: Request<T>, runnerStatus?: RunnerStatus): Promise<Response<T>>;
}

export const describeFailure = (failure: Failure): string => {
  if (failure.status === 0) return failure.error?.message ?? "No response";
  if (failure.status >= 200 && failure.status < 300) {
    return `Unreadable response: ${failure.error?.message ?? failure.statusPhrase}`;
  }
  return `HTTP ${failure.status} ${failure.statusPhrase}`.trim();
};
