import { PullError, toErrorMessage } from "../../core/errors/PullError";
import type { FormStatus } from "../../core/form/FormStatus";
import type { OpenSubmissionStore, SubmissionStore } from "../../ports/SubmissionStore";

export const wrapStoreFailure = (reason: unknown, form: FormStatus): PullError => {
  if (reason instanceof PullError) return reason;
  return new PullError({
    code: "store_failed",
    message: `Submission store failed for form ${form.formId}: ${toErrorMessage(reason)}`,
    context: { formId: form.formId },
    cause: reason
  });
};

/**
 * Opens the form's store, runs `fn` and always closes it. Store failures
 * surface as `store_failed`; this is the only failure that leaves a pull.
 */
export const withStore = async <T>(
  openStore: OpenSubmissionStore,
  form: FormStatus,
  fn: (store: SubmissionStore) => Promise<T>
): Promise<T> => {
  let store: SubmissionStore;
  try {
    store = await openStore(form);
  } catch (err) {
    throw wrapStoreFailure(err, form);
  }

  try {
    return await fn(store);
  } catch (err) {
    throw wrapStoreFailure(err, form);
  } finally {
    await store.close();
  }
};

export type CliErrorContext = Partial<{
  formId: string;
  instanceId: string;
  status: number;
}>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const extractErrorContext = (value: unknown): CliErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitized: CliErrorContext = {};
  if (typeof value.formId === "string") sanitized.formId = value.formId;
  if (typeof value.instanceId === "string") sanitized.instanceId = value.instanceId;
  if (typeof value.status === "number" && Number.isFinite(value.status)) sanitized.status = value.status;

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
};

export type PullFailureEnvelope = {
  event: "pull.failed";
  name: string;
  message: string;
  code?: string;
  context?: CliErrorContext;
  status?: number;
  stack?: string;
};

const finiteNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

/**
 * Log line for a run that failed as a whole. Only known context fields are
 * copied; causes never are, and the stack only on request.
 */
export const toFailureEnvelope = (err: unknown, includeStack: boolean): PullFailureEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields = isRecord(err) ? err : {};
  const context = extractErrorContext(fields.context);
  const status = finiteNumber(fields.status) ?? context?.status;

  return {
    event: "pull.failed",
    name: error.name || "Error",
    message: error.message,
    ...(typeof fields.code === "string" ? { code: fields.code } : {}),
    ...(context ? { context } : {}),
    ...(status !== undefined ? { status } : {}),
    ...(includeStack && typeof error.stack === "string" ? { stack: error.stack } : {})
  };
};
