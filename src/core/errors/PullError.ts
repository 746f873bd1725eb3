export type PullFailureCode =
  | "missing_cursor"
  | "missing_form_definition"
  | "store_failed"
  | "form_list_failed"
  | "form_not_found";

export type PullErrorContext = {
  formId?: string;
  instanceId?: string;
  status?: number;
};

/**
 * Contract violations and pull-level failures. Per-item download failures are
 * never raised as this error; they are tracked and skipped.
 */
export class PullError extends Error {
  readonly code: PullFailureCode;
  readonly context: PullErrorContext;

  constructor(args: { code: PullFailureCode; message: string; context?: PullErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "PullError";
    this.code = args.code;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
