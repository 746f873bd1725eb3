import type { Cursor } from "../../core/cursor/Cursor";
import { PullError } from "../../core/errors/PullError";
import type { FormStatus } from "../../core/form/FormStatus";

export class PullResult {
  private constructor(
    readonly form: FormStatus,
    private readonly lastCursor: Cursor | undefined
  ) {}

  static of(form: FormStatus, lastCursor?: Cursor): PullResult {
    return new PullResult(form, lastCursor);
  }

  hasLastCursor(): boolean {
    return this.lastCursor !== undefined;
  }

  getLastCursor(): Cursor {
    if (this.lastCursor === undefined) {
      throw new PullError({
        code: "missing_cursor",
        message: `Pull of form ${this.form.formId} has no cursor`,
        context: { formId: this.form.formId }
      });
    }
    return this.lastCursor;
  }
}
