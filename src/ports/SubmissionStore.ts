import type { FormStatus } from "../core/form/FormStatus";

/**
 * Local record of instances already fully downloaded for one form.
 * has/put is check-then-act: a form must have a single pull writing at a time.
 */
export interface SubmissionStore {
  /** Directory recorded for the instance, or null when it was never pulled. */
  hasRecordedInstance(instanceId: string): Promise<string | null>;
  putRecordedInstanceDirectory(instanceId: string, directory: string): Promise<void>;
  close(): Promise<void>;
}

export type OpenSubmissionStore = (form: FormStatus) => Promise<SubmissionStore>;
