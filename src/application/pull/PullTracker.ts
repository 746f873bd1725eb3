import { countInstanceIds, type InstanceIdBatch } from "../../core/batch/InstanceIdBatch";
import type { FormStatus, FormStatusEvent } from "../../core/form/FormStatus";
import type { MediaFile } from "../../core/media/MediaFile";
import { describeFailure, type Failure } from "../../ports/Http";

export type OnFormStatusEvent = (event: FormStatusEvent) => void;

type LogFields = Record<string, string | number | boolean | null>;

/**
 * Renders pull progress for one form as a status string, a JSON log line and
 * a status event. Only observes: nothing here decides what gets downloaded.
 */
export class PullTracker {
  private totalSubmissions = 0;
  private submissionCounter = 0;
  private readonly errorMessages: string[] = [];

  constructor(
    private readonly form: FormStatus,
    private readonly onEvent: OnFormStatusEvent
  ) {}

  trackFormDownloaded(): void {
    this.report("Downloaded form", "pull.form_downloaded");
  }

  trackBatches(batches: readonly InstanceIdBatch[]): void {
    this.totalSubmissions = countInstanceIds(batches);
    this.report(`Downloading ${this.totalSubmissions} submissions`, "pull.batches", {
      batches: batches.length,
      submissions: this.totalSubmissions
    });
  }

  trackSubmission(instanceId: string): void {
    this.submissionCounter += 1;
    this.report(`Downloaded submission ${this.submissionCounter} of ${this.totalSubmissions}`, "pull.submission_downloaded", {
      instanceId,
      count: this.submissionCounter,
      total: this.totalSubmissions
    });
  }

  trackMediaFiles(manifestCount: number, toDownloadCount: number): void {
    if (toDownloadCount > 0) {
      this.report(`Downloaded ${toDownloadCount} attachments`, "pull.media_files", { count: toDownloadCount });
    }
    if (manifestCount > toDownloadCount) {
      const ignored = manifestCount - toDownloadCount;
      this.report(`Ignoring ${ignored} attachments (already present)`, "pull.media_files_ignored", { count: ignored });
    }
  }

  formAttachmentDownloaded(mediaFile: MediaFile): void {
    this.report(`Downloaded form attachment ${mediaFile.filename}`, "pull.form_attachment_downloaded", {
      filename: mediaFile.filename
    });
  }

  submissionAttachmentDownloaded(instanceId: string, mediaFile: MediaFile): void {
    this.report(
      `Downloaded attachment ${mediaFile.filename} of submission ${instanceId}`,
      "pull.submission_attachment_downloaded",
      { instanceId, filename: mediaFile.filename }
    );
  }

  trackError(message: string, failure: Failure | Error): void {
    const reason = failure instanceof Error ? failure.message : describeFailure(failure);
    const statusString = `${message}: ${reason}`;
    this.errorMessages.push(statusString);
    this.form.statusString = statusString;
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "pull.error",
      formId: this.form.formId,
      message,
      reason,
      status: failure instanceof Error ? null : failure.status
    }));
    this.onEvent({ form: this.form, statusString });
  }

  trackCancellation(step: string): void {
    this.report(`Cancelled: ${step}`, "pull.cancelled", { step });
  }

  trackEnd(): void {
    this.report("Success", "pull.form_completed", {
      submissions: this.submissionCounter,
      errors: this.errorMessages.length
    });
  }

  submissionsDownloaded(): number {
    return this.submissionCounter;
  }

  errors(): readonly string[] {
    return this.errorMessages;
  }

  private report(statusString: string, event: string, fields: LogFields = {}): void {
    this.form.statusString = statusString;
    console.log(JSON.stringify({ event, formId: this.form.formId, ...fields }));
    this.onEvent({ form: this.form, statusString });
  }
}
