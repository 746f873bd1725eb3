import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { InstanceIdBatch } from "../../core/batch/InstanceIdBatch";
import { Cursor } from "../../core/cursor/Cursor";
import type { FormStatus } from "../../core/form/FormStatus";
import { SubmissionKeyGenerator } from "../../core/form/SubmissionKeyGenerator";
import { needsUpdate, type MediaFile } from "../../core/media/MediaFile";
import type { DownloadedSubmission } from "../../core/submission/DownloadedSubmission";
import type { AggregateServer } from "../../infrastructure/aggregate/AggregateServer";
import type { Http } from "../../ports/Http";
import type { OpenSubmissionStore, SubmissionStore } from "../../ports/SubmissionStore";
import { Job } from "../../shared/job/Job";
import type { RunnerStatus } from "../../shared/job/RunnerStatus";
import { isHttpUrl } from "../../shared/url/url";
import { DEFAULT_ENTRIES_PER_BATCH, InstanceIdBatchGetter } from "./InstanceIdBatchGetter";
import { withStore } from "./pull.error-handler";
import { PullResult } from "./PullResult";
import { PullTracker, type OnFormStatusEvent } from "./PullTracker";

export type PullFromAggregateDeps = {
  http: Http;
  server: AggregateServer;
  storageDir: string;
  includeIncomplete: boolean;
  entriesPerBatch?: number;
  openStore: OpenSubmissionStore;
  onEvent: OnFormStatusEvent;
};

type AttachmentOutcome = "downloaded" | "failed" | "cancelled";

const asError = (reason: unknown): Error => (reason instanceof Error ? reason : new Error(String(reason)));

const writeTextFile = async (target: string, content: string): Promise<void> => {
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content, "utf8");
};

/**
 * Pulls one form: its definition, its manifest media and every submission
 * the local store hasn't recorded yet, resuming from a cursor.
 *
 * Single writer per form: two pulls of the same form against the same store
 * race on has/put and must not run together.
 */
export class PullFromAggregate {
  private readonly entriesPerBatch: number;

  constructor(private readonly deps: PullFromAggregateDeps) {
    this.entriesPerBatch = deps.entriesPerBatch ?? DEFAULT_ENTRIES_PER_BATCH;
  }

  static getLastCursor(batches: readonly InstanceIdBatch[]): Cursor {
    return Cursor.max(batches.map((batch) => batch.cursor));
  }

  pull(form: FormStatus, lastCursor?: Cursor): Job<PullResult> {
    const tracker = new PullTracker(form, this.deps.onEvent);
    const startCursor = lastCursor ?? Cursor.empty();

    return Job.allOf(
      Job.supply((status) => this.downloadForm(form, status, tracker)),
      Job.supply((status) => this.getSubmissions(form, startCursor, status, tracker)),
      Job.supply((status) => this.getFormAttachments(form, status, tracker))
        .thenAccept(async (status, attachments) => {
          await Promise.all(attachments.map((attachment) => this.downloadFormAttachment(form, attachment, status, tracker)));
        })
    ).thenApply((status, [formXml, batches]) =>
      withStore(this.deps.openStore, form, async (store) => {
        const completed = await this.downloadSubmissions(form, formXml, batches, store, status, tracker);
        if (status.isStillRunning()) tracker.trackEnd();
        // only pages whose submissions were all attempted may move the cursor forward
        return PullResult.of(form, Cursor.max([startCursor, ...completed.map((batch) => batch.cursor)]));
      })
    );
  }

  async downloadForm(form: FormStatus, status: RunnerStatus, tracker: PullTracker): Promise<string | undefined> {
    if (status.isCancelled()) {
      tracker.trackCancellation("Download form");
      return undefined;
    }

    const response = await this.deps.http.execute(this.deps.server.getDownloadFormRequest(form.formId), status);
    if (!response.ok) {
      tracker.trackError("Error downloading form", response);
      return undefined;
    }

    const formXml = response.body;
    try {
      await writeTextFile(form.getFormFile(this.deps.storageDir), formXml);
    } catch (err) {
      tracker.trackError("Error writing form", asError(err));
      return formXml;
    }
    tracker.trackFormDownloaded();
    return formXml;
  }

  async getFormAttachments(form: FormStatus, status: RunnerStatus, tracker: PullTracker): Promise<MediaFile[]> {
    if (status.isCancelled()) {
      tracker.trackCancellation("Get form attachments");
      return [];
    }

    const manifestUrl = form.manifestUrl;
    if (!isHttpUrl(manifestUrl)) return [];

    const response = await this.deps.http.execute(this.deps.server.getManifestRequest(manifestUrl), status);
    if (!response.ok) {
      tracker.trackError("Error getting form attachments", response);
      return [];
    }

    const mediaDir = form.getFormMediaDir(this.deps.storageDir);
    const attachments = response.body;
    const toDownload: MediaFile[] = [];
    for (const attachment of attachments) {
      const outdated = await needsUpdate(attachment, mediaDir).catch((err: unknown) => {
        tracker.trackError(`Error checking form attachment ${attachment.filename}`, asError(err));
        return true;
      });
      if (outdated) toDownload.push(attachment);
    }
    tracker.trackMediaFiles(attachments.length, toDownload.length);
    return toDownload;
  }

  async getSubmissions(
    form: FormStatus,
    lastCursor: Cursor,
    status: RunnerStatus,
    tracker: PullTracker
  ): Promise<InstanceIdBatch[]> {
    if (status.isCancelled()) {
      tracker.trackCancellation("Get submissions");
      return [];
    }

    const batches: InstanceIdBatch[] = [];
    const batchPager = new InstanceIdBatchGetter(
      this.deps.server,
      this.deps.http,
      form.formId,
      this.deps.includeIncomplete,
      lastCursor,
      this.entriesPerBatch,
      status
    );
    while (status.isStillRunning() && await batchPager.hasNext()) {
      batches.push(batchPager.next());
    }

    const failure = batchPager.lastFailure();
    if (failure) tracker.trackError("Error getting submission list", failure);
    if (status.isCancelled()) tracker.trackCancellation("Get submissions");
    tracker.trackBatches(batches);
    return batches;
  }

  async downloadFormAttachment(
    form: FormStatus,
    mediaFile: MediaFile,
    status: RunnerStatus,
    tracker: PullTracker
  ): Promise<AttachmentOutcome> {
    if (status.isCancelled()) {
      tracker.trackCancellation(`Download form attachment ${mediaFile.filename}`);
      return "cancelled";
    }

    const target = form.getFormMediaFile(this.deps.storageDir, mediaFile.filename);
    const response = await this.deps.http.execute(
      this.deps.server.getDownloadAttachmentRequest(mediaFile.downloadUrl, target),
      status
    );
    if (!response.ok) {
      tracker.trackError(`Error downloading form attachment ${mediaFile.filename}`, response);
      return "failed";
    }
    tracker.formAttachmentDownloaded(mediaFile);
    return "downloaded";
  }

  async downloadSubmission(
    form: FormStatus,
    instanceId: string,
    subKeyGen: SubmissionKeyGenerator,
    status: RunnerStatus,
    tracker: PullTracker
  ): Promise<DownloadedSubmission | undefined> {
    if (status.isCancelled()) {
      tracker.trackCancellation(`Download submission ${instanceId}`);
      return undefined;
    }

    const response = await this.deps.http.execute(
      this.deps.server.getDownloadSubmissionRequest(subKeyGen.buildKey(instanceId)),
      status
    );
    if (!response.ok) {
      tracker.trackError(`Error downloading submission ${instanceId}`, response);
      return undefined;
    }

    const submission = response.body;
    try {
      await writeTextFile(form.getSubmissionFile(this.deps.storageDir, submission.instanceId), submission.xml);
    } catch (err) {
      tracker.trackError(`Error writing submission ${instanceId}`, asError(err));
      return undefined;
    }
    tracker.trackSubmission(submission.instanceId);
    return submission;
  }

  async downloadSubmissionAttachment(
    form: FormStatus,
    submission: DownloadedSubmission,
    attachment: MediaFile,
    status: RunnerStatus,
    tracker: PullTracker
  ): Promise<AttachmentOutcome> {
    if (status.isCancelled()) {
      tracker.trackCancellation(`Download submission attachment ${attachment.filename} of ${submission.instanceId}`);
      return "cancelled";
    }

    const target = form.getSubmissionMediaFile(this.deps.storageDir, submission.instanceId, attachment.filename);
    const response = await this.deps.http.execute(
      this.deps.server.getDownloadAttachmentRequest(attachment.downloadUrl, target),
      status
    );
    if (!response.ok) {
      tracker.trackError(
        `Error downloading attachment ${attachment.filename} of submission ${submission.instanceId}`,
        response
      );
      return "failed";
    }
    tracker.submissionAttachmentDownloaded(submission.instanceId, attachment);
    return "downloaded";
  }

  /**
   * Downloads every unrecorded instance in batch order and returns the
   * batches that were fully attempted before any cancellation.
   */
  private async downloadSubmissions(
    form: FormStatus,
    formXml: string | undefined,
    batches: readonly InstanceIdBatch[],
    store: SubmissionStore,
    status: RunnerStatus,
    tracker: PullTracker
  ): Promise<InstanceIdBatch[]> {
    if (batches.length === 0) return [];

    let subKeyGen: SubmissionKeyGenerator;
    try {
      subKeyGen = SubmissionKeyGenerator.from(formXml);
    } catch (err) {
      if (status.isCancelled()) {
        tracker.trackCancellation("Download submissions");
      } else {
        tracker.trackError("Skipping submissions", asError(err));
      }
      return [];
    }

    const completed: InstanceIdBatch[] = [];
    for (const batch of batches) {
      for (const instanceId of batch.instanceIds) {
        if (await store.hasRecordedInstance(instanceId) !== null) continue;

        const submission = await this.downloadSubmission(form, instanceId, subKeyGen, status, tracker);
        if (submission === undefined) {
          if (status.isCancelled()) return completed;
          continue;
        }

        const outcomes: AttachmentOutcome[] = [];
        for (const attachment of submission.attachments) {
          outcomes.push(await this.downloadSubmissionAttachment(form, submission, attachment, status, tracker));
        }
        if (outcomes.includes("cancelled")) return completed;

        await store.putRecordedInstanceDirectory(
          submission.instanceId,
          form.getSubmissionDir(this.deps.storageDir, submission.instanceId)
        );
      }
      completed.push(batch);
    }
    return completed;
  }
}
