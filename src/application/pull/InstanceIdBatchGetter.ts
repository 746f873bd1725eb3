import { instanceIdBatch, type InstanceIdBatch } from "../../core/batch/InstanceIdBatch";
import { Cursor } from "../../core/cursor/Cursor";
import { findElement, findElements, findRawElement, isXmlNode, textOf, type XmlDocument, type XmlNode } from "../../core/xml/xml";
import type { Failure, Http } from "../../ports/Http";
import type { AggregateServer } from "../../infrastructure/aggregate/AggregateServer";
import type { RunnerStatus } from "../../shared/job/RunnerStatus";

export const DEFAULT_ENTRIES_PER_BATCH = 100;

// the cursor comes either escaped as text or as nested markup, kept as written
const readResumptionCursor = (chunk: XmlNode | undefined, raw: string, fallback: Cursor): Cursor => {
  const element = findElement(chunk, "resumptionCursor");
  const nested = findElement(element, "cursor") === undefined
    ? undefined
    : findRawElement(raw, "idChunk", "resumptionCursor", "cursor");
  const cursorXml = nested === undefined ? textOf(element) : nested.markup;
  if (cursorXml === undefined) return fallback;
  try {
    return Cursor.from(cursorXml);
  } catch {
    return fallback;
  }
};

/**
 * Parses one `<idChunk>` page. Blank ids are dropped; a missing or unreadable
 * resumption cursor keeps `currentCursor`.
 */
export const parseIdChunk = (document: XmlDocument, currentCursor: Cursor): InstanceIdBatch => {
  const chunk = findElement(document.root, "idChunk");
  const idChunk = isXmlNode(chunk) ? chunk : undefined;
  const instanceIds = findElements(findElement(idChunk, "idList"), "id").flatMap((id) => {
    const value = textOf(id);
    return value === undefined ? [] : [value];
  });
  return instanceIdBatch(instanceIds, readResumptionCursor(idChunk, document.raw, currentCursor));
};

/**
 * Lazy walk over the submission list. Each `hasNext()` without a buffered
 * page costs exactly one request; the walk ends on a page with no new ids or
 * on a failed request.
 */
export class InstanceIdBatchGetter implements AsyncIterable<InstanceIdBatch> {
  private cursor: Cursor;
  private buffered?: InstanceIdBatch;
  private finished = false;
  private failure?: Failure;
  private readonly seenIds = new Set<string>();

  constructor(
    private readonly server: AggregateServer,
    private readonly http: Http,
    private readonly formId: string,
    private readonly includeIncomplete: boolean,
    startCursor: Cursor,
    private readonly entriesPerBatch = DEFAULT_ENTRIES_PER_BATCH,
    private readonly runnerStatus?: RunnerStatus
  ) {
    this.cursor = startCursor;
  }

  async hasNext(): Promise<boolean> {
    if (this.buffered) return true;
    if (this.finished) return false;

    const response = await this.http.execute(
      this.server.getInstanceIdBatchRequest(this.formId, this.entriesPerBatch, this.cursor, this.includeIncomplete),
      this.runnerStatus
    );
    if (!response.ok) {
      this.failure = response;
      this.finished = true;
      return false;
    }

    const page = parseIdChunk(response.body, this.cursor);
    const newIds = page.instanceIds.filter((id) => !this.seenIds.has(id));
    if (newIds.length === 0) {
      this.finished = true;
      return false;
    }

    newIds.forEach((id) => this.seenIds.add(id));
    this.buffered = instanceIdBatch(newIds, page.cursor);
    return true;
  }

  next(): InstanceIdBatch {
    const batch = this.buffered;
    if (batch === undefined) {
      throw new Error("No batch available, call hasNext() first");
    }
    this.buffered = undefined;
    this.cursor = batch.cursor;
    return batch;
  }

  currentCursor(): Cursor {
    return this.cursor;
  }

  /** The response that ended the walk early, if any. */
  lastFailure(): Failure | undefined {
    return this.failure;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<InstanceIdBatch> {
    while (await this.hasNext()) {
      yield this.next();
    }
  }
}
