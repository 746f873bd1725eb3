import { PullError } from "../errors/PullError";
import { MalformedXmlError, findElement, parseXml, textOf } from "../xml/xml";

/**
 * Stands in for an absent `lastUpdate` when comparing, so the empty cursor
 * sorts before any cursor carrying a real timestamp.
 */
export const SOME_OLD_DATE = new Date("2010-01-01T00:00:00.000Z");

const SOME_OLD_TIME = SOME_OLD_DATE.getTime();

export const CURSOR_NAMESPACE = "http://www.opendatakit.org/cursor";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const parseDateTime = (value: string | undefined): Date | undefined => {
  if (value === undefined) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

const buildCursorXml = (lastUpdate: Date, lastReturnedValue: string | undefined): string =>
  `<cursor xmlns="${CURSOR_NAMESPACE}">` +
  "<attributeName>_LAST_UPDATE_DATE</attributeName>" +
  `<attributeValue>${lastUpdate.toISOString()}</attributeValue>` +
  (lastReturnedValue === undefined
    ? "<uriLastReturnedValue/>"
    : `<uriLastReturnedValue>${escapeXmlText(lastReturnedValue)}</uriLastReturnedValue>`) +
  "<isForwardCursor>true</isForwardCursor>" +
  "</cursor>";

const escapeXmlText = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

/**
 * Opaque resumption token for the submission list. Immutable; ordered by
 * last update date and equal on (last update, last returned value).
 */
export class Cursor {
  private constructor(
    private readonly value: string,
    private readonly lastUpdateMs: number | undefined,
    readonly lastReturnedValue: string | undefined
  ) {
    Object.freeze(this);
  }

  /** A fresh copy on every read. */
  get lastUpdate(): Date | undefined {
    return this.lastUpdateMs === undefined ? undefined : new Date(this.lastUpdateMs);
  }

  static empty(): Cursor {
    return new Cursor("", undefined, undefined);
  }

  /**
   * Keeps `cursorXml` verbatim as the serialized form. Missing or blank
   * fields are tolerated; an unparsable date counts as absent.
   */
  static from(cursorXml: string): Cursor {
    const root = findElement(parseXml(cursorXml), "cursor");
    if (root === undefined) {
      throw new MalformedXmlError("Malformed cursor: missing <cursor> root element");
    }

    return new Cursor(
      cursorXml,
      parseDateTime(textOf(findElement(root, "attributeValue")))?.getTime(),
      textOf(findElement(root, "uriLastReturnedValue"))
    );
  }

  static of(lastUpdate: Date, lastReturnedValue?: string): Cursor {
    return new Cursor(buildCursorXml(lastUpdate, lastReturnedValue), lastUpdate.getTime(), lastReturnedValue);
  }

  /** `date` is a `YYYY-MM-DD` calendar day, taken at its UTC start. */
  static ofDate(date: string, lastReturnedValue?: string): Cursor {
    const day = date.trim();
    const startOfDay = DATE_ONLY.test(day) ? new Date(`${day}T00:00:00.000Z`) : undefined;
    // rejects days the calendar doesn't have, such as 2023-02-30
    if (
      startOfDay === undefined ||
      Number.isNaN(startOfDay.getTime()) ||
      startOfDay.toISOString().slice(0, 10) !== day
    ) {
      throw new Error(`Invalid start date "${date}", expected YYYY-MM-DD`);
    }
    return Cursor.of(startOfDay, lastReturnedValue);
  }

  static compare(a: Cursor, b: Cursor): number {
    const left = a.lastUpdateMs ?? SOME_OLD_TIME;
    const right = b.lastUpdateMs ?? SOME_OLD_TIME;
    return left === right ? 0 : left < right ? -1 : 1;
  }

  /** Last maximal cursor in iteration order, so later pages win ties. */
  static max(cursors: Iterable<Cursor>): Cursor {
    let max: Cursor | undefined;
    for (const cursor of cursors) {
      if (max === undefined || Cursor.compare(cursor, max) >= 0) max = cursor;
    }
    if (max === undefined) {
      throw new PullError({ code: "missing_cursor", message: "No cursor to choose from" });
    }
    return max;
  }

  get(): string {
    return this.value;
  }

  isEmpty(): boolean {
    return this.value === "" && this.lastUpdateMs === undefined && this.lastReturnedValue === undefined;
  }

  compareTo(other: Cursor): number {
    return Cursor.compare(this, other);
  }

  equals(other: Cursor): boolean {
    return this.lastUpdateMs === other.lastUpdateMs &&
      this.lastReturnedValue === other.lastReturnedValue;
  }
}
