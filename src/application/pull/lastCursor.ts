import { Cursor } from "../../core/cursor/Cursor";
import type { FormStatus } from "../../core/form/FormStatus";
import type { PreferenceStore } from "../../ports/PreferenceStore";

export const LAST_CURSOR_KEY_SUFFIX = "-last-cursor";

export const lastCursorKey = (formId: string) => `${formId}${LAST_CURSOR_KEY_SUFFIX}`;

/** The stored cursor for `formId`; unreadable or empty entries count as none. */
export const readLastCursor = async (prefs: PreferenceStore, formId: string): Promise<Cursor | undefined> => {
  const stored = await prefs.get(lastCursorKey(formId));
  if (stored === undefined || stored.trim() === "") return undefined;
  try {
    return Cursor.from(stored);
  } catch {
    return undefined;
  }
};

export const storeLastCursor = async (prefs: PreferenceStore, form: FormStatus, cursor: Cursor): Promise<void> => {
  if (cursor.isEmpty()) {
    await prefs.remove(lastCursorKey(form.formId));
    return;
  }
  await prefs.put(lastCursorKey(form.formId), cursor.get());
};

/**
 * Starting point of a pull: an explicit start date wins, then the stored
 * cursor when resuming, else a full pull.
 */
export const resolveStartCursor = async (args: {
  prefs: PreferenceStore;
  formId: string;
  resumeLastPull: boolean;
  startFromDate?: string;
}): Promise<Cursor | undefined> => {
  if (args.startFromDate !== undefined) return Cursor.ofDate(args.startFromDate);
  if (!args.resumeLastPull) return undefined;
  return readLastCursor(args.prefs, args.formId);
};
