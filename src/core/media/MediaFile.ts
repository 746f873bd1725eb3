import { createHash } from "crypto";
import { readFile } from "fs/promises";
import path from "path";
import { isHttpUrl } from "../../shared/url/url";
import { findElement, findElements, textOf, type XmlValue } from "../xml/xml";

export type MediaFile = {
  readonly filename: string;
  readonly hash: string;
  readonly downloadUrl: string;
};

export const mediaFile = (filename: string, hash: string, downloadUrl: string): MediaFile =>
  Object.freeze({ filename, hash, downloadUrl });

const escapesTarget = (filename: string) =>
  path.isAbsolute(filename) || filename.split(/[\\/]/).some((segment) => segment === "..");

/**
 * Entries missing any of filename, hash or an absolute http(s) downloadUrl
 * are dropped, as are filenames that would land outside the target directory.
 */
export const asMediaFileList = (elements: XmlValue[]): MediaFile[] =>
  elements.flatMap((element) => {
    const filename = textOf(findElement(element, "filename"));
    const hash = textOf(findElement(element, "hash"));
    const downloadUrl = textOf(findElement(element, "downloadUrl"));
    if (filename === undefined || hash === undefined || !isHttpUrl(downloadUrl)) return [];
    if (escapesTarget(filename)) return [];
    return [mediaFile(filename, hash, downloadUrl)];
  });

export const parseManifest = (root: XmlValue): MediaFile[] =>
  asMediaFileList(findElements(findElement(root, "manifest"), "mediaFile"));

const normalizeHash = (hash: string) => hash.trim().toLowerCase().replace(/^md5:/, "");

export const md5Of = (content: Buffer | string): string => createHash("md5").update(content).digest("hex");

/** True when the local copy in `mediaDir` is missing or its MD5 differs. */
export const needsUpdate = async (file: MediaFile, mediaDir: string): Promise<boolean> => {
  let content: Buffer;
  try {
    content = await readFile(path.join(mediaDir, file.filename));
  } catch (err) {
    if (isMissingFileError(err)) return true;
    throw err;
  }
  return md5Of(content) !== normalizeHash(file.hash);
};

const isMissingFileError = (err: unknown): boolean =>
  err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
