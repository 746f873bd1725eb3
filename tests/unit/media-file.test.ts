import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { asMediaFileList, md5Of, mediaFile, needsUpdate, parseManifest } from "../../src/core/media/MediaFile";
import { findElements, parseXml } from "../../src/core/xml/xml";

const entry = (filename: string, hash: string, downloadUrl: string) =>
  `<mediaFile><filename>${filename}</filename><hash>${hash}</hash><downloadUrl>${downloadUrl}</downloadUrl></mediaFile>`;

describe("media file lists", () => {
  it("parses manifest entries", () => {
    const root = parseXml(
      `<manifest xmlns="http://openrosa.org/xforms/xformsManifest">${entry("logo.png", "md5:abc", "http://media.local/logo.png")}</manifest>`
    );

    expect(parseManifest(root)).toEqual([mediaFile("logo.png", "md5:abc", "http://media.local/logo.png")]);
  });

  it("drops incomplete entries and paths that leave the target directory", () => {
    const root = parseXml(
      "<manifest>" +
      entry("ok.png", "md5:1", "https://media.local/ok.png") +
      "<mediaFile><filename>nohash.png</filename><downloadUrl>http://media.local/nohash.png</downloadUrl></mediaFile>" +
      entry("relative.png", "md5:2", "files/relative.png") +
      entry("ftp.png", "md5:3", "ftp://media.local/ftp.png") +
      entry("../escape.png", "md5:4", "http://media.local/escape.png") +
      entry("/etc/absolute.png", "md5:5", "http://media.local/absolute.png") +
      entry("nested/inner.png", "md5:6", "http://media.local/inner.png") +
      "</manifest>"
    );

    expect(asMediaFileList(findElements(root.manifest, "mediaFile")).map((file) => file.filename))
      .toEqual(["ok.png", "nested/inner.png"]);
  });

  it("returns nothing for an empty manifest", () => {
    expect(parseManifest(parseXml("<manifest/>"))).toEqual([]);
  });

  it("computes md5 hex digests", () => {
    expect(md5Of("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });
});

describe("needsUpdate", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "media-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("is true when the local file is missing", async () => {
    await expect(needsUpdate(mediaFile("logo.png", "md5:abc", "http://media.local/logo.png"), dir)).resolves.toBe(true);
    await expect(needsUpdate(mediaFile("logo.png", "md5:abc", "http://media.local/logo.png"), path.join(dir, "none")))
      .resolves.toBe(true);
  });

  it("is false when the local md5 matches, whatever the prefix or case", async () => {
    await writeFile(path.join(dir, "logo.png"), "logo-bytes");
    const hash = md5Of("logo-bytes");

    await expect(needsUpdate(mediaFile("logo.png", `md5:${hash}`, "http://media.local/logo.png"), dir)).resolves.toBe(false);
    await expect(needsUpdate(mediaFile("logo.png", hash.toUpperCase(), "http://media.local/logo.png"), dir)).resolves.toBe(false);
  });

  it("is true when the local content differs", async () => {
    await writeFile(path.join(dir, "logo.png"), "old-bytes");

    await expect(needsUpdate(mediaFile("logo.png", `md5:${md5Of("new-bytes")}`, "http://media.local/logo.png"), dir))
      .resolves.toBe(true);
  });

  it("propagates read errors other than a missing file", async () => {
    await mkdir(path.join(dir, "logo.png"));

    await expect(needsUpdate(mediaFile("logo.png", "md5:abc", "http://media.local/logo.png"), dir)).rejects.toThrow();
  });
});
