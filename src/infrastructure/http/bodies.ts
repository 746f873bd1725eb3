import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { ResponseBody } from "../../ports/Http";
import { parseXml, type XmlNode } from "../../core/xml/xml";

export const asText = () => (body: ResponseBody): Promise<string> => body.text();

/** Parses the body; `mapper` also gets the text, for parts that must be kept as sent. */
export const asXml = <T>(mapper: (root: XmlNode, raw: string) => T) => async (body: ResponseBody): Promise<T> => {
  const raw = await body.text();
  return mapper(parseXml(raw), raw);
};

/** Writes the body to `target`, creating parent directories; yields the path. */
export const downloadTo = (target: string) => async (body: ResponseBody): Promise<string> => {
  const bytes = await body.bytes();
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, bytes);
  return target;
};
