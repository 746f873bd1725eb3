import { XMLParser } from "fast-xml-parser";

export type XmlValue = string | XmlNode | XmlValue[];
export interface XmlNode {
  [key: string]: XmlValue;
}

export class MalformedXmlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedXmlError";
  }
}

const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true
});

export const isXmlNode = (value: unknown): value is XmlNode =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isElementKey = (key: string) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY;

export const parseXml = (xml: string): XmlNode => {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (err) {
    throw new MalformedXmlError(`Malformed XML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isXmlNode(parsed) || Object.keys(parsed).length === 0) {
    throw new MalformedXmlError("Malformed XML: no root element");
  }
  return parsed;
};

/** Elements named `name` directly below `node`, repeated or not. */
export const findElements = (node: XmlValue | undefined, name: string): XmlValue[] => {
  if (node === undefined || !isXmlNode(node)) return [];
  const value = node[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
};

export const findElement = (node: XmlValue | undefined, ...path: string[]): XmlValue | undefined => {
  let current = node;
  for (const name of path) {
    current = findElements(current, name)[0];
    if (current === undefined) return undefined;
  }
  return current;
};

/** Trimmed text content, or undefined when the element is absent or blank. */
export const textOf = (value: XmlValue | undefined): string | undefined => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (isXmlNode(value)) return textOf(value[TEXT_KEY]);
  return undefined;
};

export const attributeOf = (value: XmlValue | undefined, name: string): string | undefined =>
  isXmlNode(value) ? textOf(value[`${ATTRIBUTE_PREFIX}${name}`]) : undefined;

/** Child element names in document order, attributes and text excluded. */
export const childElementNames = (value: XmlValue | undefined): string[] =>
  isXmlNode(value) ? Object.keys(value).filter(isElementKey) : [];

/** A parsed document together with the text it was parsed from. */
export type XmlDocument = {
  readonly root: XmlNode;
  readonly raw: string;
};

export const parseXmlDocument = (raw: string): XmlDocument => ({ root: parseXml(raw), raw });

/**
 * An element exactly as it appears in the source text, plus the namespace
 * declarations it relies on from its ancestors and doesn't repeat itself.
 */
export type RawElement = {
  readonly markup: string;
  readonly inheritedNamespaces: ReadonlyMap<string, string>;
};

// comments, CDATA, processing instructions and doctype are skipped; the last
// alternative captures a start, end or empty-element tag
const MARKUP =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>|<(\/?)([^\s/>!?]+)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;
const NAMESPACE_DECLARATION = /(?:^|\s)(xmlns(?::[^\s=]+)?)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

const localName = (qualifiedName: string) => qualifiedName.slice(qualifiedName.indexOf(":") + 1);

const declaredNamespaces = (attributes: string): Map<string, string> =>
  new Map(Array.from(attributes.matchAll(NAMESPACE_DECLARATION), (match): [string, string] =>
    [match[1], match[2] ?? match[3] ?? ""]));

/**
 * Finds the first element at `path` (local names from the document root) in
 * `raw` and returns its source text untouched. `raw` must be well-formed; run
 * it through `parseXml` first.
 */
export const findRawElement = (raw: string, ...path: string[]): RawElement | undefined => {
  const open: Array<{ name: string; namespaces: Map<string, string> }> = [];
  let found: { depth: number; start: number; inheritedNamespaces: Map<string, string> } | undefined;

  for (const match of raw.matchAll(MARKUP)) {
    const [tag, closing, qualifiedName, attributes = "", selfClosing] = match;
    if (qualifiedName === undefined) continue;
    const index = match.index ?? 0;

    if (closing === "/") {
      open.pop();
      if (found !== undefined && open.length === found.depth) {
        return { markup: raw.slice(found.start, index + tag.length), inheritedNamespaces: found.inheritedNamespaces };
      }
      continue;
    }

    const namespaces = declaredNamespaces(attributes);
    open.push({ name: localName(qualifiedName), namespaces });
    const atPath = open.length === path.length && open.every((element, depth) => element.name === path[depth]);
    if (found === undefined && atPath) {
      const inherited = new Map<string, string>();
      for (const ancestor of open.slice(0, -1)) {
        ancestor.namespaces.forEach((uri, prefix) => inherited.set(prefix, uri));
      }
      namespaces.forEach((_, prefix) => inherited.delete(prefix));
      if (selfClosing === "/") return { markup: tag, inheritedNamespaces: inherited };
      found = { depth: open.length - 1, start: index, inheritedNamespaces: inherited };
    }
    if (selfClosing === "/") open.pop();
  }
  return undefined;
};

// values are carried as written in the source, entity references included
const quoteAttribute = (value: string) => (value.includes('"') ? `'${value}'` : `"${value}"`);

/** `element.markup` with its inherited declarations added to its start tag, so it stands alone. */
export const standaloneMarkup = (element: RawElement): string => {
  if (element.inheritedNamespaces.size === 0) return element.markup;
  const declarations = Array.from(element.inheritedNamespaces, ([prefix, uri]) => ` ${prefix}=${quoteAttribute(uri)}`).join("");
  return element.markup.replace(/^<[^\s/>]+/, (startOfTag) => `${startOfTag}${declarations}`);
};
