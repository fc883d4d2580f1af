/**
 * Minimal ordered XML tree over fast-xml-parser.
 *
 * PubMed titles and abstracts carry inline markup (<i>, <sup>, ...), so the
 * parser runs in preserveOrder mode and text is reassembled in document order.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

export interface XmlElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | string;

export class XmlPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XmlPayloadError";
  }
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isObject(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    attributes[key] = String(value);
  }
  return attributes;
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const items: unknown[] = raw;
  const nodes: XmlNode[] = [];
  for (const item of items) {
    if (!isObject(item)) {
      continue;
    }
    for (const [key, value] of Object.entries(item)) {
      if (key === ":@") {
        continue;
      }
      if (key === "#text") {
        nodes.push(String(value));
        continue;
      }
      nodes.push({
        name: key,
        attributes: toAttributes(item[":@"]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

/**
 * Parse an XML document into a synthetic root element.
 * Throws XmlPayloadError if the document is not well formed.
 */
export function parseXml(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlPayloadError(
      `Malformed XML at line ${validation.err.line}: ${validation.err.msg}`
    );
  }
  const parsed: unknown = parser.parse(xml);
  return { name: "#document", attributes: {}, children: toNodes(parsed) };
}

export function elements(node: XmlElement): XmlElement[] {
  return node.children.filter((child): child is XmlElement => typeof child !== "string");
}

function descendants(node: XmlElement, name: string, out: XmlElement[]): void {
  for (const child of elements(node)) {
    if (child.name === name) {
      out.push(child);
    }
    descendants(child, name, out);
  }
}

/**
 * Select elements by a slash-separated path. The first segment matches at any
 * depth below `node`; later segments match direct children only.
 */
export function selectAll(node: XmlElement, path: string): XmlElement[] {
  const [first, ...rest] = path.split("/");
  if (first === undefined || first === "") {
    return [];
  }
  let current: XmlElement[] = [];
  descendants(node, first, current);
  for (const segment of rest) {
    current = current.flatMap((el) => elements(el).filter((child) => child.name === segment));
  }
  return current;
}

export function select(node: XmlElement, path: string): XmlElement | undefined {
  return selectAll(node, path)[0];
}

/**
 * Concatenated text of the element and all its descendants, in document order.
 */
export function innerText(node: XmlElement): string {
  return node.children
    .map((child) => (typeof child === "string" ? child : innerText(child)))
    .join("");
}

/**
 * Trimmed text of the first direct child with the given name, or "".
 */
export function childText(node: XmlElement, name: string): string {
  const child = elements(node).find((el) => el.name === name);
  return child ? innerText(child).trim() : "";
}
