import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DomUtils, parseDocument } from "htmlparser2";
import { feedParseFailed } from "../errors/catalog.js";
import {
  DEFAULT_PUBLISHED,
  DEFAULT_TITLE,
  UNPARSEABLE_DESCRIPTION,
  type ShowRecord,
} from "./types.js";

// ---------------------------------------------------------------------------
// Parser Setup
// ---------------------------------------------------------------------------

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

const XML_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  // Values stay strings; a numeric-looking title must not become a number
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name: string) => name === "item",
  // Kept as raw inner markup; see descriptionOf
  stopNodes: ["*.description"],
};

const xmlParser = new XMLParser(XML_OPTIONS);
const utf8 = new TextDecoder("utf-8");

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function first(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

// ---------------------------------------------------------------------------
// Field Extraction
// ---------------------------------------------------------------------------

/**
 * Text of an element that may have been parsed as a plain string,
 * a node with attributes, or a repeated element.
 */
function textOf(value: unknown): string | undefined {
  const single = first(value);
  if (typeof single === "string") return single.trim();
  if (typeof single === "number" || typeof single === "boolean") return String(single);
  if (isNode(single)) return textOf(single[TEXT_NODE]);
  return undefined;
}

/**
 * Undecoded inner XML of a description, with or without attributes.
 */
function rawContentOf(value: unknown): string {
  const single = first(value);
  if (typeof single === "string") return single;
  if (isNode(single)) return rawContentOf(single[TEXT_NODE]);
  return "";
}

/**
 * Resolve the XML layer of a description into the HTML it carries.
 * Escaped text and CDATA become their decoded text; child elements are
 * serialised back to markup in document order.
 */
export function descriptionHtml(rawXml: string): string {
  if (rawXml.trim() === "") {
    return "";
  }

  const fragment = parseDocument(rawXml, { xmlMode: true });
  return fragment.children
    .map((child) => {
      if (DomUtils.isText(child) || DomUtils.isCDATA(child)) return DomUtils.textContent(child);
      if (DomUtils.isTag(child)) return DomUtils.getOuterHTML(child);
      return "";
    })
    .join("");
}

/**
 * Trimmed text content of the first paragraph of an HTML fragment.
 */
export function extractFirstParagraph(html: string): string {
  if (html.trim() === "") {
    return "";
  }

  const document = parseDocument(html);
  const paragraph = DomUtils.findOne((element) => element.name === "p", document.children);
  return paragraph ? DomUtils.textContent(paragraph).trim() : "";
}

/**
 * First paragraph of an item's description. Should the HTML tooling
 * throw, the item gets a fixed placeholder instead of failing the feed.
 */
function descriptionOf(value: unknown): string {
  try {
    return extractFirstParagraph(descriptionHtml(rawContentOf(value)));
  } catch {
    return UNPARSEABLE_DESCRIPTION;
  }
}

/**
 * Byte length from an enclosure attribute. Only plain non-negative integers
 * are accepted; anything else counts as unknown.
 */
export function parseLength(value: unknown): number {
  const text = textOf(value);
  if (text === undefined || !/^\d+$/.test(text)) {
    return 0;
  }
  const length = Number(text);
  return Number.isSafeInteger(length) ? length : 0;
}

/**
 * Milliseconds since epoch for an RFC 822 date, or 0 when unparseable.
 */
export function parsePublished(raw: string): number {
  const timestamp = Date.parse(raw);
  return Number.isNaN(timestamp) ? 0 : timestamp;
}

function toShowRecord(item: unknown): ShowRecord {
  const node: XmlNode = isNode(item) ? item : {};

  const title = textOf(node.title);
  const published = textOf(node.pubDate);
  const enclosure = first(node.enclosure);
  const attributes: XmlNode = isNode(enclosure) ? enclosure : {};

  const publishedRaw = published ? published : DEFAULT_PUBLISHED;

  return Object.freeze({
    title: title ? title : DEFAULT_TITLE,
    description: descriptionOf(node.description),
    link: textOf(attributes[`${ATTRIBUTE_PREFIX}url`]) ?? "",
    publishedRaw,
    publishedTimestamp: parsePublished(publishedRaw),
    lengthBytes: parseLength(attributes[`${ATTRIBUTE_PREFIX}length`]),
  });
}

// ---------------------------------------------------------------------------
// Document Traversal
// ---------------------------------------------------------------------------

/**
 * Collect every item element in document order, wherever it sits
 * (RSS 2.0 keeps items under channel, RSS 1.0 beside it).
 */
function collectItems(node: unknown, items: unknown[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectItems(child, items);
    return;
  }
  if (!isNode(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_NODE) continue;
    if (key === "item") {
      items.push(...(Array.isArray(value) ? value : [value]));
    } else {
      collectItems(value, items);
    }
  }
}

/**
 * Parse a feed document into show records, one per item, in document order.
 *
 * Throws a FEED_PARSE_FAILED CLIError only when the document is not
 * well-formed XML or has no root element. Items with missing or malformed
 * fields still produce a fully defaulted record.
 */
export function parseFeed(feed: Uint8Array | string): ShowRecord[] {
  const xml = typeof feed === "string" ? feed : utf8.decode(feed);

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw feedParseFailed(`${msg} (line ${line}, column ${col})`);
  }

  const document: unknown = xmlParser.parse(xml);
  const roots = isNode(document)
    ? Object.keys(document).filter((key) => !key.startsWith("?"))
    : [];
  if (roots.length === 0) {
    throw feedParseFailed("The document has no root element");
  }

  const items: unknown[] = [];
  collectItems(document, items);
  return items.map(toShowRecord);
}
