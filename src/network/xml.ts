import { XMLParser } from "fast-xml-parser";
import { errorMessage } from "../debug";

export type XmlRecord = Record<string, unknown>;

const REPEATED_TAGS = new Set(["junction", "edge", "lane", "vType", "route", "vehicle", "flow"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  isArray: (tagName: string, _jPath: string, _isLeaf: boolean, isAttribute: boolean) =>
    !isAttribute && REPEATED_TAGS.has(tagName)
});

export function parseXmlDocument(xml: string, label: string): XmlRecord {
  if (!xml.trim()) {
    throw new Error(`${label} is empty.`);
  }
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw new Error(`${label} is not valid XML: ${errorMessage(error)}`);
  }
  const root = asRecord(parsed);
  if (!root) {
    throw new Error(`${label} has no document element.`);
  }
  return root;
}

export function isXmlRecord(value: unknown): value is XmlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): XmlRecord | null {
  return isXmlRecord(value) ? value : null;
}

export function childRecords(parent: XmlRecord, tag: string): XmlRecord[] {
  const value = parent[tag];
  if (!Array.isArray(value)) {
    const single = asRecord(value);
    return single ? [single] : [];
  }
  const records: XmlRecord[] = [];
  for (const item of value) {
    const record = asRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

export function readString(record: XmlRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

export function readNumber(record: XmlRecord, key: string): number | null {
  const raw = readString(record, key);
  if (raw === null) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}
