import { isAbsolute, relative } from "path";
import { ParseError } from "../errors.js";
import { localDate, parseDateString, parseYearlessDate } from "../outline/timestamp.js";
import { OutlineDocument } from "../outline/types.js";
import { Contact, ContactSettings, LabeledValue } from "./types.js";

const PAIR_PATTERN = /\(\s*"((?:[^"\\]|\\.)*)"\s*(?:\.\s*)?"((?:[^"\\]|\\.)*)"\s*\)/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unescape(text: string): string {
  return text.replace(/\\(.)/g, "$1");
}

export function getProperty(document: OutlineDocument, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(document.frontmatter, key)
    ? document.frontmatter[key]
    : undefined;
}

/** True when `key` is declared, even if its value is empty. */
export function hasProperty(document: OutlineDocument, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(document.frontmatter, key);
}

export function getContactName(document: OutlineDocument): string | undefined {
  const title = getProperty(document, "title");
  if (typeof title !== "string" && typeof title !== "number") {
    return undefined;
  }
  const name = String(title).trim();
  return name === "" ? undefined : name;
}

export function getTags(document: OutlineDocument): string[] {
  const tags = getProperty(document, "tags");
  if (Array.isArray(tags)) {
    return tags.map((tag) => String(tag).trim()).filter(Boolean);
  }
  if (typeof tags === "string") {
    return tags.split(/[\s,:]+/).filter(Boolean);
  }
  return [];
}

/**
 * Parses the birthday property into a local date. YAML timestamps come back
 * from the front matter parser as UTC instants and are read as wall-clock
 * fields. A month and day without a year lands in the placeholder year.
 */
export function getBirthday(document: OutlineDocument, key: string): Date {
  const value = getProperty(document, key);
  const fail = (shown: string): never => {
    throw new ParseError(
      `Invalid ${key} in ${document.filePath ?? "(unsaved document)"}: "${shown}" is not a date`,
      { documentPath: document.filePath, property: key }
    );
  };

  if (value instanceof Date) {
    const date = Number.isNaN(value.getTime())
      ? undefined
      : localDate(
          value.getUTCFullYear(),
          value.getUTCMonth() + 1,
          value.getUTCDate(),
          value.getUTCHours(),
          value.getUTCMinutes(),
          value.getUTCSeconds()
        );
    return date ?? fail(String(value));
  }

  if (typeof value === "string") {
    return parseDateString(value) ?? parseYearlessDate(value) ?? fail(value);
  }

  return fail(value === null || value === undefined ? "" : String(value));
}

function toLabeledValue(entry: unknown): LabeledValue | null {
  if (isRecord(entry)) {
    const value = entry.value;
    if (value === undefined || value === null) {
      return null;
    }
    const label = entry.label;
    return {
      label: typeof label === "string" ? label : "",
      value: String(value),
    };
  }

  if (typeof entry === "string" || typeof entry === "number") {
    const text = String(entry).trim();
    if (text === "") {
      return null;
    }
    const separator = text.indexOf(": ");
    return separator === -1
      ? { label: "", value: text }
      : { label: text.slice(0, separator).trim(), value: text.slice(separator + 2).trim() };
  }

  return null;
}

/**
 * Reads a list of label/value pairs, written either as a YAML list or as
 * the literal form `("home" "jane@example.com") ("work" "jane@work.example")`.
 */
export function getLabeledValues(document: OutlineDocument, key: string): LabeledValue[] {
  const value = getProperty(document, key);

  if (Array.isArray(value)) {
    return value.map(toLabeledValue).filter((entry): entry is LabeledValue => entry !== null);
  }

  if (typeof value === "string") {
    const pairs = [...value.matchAll(PAIR_PATTERN)].map((match) => ({
      label: unescape(match[1]),
      value: unescape(match[2]),
    }));
    if (pairs.length > 0) {
      return pairs;
    }
    const single = toLabeledValue(value);
    return single ? [single] : [];
  }

  const single = toLabeledValue(value);
  return single ? [single] : [];
}

function isInside(directory: string, filePath: string): boolean {
  const rel = relative(directory, filePath);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/** Managed contacts live under the contacts directory and carry the contact tag. */
export function isContactDocument(document: OutlineDocument, settings: ContactSettings): boolean {
  if (!document.filePath || !isInside(settings.contactsDirectory, document.filePath)) {
    return false;
  }
  return getTags(document).includes(settings.contactTag);
}

/**
 * Builds the contact view of a document. Returns null for documents that are
 * not managed contacts; an unreadable birthday is reported through `onError`
 * and left out.
 */
export function readContact(
  document: OutlineDocument,
  settings: ContactSettings,
  onError: (error: ParseError) => void = () => undefined
): Contact | null {
  if (!document.filePath || !isContactDocument(document, settings)) {
    return null;
  }

  const keys = settings.propertyKeys;
  let birthday: Date | undefined;
  if (hasProperty(document, keys.birthday)) {
    try {
      birthday = getBirthday(document, keys.birthday);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      onError(error);
    }
  }

  return {
    filePath: document.filePath,
    name: getContactName(document) ?? "",
    birthday,
    emails: getLabeledValues(document, keys.emails),
    addresses: getLabeledValues(document, keys.addresses),
    phones: getLabeledValues(document, keys.phones),
    tags: getTags(document),
  };
}
