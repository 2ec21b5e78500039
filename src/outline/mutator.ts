import { Heading, HeadingPath, HeadingScope, OutlineDocument, Repeater } from "./types.js";
import { normalizeHeadingText } from "./parser.js";
import { formatTimestamp } from "./timestamp.js";

export const CREATED_PROPERTY = "CREATED";

export interface EnsureHeadingResult {
  created: boolean;
  path: HeadingPath;
}

export interface InsertReminderOptions {
  parentHeading: string;
  text: string;
  date: Date;
  /** e.g. `{ value: 1, unit: "y" }` for a yearly reminder; omit for a one-off */
  repeater?: Repeater;
  /** Stamped into the CREATED property */
  createdAt: Date;
  /** Whether the scheduled timestamp carries a time of day */
  withTime?: boolean;
}

export function listTopLevelHeadings(document: OutlineDocument): string[] {
  return document.headings.filter((heading) => heading.level === 1).map((heading) => heading.text);
}

export function headingAt(document: OutlineDocument, path: HeadingPath): Heading | undefined {
  let siblings = document.headings;
  let heading: Heading | undefined;

  for (const index of path) {
    heading = siblings[index];
    if (!heading) {
      return undefined;
    }
    siblings = heading.children;
  }
  return heading;
}

function searchHeadings(headings: Heading[], text: string, prefix: number[]): HeadingPath | undefined {
  for (let i = 0; i < headings.length; i++) {
    const path = [...prefix, i];
    if (headings[i].text === text) {
      return path;
    }
    const nested = searchHeadings(headings[i].children, text, path);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Locates the first heading whose text is exactly `text`, in document order.
 * The TODO keyword is not part of the text, so a reminder marked DONE still matches.
 */
export function findHeading(
  document: OutlineDocument,
  text: string,
  scope: HeadingScope
): HeadingPath | undefined {
  if (scope === "top-level") {
    const index = document.headings.findIndex(
      (heading) => heading.level === 1 && heading.text === text
    );
    return index === -1 ? undefined : [index];
  }
  return searchHeadings(document.headings, text, []);
}

export function headingExists(
  document: OutlineDocument,
  text: string,
  scope: HeadingScope
): boolean {
  return findHeading(document, text, scope) !== undefined;
}

function lastHeading(headings: Heading[]): Heading | undefined {
  const last = headings[headings.length - 1];
  if (!last) {
    return undefined;
  }
  return lastHeading(last.children) ?? last;
}

/** Separates a new top-level heading from existing content by one blank line. */
function separateFromPrevious(document: OutlineDocument): void {
  const last = lastHeading(document.headings);
  if (last) {
    if (last.body.length === 0 || last.body[last.body.length - 1].trim() !== "") {
      last.body.push("");
    }
    return;
  }

  const { preamble } = document;
  if (preamble.length > 0 && preamble[preamble.length - 1].trim() !== "") {
    preamble.push("");
  }
}

export function ensureTopLevelHeading(document: OutlineDocument, heading: string): EnsureHeadingResult {
  const text = normalizeHeadingText(heading);
  const existing = findHeading(document, text, "top-level");
  if (existing) {
    return { created: false, path: existing };
  }

  separateFromPrevious(document);
  document.headings.push({
    level: 1,
    text,
    properties: new Map(),
    body: [],
    children: [],
  });
  return { created: true, path: [document.headings.length - 1] };
}

/**
 * Appends a TODO sub-heading scheduled at `date` under the top-level
 * `parentHeading`, creating the parent when missing. Does not check for an
 * existing heading with the same text; callers own idempotency.
 */
export function insertReminder(document: OutlineDocument, options: InsertReminderOptions): HeadingPath {
  const { path } = ensureTopLevelHeading(document, options.parentHeading);
  const parent = headingAt(document, path);
  if (!parent) {
    throw new Error(`Heading "${options.parentHeading}" vanished during insertion`);
  }

  const reminder: Heading = {
    level: Math.min(parent.level + 1, 6),
    keyword: "TODO",
    text: normalizeHeadingText(options.text),
    scheduled: {
      date: options.date,
      hasTime: options.withTime ?? false,
      active: true,
      repeater: options.repeater,
    },
    properties: new Map([
      [CREATED_PROPERTY, formatTimestamp({ date: options.createdAt, hasTime: true, active: false })],
    ]),
    body: [],
    children: [],
  };

  parent.children.push(reminder);
  return [...path, parent.children.length - 1];
}
