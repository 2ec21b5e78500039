import matter from "gray-matter";
import { formatTimestamp, parseTimestamp } from "./timestamp.js";
import { Heading, OutlineDocument, Timestamp, TodoKeyword } from "./types.js";

const HEADING_PATTERN = /^(#{1,6})[ \t]+(.*?)[ \t]*$/;
const KEYWORD_PATTERN = /^(TODO|DONE)(?:[ \t]+(.*))?$/;
const PLANNING_PATTERN = /^[ \t]*SCHEDULED:[ \t]*(<[^>]*>)[ \t]*$/;
const PROPERTY_PATTERN = /^[ \t]*:([^:\s]+):(?:[ \t]+(.*?))?[ \t]*$/;
const FENCE_PATTERN = /^[ \t]*(```|~~~)/;
const BOM = "\uFEFF";

interface HeadingLine {
  level: number;
  keyword?: TodoKeyword;
  text: string;
}

function parseHeadingLine(line: string): HeadingLine | null {
  const match = line.match(HEADING_PATTERN);
  if (!match) {
    return null;
  }

  const level = match[1].length;
  const keywordMatch = match[2].match(KEYWORD_PATTERN);
  if (keywordMatch) {
    const keyword: TodoKeyword = keywordMatch[1] === "DONE" ? "DONE" : "TODO";
    return { level, keyword, text: keywordMatch[2] ?? "" };
  }
  return { level, text: match[2] };
}

function isPropertiesStart(line: string | undefined): boolean {
  return line?.trim() === ":PROPERTIES:";
}

function isPropertiesEnd(line: string): boolean {
  return line.trim() === ":END:";
}

/**
 * Reads a `:PROPERTIES:` drawer starting at `start`. Returns the properties and
 * the index after `:END:`, or null when the lines do not form a complete drawer.
 */
function readDrawer(
  lines: string[],
  start: number,
  end: number
): { properties: Map<string, string>; next: number } | null {
  const properties = new Map<string, string>();

  for (let i = start + 1; i < end; i++) {
    if (isPropertiesEnd(lines[i])) {
      return { properties, next: i + 1 };
    }
    const match = lines[i].match(PROPERTY_PATTERN);
    if (!match) {
      return null;
    }
    properties.set(match[1], match[2] ?? "");
  }
  return null;
}

function splitContent(content: string): string[] {
  if (content === "") {
    return [];
  }
  const normalized = content.replace(/\r\n/g, "\n");
  const lines = normalized.split("\n");
  if (normalized.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

/**
 * Finds the line index of every heading, skipping fenced code blocks.
 */
function findHeadingLines(lines: string[]): number[] {
  const indices: number[] = [];
  let fence: string | null = null;

  lines.forEach((line, index) => {
    const fenceMatch = line.match(FENCE_PATTERN);
    if (fenceMatch) {
      if (fence === null) {
        fence = fenceMatch[1];
      } else if (fence === fenceMatch[1]) {
        fence = null;
      }
      return;
    }
    if (fence === null && HEADING_PATTERN.test(line)) {
      indices.push(index);
    }
  });

  return indices;
}

function parseHeading(lines: string[], start: number, end: number): Heading {
  const headingLine = parseHeadingLine(lines[start]);
  if (!headingLine) {
    throw new Error(`Line ${start + 1} is not a heading`);
  }

  const heading: Heading = {
    level: headingLine.level,
    keyword: headingLine.keyword,
    text: headingLine.text,
    properties: new Map(),
    body: [],
    children: [],
  };

  let cursor = start + 1;

  const planning = cursor < end ? lines[cursor].match(PLANNING_PATTERN) : null;
  if (planning) {
    const scheduled = parseTimestamp(planning[1]);
    if (scheduled) {
      heading.scheduled = scheduled;
      cursor++;
    }
  }

  if (cursor < end && isPropertiesStart(lines[cursor])) {
    const drawer = readDrawer(lines, cursor, end);
    if (drawer) {
      heading.properties = drawer.properties;
      cursor = drawer.next;
    }
  }

  heading.body = lines.slice(cursor, end);
  return heading;
}

export function parseOutline(raw: string, filePath?: string): OutlineDocument {
  const bom = raw.startsWith(BOM);
  const text = bom ? raw.slice(BOM.length) : raw;
  // options (even empty) keep gray-matter from caching results by content
  const file = matter(text, {});
  const hasFrontmatter = file.content !== text;
  const lines = splitContent(file.content);
  const headingLines = findHeadingLines(lines);

  const document: OutlineDocument = {
    filePath,
    bom: bom || undefined,
    frontmatter: { ...file.data },
    frontmatterSource: hasFrontmatter ? file.matter : undefined,
    preamble: lines.slice(0, headingLines[0] ?? lines.length),
    headings: [],
  };

  const stack: Heading[] = [];
  headingLines.forEach((start, i) => {
    const end = headingLines[i + 1] ?? lines.length;
    const heading = parseHeading(lines, start, end);

    while (stack.length > 0 && stack[stack.length - 1].level >= heading.level) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(heading);
    } else {
      document.headings.push(heading);
    }
    stack.push(heading);
  });

  return document;
}

/**
 * The form heading text takes after a write and re-read: a heading is a single
 * line and the parser trims it, so runs of whitespace become one space.
 */
export function normalizeHeadingText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function formatHeadingLine(heading: Pick<Heading, "level" | "keyword" | "text">): string {
  const title = [heading.keyword, heading.text].filter(Boolean).join(" ");
  return `${"#".repeat(heading.level)} ${title}`;
}

export function formatPlanningLine(scheduled: Timestamp): string {
  return `SCHEDULED: ${formatTimestamp(scheduled)}`;
}

export function serializeHeading(heading: Heading): string[] {
  const lines = [formatHeadingLine(heading)];

  if (heading.scheduled) {
    lines.push(formatPlanningLine(heading.scheduled));
  }

  if (heading.properties.size > 0) {
    lines.push(":PROPERTIES:");
    for (const [key, value] of heading.properties) {
      lines.push(value ? `:${key}: ${value}` : `:${key}:`);
    }
    lines.push(":END:");
  }

  lines.push(...heading.body);
  for (const child of heading.children) {
    lines.push(...serializeHeading(child));
  }
  return lines;
}

export function serializeOutline(document: OutlineDocument): string {
  const lines = [...document.preamble];
  for (const heading of document.headings) {
    lines.push(...serializeHeading(heading));
  }

  const content = lines.length > 0 ? lines.join("\n") + "\n" : "";
  const prefix = document.bom ? BOM : "";
  if (document.frontmatterSource === undefined) {
    return prefix + content;
  }
  return `${prefix}---${document.frontmatterSource}\n---\n${content}`;
}
