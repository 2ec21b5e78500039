export type TodoKeyword = "TODO" | "DONE";

export type RepeaterUnit = "h" | "d" | "w" | "m" | "y";

/** A timestamp repeater such as `+1y` ("every 1 year"). */
export interface Repeater {
  value: number;
  unit: RepeaterUnit;
}

export interface Timestamp {
  date: Date;
  /** false for date-only timestamps like `<2023-03-15 Wed>` */
  hasTime: boolean;
  active: boolean;
  repeater?: Repeater;
}

export interface Heading {
  level: number;
  keyword?: TodoKeyword;
  text: string;
  scheduled?: Timestamp;
  /** `:PROPERTIES:` drawer entries, in file order */
  properties: Map<string, string>;
  body: string[];
  children: Heading[];
}

/** Child indices from the document root down to a heading. */
export type HeadingPath = readonly number[];

export type HeadingScope = "top-level" | "anywhere";

export interface OutlineDocument {
  filePath?: string;
  /** The file started with a byte order mark */
  bom?: boolean;
  /** Parsed front matter; the property block of the document */
  frontmatter: Record<string, unknown>;
  /** Raw front matter text, written back verbatim */
  frontmatterSource?: string;
  preamble: string[];
  headings: Heading[];
}
