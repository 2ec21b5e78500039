import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { ConfigSchema, Config } from "../src/config/index.js";
import { ContactSettings, resolveContactSettings } from "../src/contacts/types.js";
import { parseOutline } from "../src/outline/parser.js";
import { OutlineDocument } from "../src/outline/types.js";

export const CONTACTS_DIR = "/contacts";

/** 2022-03-01 10:00 local time */
export const FIXED_NOW = new Date(2022, 2, 1, 10, 0);

export function makeConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({ notesDirectory: CONTACTS_DIR, ...overrides });
}

export function makeSettings(overrides: Record<string, unknown> = {}): ContactSettings {
  return resolveContactSettings(makeConfig(overrides));
}

export function frontmatter(lines: string[]): string {
  return ["---", ...lines, "---", ""].join("\n");
}

export function contactDocument(
  options: { fields?: string[]; body?: string[]; filePath?: string } = {}
): OutlineDocument {
  const fields = options.fields ?? ["title: Jane Doe", "tags: [person]", 'CONTACT_BIRTHDAY: "1985-03-15"'];
  const body = options.body ? options.body.join("\n") + "\n" : "";
  return parseOutline(frontmatter(fields) + body, options.filePath ?? join(CONTACTS_DIR, "jane.md"));
}

export interface TempNotes {
  dir: string;
  write(relativePath: string, content: string): string;
  cleanup(): void;
}

export function tempNotes(): TempNotes {
  const dir = mkdtempSync(join(tmpdir(), "contact-notes-"));
  return {
    dir,
    write(relativePath, content) {
      const filePath = join(dir, relativePath);
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, content);
      return filePath;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
