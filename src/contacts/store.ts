import { existsSync, readFileSync, readdirSync, statSync, writeFileSync } from "fs";
import { isAbsolute, join } from "path";
import { ContactNotFoundError, errorMessage } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { parseOutline, serializeOutline } from "../outline/parser.js";
import { OutlineDocument } from "../outline/types.js";
import { readContact } from "./properties.js";
import { ReminderScheduler, ScheduleResult, assertAdvanceNotice } from "./scheduler.js";
import { Contact, ContactSettings } from "./types.js";

export type BatchEntry =
  | { filePath: string; status: "scheduled"; created: string[] }
  | { filePath: string; status: "skipped"; reason: string }
  | { filePath: string; status: "failed"; error: string };

export interface ContactStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * File-backed access to the contacts directory. Every document is read
 * fresh from disk; nothing is cached between calls.
 */
export class ContactStore {
  readonly settings: ContactSettings;
  readonly scheduler: ReminderScheduler;
  private logger: Logger;

  constructor(settings: ContactSettings, options: ContactStoreOptions = {}) {
    this.settings = settings;
    this.logger = options.logger ?? silentLogger;
    this.scheduler = new ReminderScheduler({ settings, now: options.now });
  }

  load(filePath: string): OutlineDocument {
    return parseOutline(readFileSync(filePath, "utf-8"), filePath);
  }

  save(document: OutlineDocument): void {
    if (!document.filePath) {
      throw new Error("Cannot save a document without a file path");
    }
    writeFileSync(document.filePath, serializeOutline(document));
  }

  /** Every markdown file under the contacts directory, dotfiles excluded. */
  listDocuments(): string[] {
    const files: string[] = [];

    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        if (entry.name.startsWith(".") || entry.name === "node_modules") {
          continue;
        }
        const path = join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(path);
        } else if (entry.isFile() && entry.name.endsWith(".md")) {
          files.push(path);
        }
      }
    };

    if (existsSync(this.settings.contactsDirectory)) {
      walk(this.settings.contactsDirectory);
    }
    return files.sort();
  }

  listContacts(): Contact[] {
    const contacts: Contact[] = [];

    for (const filePath of this.listDocuments()) {
      let document: OutlineDocument;
      try {
        document = this.load(filePath);
      } catch (error) {
        this.logger.warn(`Skipping ${filePath}: ${errorMessage(error)}`);
        continue;
      }

      const contact = readContact(document, this.settings, (error) => this.logger.warn(error.message));
      if (contact) {
        contacts.push(contact);
      }
    }

    return contacts.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Resolves a contact reference: a path (absolute, or relative to the
   * contacts directory, `.md` optional) or a contact name, case-insensitive.
   */
  resolve(reference: string): string {
    const base = isAbsolute(reference) ? reference : join(this.settings.contactsDirectory, reference);
    for (const candidate of [base, `${base}.md`]) {
      if (existsSync(candidate) && statSync(candidate).isFile()) {
        return candidate;
      }
    }

    const wanted = reference.trim().toLowerCase();
    const match = this.listContacts().find((contact) => contact.name.toLowerCase() === wanted);
    if (!match) {
      throw new ContactNotFoundError(reference);
    }
    return match.filePath;
  }

  getContact(reference: string): Contact {
    const filePath = this.resolve(reference);
    const contact = readContact(this.load(filePath), this.settings, (error) =>
      this.logger.warn(error.message)
    );
    if (!contact) {
      throw new ContactNotFoundError(reference);
    }
    return contact;
  }

  /** Schedules one file's birthday reminders, writing it back only if it changed. */
  scheduleFile(filePath: string, advanceNoticeDays?: number): ScheduleResult {
    const document = this.load(filePath);
    const result = this.scheduler.scheduleBirthdayReminders(document, advanceNoticeDays);

    if (result.status === "scheduled" && result.created.length > 0) {
      this.save(document);
      this.logger.info(`${filePath}: added ${result.created.map((text) => `"${text}"`).join(", ")}`);
    }
    return result;
  }

  /** Schedules every document; one bad document never stops the batch. */
  scheduleAll(advanceNoticeDays?: number): BatchEntry[] {
    if (advanceNoticeDays !== undefined) {
      assertAdvanceNotice(advanceNoticeDays);
    }

    return this.listDocuments().map((filePath): BatchEntry => {
      try {
        const result = this.scheduleFile(filePath, advanceNoticeDays);
        return result.status === "scheduled"
          ? { filePath, status: "scheduled", created: result.created }
          : { filePath, status: "skipped", reason: result.reason };
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`${filePath}: ${message}`);
        return { filePath, status: "failed", error: message };
      }
    });
  }
}
