import { PropertyKeys } from "./config/index.js";
import { ContactStore, BatchEntry } from "./contacts/store.js";
import { ScheduleResult } from "./contacts/scheduler.js";
import { ParseError } from "./errors.js";
import { insertReminder } from "./outline/mutator.js";
import { hasTimeOfDay, parseDateString, parseRepeater } from "./outline/timestamp.js";
import { Repeater } from "./outline/types.js";

export interface InsertReminderInput {
  contact: string;
  text: string;
  date: string;
  /** e.g. "+1y"; omitted for a one-off reminder */
  repeat?: string;
}

export function parseReminderDate(value: string): Date {
  const date = parseDateString(value);
  if (!date) {
    throw new ParseError(`"${value}" is not a date (expected YYYY-MM-DD [HH:MM])`);
  }
  return date;
}

export function parseReminderRepeat(value: string | undefined): Repeater | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const repeater = parseRepeater(value);
  if (!repeater) {
    throw new ParseError(`"${value}" is not a repeat interval (expected e.g. +1y, +2w)`);
  }
  return repeater;
}

/**
 * The operations exposed to users, shared by the CLI and the MCP server.
 * Each call works on one contact document, named by path or contact name.
 */
export class ContactCommands {
  private store: ContactStore;
  private now: () => Date;

  constructor(store: ContactStore, options: { now?: () => Date } = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
  }

  listManagedProperties(): string[] {
    const keys: PropertyKeys = this.store.settings.propertyKeys;
    return [keys.birthday, keys.emails, keys.addresses, keys.phones];
  }

  insertBirthdayReminders(
    contact: string,
    advanceNoticeDays?: number
  ): { filePath: string; result: ScheduleResult } {
    const filePath = this.store.resolve(contact);
    return { filePath, result: this.store.scheduleFile(filePath, advanceNoticeDays) };
  }

  /** Adds one scheduled reminder under the reminders heading, unconditionally. */
  insertReminder(input: InsertReminderInput): { filePath: string; heading: string } {
    const date = parseReminderDate(input.date);
    const repeater = parseReminderRepeat(input.repeat);
    const filePath = this.store.resolve(input.contact);
    const document = this.store.load(filePath);
    const parentHeading = this.store.settings.reminders.heading;

    insertReminder(document, {
      parentHeading,
      text: input.text,
      date,
      repeater,
      createdAt: this.now(),
      withTime: hasTimeOfDay(date),
    });
    this.store.save(document);

    return { filePath, heading: parentHeading };
  }

  scheduleAll(advanceNoticeDays?: number): BatchEntry[] {
    return this.store.scheduleAll(advanceNoticeDays);
  }
}
