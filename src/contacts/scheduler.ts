import { MissingNameError } from "../errors.js";
import { headingExists, insertReminder } from "../outline/mutator.js";
import { normalizeHeadingText } from "../outline/parser.js";
import { hasTimeOfDay } from "../outline/timestamp.js";
import { OutlineDocument, Repeater } from "../outline/types.js";
import { getBirthday, getContactName, hasProperty, isContactDocument } from "./properties.js";
import { nextAnnualOccurrence, subtractDays } from "./recurrence.js";
import { ContactSettings } from "./types.js";

export const YEARLY: Repeater = { value: 1, unit: "y" };

export type ScheduleResult =
  | { status: "scheduled"; created: string[] }
  | { status: "skipped"; reason: "not-a-contact" | "no-birthday" };

export interface ReminderSchedulerOptions {
  settings: ContactSettings;
  now?: () => Date;
}

export function renderTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    key in values ? String(values[key]) : placeholder
  );
}

export function assertAdvanceNotice(days: number): void {
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`Advance notice must be a non-negative integer, got ${days}`);
  }
}

/**
 * Materializes birthday reminders into contact documents. A reminder is
 * identified by its rendered heading text and only ever created, never
 * updated: renaming a contact or changing the notice period leaves the old
 * heading in place and adds a new one.
 */
export class ReminderScheduler {
  private settings: ContactSettings;
  private now: () => Date;

  constructor(options: ReminderSchedulerOptions) {
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
  }

  reminderTexts(name: string, advanceNoticeDays: number): { advance: string; dayOf: string } {
    const { reminders } = this.settings;
    return {
      advance: normalizeHeadingText(
        renderTemplate(reminders.advanceNoticeTemplate, { name, days: advanceNoticeDays })
      ),
      dayOf: normalizeHeadingText(renderTemplate(reminders.birthdayTemplate, { name })),
    };
  }

  scheduleBirthdayReminders(
    document: OutlineDocument,
    advanceNoticeDays: number = this.settings.reminders.advanceNoticeDays
  ): ScheduleResult {
    assertAdvanceNotice(advanceNoticeDays);

    if (!isContactDocument(document, this.settings)) {
      return { status: "skipped", reason: "not-a-contact" };
    }

    const birthdayKey = this.settings.propertyKeys.birthday;
    if (!hasProperty(document, birthdayKey)) {
      return { status: "skipped", reason: "no-birthday" };
    }

    const birthday = getBirthday(document, birthdayKey);
    const name = getContactName(document);
    if (name === undefined) {
      throw new MissingNameError(document.filePath);
    }

    const now = this.now();
    const texts = this.reminderTexts(name, advanceNoticeDays);
    const candidates = [
      { text: texts.advance, date: subtractDays(birthday, advanceNoticeDays) },
      { text: texts.dayOf, date: birthday },
    ];

    const created: string[] = [];
    for (const candidate of candidates) {
      if (headingExists(document, candidate.text, "anywhere")) {
        continue;
      }
      insertReminder(document, {
        parentHeading: this.settings.reminders.heading,
        text: candidate.text,
        date: nextAnnualOccurrence(candidate.date, now),
        repeater: YEARLY,
        createdAt: now,
        withTime: hasTimeOfDay(birthday),
      });
      created.push(candidate.text);
    }

    return { status: "scheduled", created };
  }
}
