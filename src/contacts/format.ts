import { formatDate } from "../outline/timestamp.js";
import { ScheduleResult } from "./scheduler.js";
import { Contact, LabeledValue } from "./types.js";

function formatLabeled(entries: LabeledValue[]): string {
  if (entries.length === 0) {
    return "none";
  }
  return entries.map((entry) => (entry.label ? `${entry.value} (${entry.label})` : entry.value)).join(", ");
}

export function formatContact(contact: Contact): string {
  return [
    `Name: ${contact.name || "(untitled)"}`,
    `File: ${contact.filePath}`,
    `Birthday: ${contact.birthday ? formatDate(contact.birthday) : "unknown"}`,
    `Emails: ${formatLabeled(contact.emails)}`,
    `Phones: ${formatLabeled(contact.phones)}`,
    `Addresses: ${formatLabeled(contact.addresses)}`,
  ].join("\n");
}

export function formatContactLine(contact: Contact): string {
  const birthday = contact.birthday ? ` (born ${formatDate(contact.birthday)})` : "";
  return `${contact.name || "(untitled)"}${birthday}`;
}

export function describeScheduleResult(result: ScheduleResult): string {
  if (result.status === "skipped") {
    return result.reason === "not-a-contact"
      ? "Not a contact document; nothing to do."
      : "No birthday set; nothing to do.";
  }
  if (result.created.length === 0) {
    return "Birthday reminders already present.";
  }
  return `Added reminders:\n${result.created.map((text) => `- ${text}`).join("\n")}`;
}
