import { ContactCommands } from "../commands.js";
import { describeScheduleResult, formatContact, formatContactLine } from "../contacts/format.js";
import { ContactIndex } from "../contacts/search.js";
import { ContactStore } from "../contacts/store.js";
import { errorMessage } from "../errors.js";
import {
  GetContactSchema,
  InsertBirthdayRemindersSchema,
  InsertReminderSchema,
  ScheduleAllRemindersSchema,
  SearchContactsSchema,
} from "./definitions.js";

// A type alias rather than an interface so it satisfies the SDK's indexed result type
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolContext {
  store: ContactStore;
  commands: ContactCommands;
}

function text(value: string): ToolResult {
  return { content: [{ type: "text", text: value }] };
}

export function handleToolCall(context: ToolContext, name: string, args: unknown): ToolResult {
  const { store, commands } = context;

  try {
    switch (name) {
      case "list_managed_properties": {
        return text(commands.listManagedProperties().join("\n"));
      }

      case "insert_birthday_reminders": {
        const input = InsertBirthdayRemindersSchema.parse(args);
        const { filePath, result } = commands.insertBirthdayReminders(
          input.contact,
          input.advanceNoticeDays
        );
        return text(`${filePath}\n${describeScheduleResult(result)}`);
      }

      case "insert_reminder": {
        const input = InsertReminderSchema.parse(args);
        const { filePath, heading } = commands.insertReminder(input);
        return text(`Added "${input.text}" under ${heading} in ${filePath}`);
      }

      case "schedule_all_reminders": {
        const input = ScheduleAllRemindersSchema.parse(args ?? {});
        const entries = commands.scheduleAll(input.advanceNoticeDays);
        const lines = entries.flatMap((entry) => {
          if (entry.status === "failed") {
            return [`FAILED ${entry.filePath}: ${entry.error}`];
          }
          if (entry.status === "scheduled" && entry.created.length > 0) {
            return entry.created.map((created) => `Added ${created} (${entry.filePath})`);
          }
          return [];
        });
        const failed = entries.filter((entry) => entry.status === "failed").length;
        const summary = `Checked ${entries.length} documents, ${failed} failed.`;
        return {
          ...text([summary, ...lines].join("\n")),
          isError: failed > 0 && failed === entries.length,
        };
      }

      case "list_contacts": {
        const contacts = store.listContacts();
        if (contacts.length === 0) {
          return text("No contacts found.");
        }
        return text(
          `Contacts (${contacts.length}):\n${contacts.map((c) => `- ${formatContactLine(c)}`).join("\n")}`
        );
      }

      case "search_contacts": {
        const input = SearchContactsSchema.parse(args);
        const matches = new ContactIndex(store.listContacts()).search(input.query, input.limit);
        if (matches.length === 0) {
          return text(`No contacts match "${input.query}".`);
        }
        return text(matches.map((match) => formatContact(match.contact)).join("\n\n---\n\n"));
      }

      case "get_contact": {
        const input = GetContactSchema.parse(args);
        return text(formatContact(store.getContact(input.contact)));
      }

      default:
        return { ...text(`Unknown tool: ${name}`), isError: true };
    }
  } catch (error) {
    return { ...text(`Error: ${errorMessage(error)}`), isError: true };
  }
}
