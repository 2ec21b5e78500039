import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

const ContactReference = z
  .string()
  .min(1)
  .describe("Contact file (path relative to the contacts directory) or contact name");

const AdvanceNoticeDays = z
  .number()
  .int()
  .min(0)
  .optional()
  .describe("Days of advance notice for the early reminder (defaults to the configured value)");

export const InsertBirthdayRemindersSchema = z.object({
  contact: ContactReference,
  advanceNoticeDays: AdvanceNoticeDays,
});

export const InsertReminderSchema = z.object({
  contact: ContactReference,
  text: z.string().min(1).describe("Heading text of the reminder"),
  date: z.string().describe("Date in YYYY-MM-DD format, optionally followed by HH:MM"),
  repeat: z.string().optional().describe("Repeat interval such as +1y or +2w (omit for one-off)"),
});

export const ScheduleAllRemindersSchema = z.object({
  advanceNoticeDays: AdvanceNoticeDays,
});

export const SearchContactsSchema = z.object({
  query: z.string().min(1).describe("Name, email or phone to look for"),
  limit: z.number().int().min(1).optional().describe("Maximum results (default: 20)"),
});

export const GetContactSchema = z.object({
  contact: ContactReference,
});

export type InsertBirthdayRemindersInput = z.infer<typeof InsertBirthdayRemindersSchema>;
export type InsertReminderToolInput = z.infer<typeof InsertReminderSchema>;
export type ScheduleAllRemindersInput = z.infer<typeof ScheduleAllRemindersSchema>;
export type SearchContactsInput = z.infer<typeof SearchContactsSchema>;
export type GetContactInput = z.infer<typeof GetContactSchema>;

const contactProperty = {
  type: "string",
  description: "Contact file (path relative to the contacts directory) or contact name",
};

const advanceNoticeProperty = {
  type: "number",
  description: "Days of advance notice for the early reminder (defaults to the configured value)",
};

export const TOOLS: Tool[] = [
  {
    name: "list_managed_properties",
    description: "List the front matter property names used for contact data.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "insert_birthday_reminders",
    description:
      "Add yearly birthday reminders (an early notice and the day itself) to a contact. Reminders that already exist are left alone.",
    inputSchema: {
      type: "object",
      properties: { contact: contactProperty, advanceNoticeDays: advanceNoticeProperty },
      required: ["contact"],
    },
  },
  {
    name: "insert_reminder",
    description: "Add a scheduled reminder under the Reminders heading of a contact.",
    inputSchema: {
      type: "object",
      properties: {
        contact: contactProperty,
        text: { type: "string", description: "Heading text of the reminder" },
        date: {
          type: "string",
          description: "Date in YYYY-MM-DD format, optionally followed by HH:MM",
        },
        repeat: {
          type: "string",
          description: "Repeat interval such as +1y or +2w (omit for one-off)",
        },
      },
      required: ["contact", "text", "date"],
    },
  },
  {
    name: "schedule_all_reminders",
    description: "Add missing birthday reminders to every contact.",
    inputSchema: {
      type: "object",
      properties: { advanceNoticeDays: advanceNoticeProperty },
    },
  },
  {
    name: "list_contacts",
    description: "List all contacts with their birthdays.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "search_contacts",
    description: "Find contacts by name, email or phone number.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Name, email or phone to look for" },
        limit: { type: "number", description: "Maximum results (default: 20)" },
      },
      required: ["query"],
    },
  },
  {
    name: "get_contact",
    description: "Show one contact's details.",
    inputSchema: {
      type: "object",
      properties: { contact: contactProperty },
      required: ["contact"],
    },
  },
];
