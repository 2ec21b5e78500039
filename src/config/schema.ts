import { z } from "zod";

export const PropertyKeysSchema = z.object({
  birthday: z.string().min(1).default("CONTACT_BIRTHDAY"),
  emails: z.string().min(1).default("CONTACT_EMAILS"),
  addresses: z.string().min(1).default("CONTACT_ADDRESSES"),
  phones: z.string().min(1).default("CONTACT_PHONES"),
});

export const RemindersConfigSchema = z.object({
  heading: z.string().min(1).default("Reminders"),
  birthdayTemplate: z.string().includes("{name}").default("{name}'s birthday"),
  advanceNoticeTemplate: z
    .string()
    .includes("{name}")
    .default("{name}'s birthday in {days} days"),
  advanceNoticeDays: z.number().int().min(0).max(365).default(7),
});

export const DaemonConfigSchema = z.object({
  enabled: z.boolean().default(true),
  watchFiles: z.boolean().default(true),
  pidFile: z.string().optional(),
  logFile: z.string().optional(),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ConfigSchema = z.object({
  notesDirectory: z.string().default("~/notes"),
  contactsDirectory: z.string().optional(), // defaults to notesDirectory
  contactTag: z.string().min(1).default("person"),
  propertyKeys: PropertyKeysSchema.default({}),
  reminders: RemindersConfigSchema.default({}),
  daemon: DaemonConfigSchema.default({}),
  logLevel: LogLevelSchema.default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PropertyKeys = z.infer<typeof PropertyKeysSchema>;
export type RemindersConfig = z.infer<typeof RemindersConfigSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
