import prompts from "prompts";
import chalk from "chalk";
import {
  Config,
  DEFAULT_CONFIG,
  saveConfig,
  getConfigPath,
  configExists,
  ensureDirectories,
  getContactsDirectory,
} from "../config/index.js";

export async function runInteractiveSetup(
  options: { force?: boolean } = {}
): Promise<Config | null> {
  console.log(chalk.bold("\nContact Notes Setup\n"));

  if (configExists() && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${getConfigPath()}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "notesDirectory",
        message: "Where are your notes stored?",
        initial: DEFAULT_CONFIG.notesDirectory,
        validate: (value: string) => (value.trim() ? true : "Directory path is required"),
      },
      {
        type: "text",
        name: "contactsDirectory",
        message: "Contacts directory (leave empty to use the notes directory):",
        initial: "",
      },
      {
        type: "text",
        name: "contactTag",
        message: "Tag that marks a note as a contact:",
        initial: DEFAULT_CONFIG.contactTag,
        validate: (value: string) => (value.trim() ? true : "A tag is required"),
      },
      {
        type: "number",
        name: "advanceNoticeDays",
        message: "Days of notice before a birthday?",
        initial: DEFAULT_CONFIG.reminders.advanceNoticeDays,
        min: 0,
        max: 365,
      },
      {
        type: "confirm",
        name: "daemonEnabled",
        message: "Enable background daemon that adds reminders as contacts change?",
        initial: DEFAULT_CONFIG.daemon.enabled,
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const contactsDirectory = String(responses.contactsDirectory ?? "").trim();
  const config: Config = {
    ...DEFAULT_CONFIG,
    notesDirectory: String(responses.notesDirectory).trim(),
    contactsDirectory: contactsDirectory || undefined,
    contactTag: String(responses.contactTag).trim(),
    reminders: {
      ...DEFAULT_CONFIG.reminders,
      advanceNoticeDays: Number(responses.advanceNoticeDays ?? DEFAULT_CONFIG.reminders.advanceNoticeDays),
    },
    daemon: {
      ...DEFAULT_CONFIG.daemon,
      enabled: Boolean(responses.daemonEnabled),
      watchFiles: Boolean(responses.daemonEnabled),
    },
  };

  console.log(chalk.dim("\nCreating configuration..."));
  saveConfig(config);
  console.log(chalk.green(`✓ Created ${getConfigPath()}`));

  console.log(chalk.dim("Creating directories..."));
  ensureDirectories(config);
  console.log(chalk.green(`✓ Contacts in ${getContactsDirectory(config)}`));

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Tag a note as a contact:  ") + `tags: [${config.contactTag}]`);
  console.log(chalk.dim("  2. Add birthday reminders:   ") + "contact-notes reminders schedule-all");
  console.log(chalk.dim("  3. Keep them up to date:     ") + "contact-notes daemon start");
  console.log(chalk.dim("  4. Configure your MCP client to use: ") + "contact-notes serve\n");

  return config;
}
