#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import prompts from "prompts";
import { spawn } from "child_process";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import {
  loadConfig,
  configExists,
  getConfigPath,
  ensureDirectories,
  getContactsDirectory,
  getNotesDirectory,
} from "./config/index.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import { startDaemon, stopDaemon, getDaemonStatus, startDaemonBackground } from "./daemon.js";
import { AppContext, createContext } from "./context.js";
import { describeScheduleResult, formatContact, formatContactLine } from "./contacts/format.js";
import { ContactIndex } from "./contacts/search.js";
import { errorMessage } from "./errors.js";
import { parseReminderDate } from "./commands.js";
import { parseDaysOption, parseLimitOption } from "./cli-options.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

function requireContext(): AppContext {
  if (!configExists()) {
    console.error(chalk.red("No configuration found. Run 'contact-notes init' first."));
    process.exit(1);
  }
  const config = loadConfig();
  ensureDirectories(config);
  return createContext(config);
}

/** Runs a command body, printing failures in red instead of a stack trace. */
function run<A extends unknown[]>(action: (...args: A) => Promise<void> | void) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  };
}

const program = new Command();

program
  .name("contact-notes")
  .description("Birthday reminders and contact lookup for a notes directory")
  .version(packageJson.version);

// Init command
program
  .command("init")
  .description("Initialize contact-notes with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(
    run(async (options: { force?: boolean }) => {
      await runInteractiveSetup({ force: options.force });
    })
  );

// Serve command (MCP server)
program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(() => {
    if (!configExists()) {
      console.error(chalk.red("No configuration found. Run 'contact-notes init' first."));
      process.exit(1);
    }

    const serverPath = join(__dirname, "index.js");
    const child = spawn(process.execPath, [serverPath], {
      stdio: "inherit",
    });

    child.on("error", (error) => {
      console.error(chalk.red(`Failed to start MCP server: ${error.message}`));
      process.exit(1);
    });

    child.on("exit", (code) => {
      process.exit(code || 0);
    });
  });

// Daemon commands
const daemonCmd = program.command("daemon").description("Manage the background daemon");

daemonCmd
  .command("start")
  .description("Start the background daemon")
  .option("-f, --foreground", "Run in foreground (don't detach)")
  .action(
    run(async (options: { foreground?: boolean }) => {
      if (!configExists()) {
        console.error(chalk.red("No configuration found. Run 'contact-notes init' first."));
        process.exit(1);
      }

      const status = getDaemonStatus();
      if (status.running) {
        console.log(chalk.yellow(`Daemon is already running (PID: ${status.pid})`));
        return;
      }

      if (options.foreground) {
        await startDaemon();
        return;
      }

      console.log("Starting daemon in background...");
      startDaemonBackground();

      await new Promise((resolve) => setTimeout(resolve, 1500));
      const newStatus = getDaemonStatus();
      if (newStatus.running) {
        console.log(chalk.green(`Daemon started (PID: ${newStatus.pid})`));
      } else {
        console.log(chalk.yellow("Daemon may have failed to start. Check logs."));
      }
    })
  );

daemonCmd
  .command("stop")
  .description("Stop the background daemon")
  .action(() => {
    stopDaemon();
  });

daemonCmd
  .command("status")
  .description("Check daemon status")
  .action(() => {
    const status = getDaemonStatus();
    if (status.running) {
      console.log(chalk.green(`Daemon is running (PID: ${status.pid})`));
    } else {
      console.log(chalk.yellow("Daemon is not running"));
    }
  });

daemonCmd
  .command("restart")
  .description("Restart the background daemon")
  .action(
    run(async () => {
      stopDaemon();
      await new Promise((resolve) => setTimeout(resolve, 2000));
      startDaemonBackground();
      await new Promise((resolve) => setTimeout(resolve, 1500));
      const status = getDaemonStatus();
      if (status.running) {
        console.log(chalk.green(`Daemon restarted (PID: ${status.pid})`));
      } else {
        console.log(chalk.yellow("Daemon may have failed to restart. Check logs."));
      }
    })
  );

// Hidden run command - used by startDaemonBackground() to spawn the daemon process
daemonCmd
  .command("run", { hidden: true })
  .action(
    run(async () => {
      await startDaemon();
    })
  );

// Contact commands
const contactsCmd = program.command("contacts").description("Browse contacts");

contactsCmd
  .command("list")
  .description("List all contacts")
  .action(
    run(() => {
      const { store } = requireContext();
      const contacts = store.listContacts();

      if (contacts.length === 0) {
        console.log(chalk.yellow("No contacts found."));
        return;
      }

      console.log(chalk.bold(`\nContacts (${contacts.length}):\n`));
      for (const contact of contacts) {
        console.log(`${chalk.cyan(formatContactLine(contact))} ${chalk.dim(contact.filePath)}`);
      }
    })
  );

contactsCmd
  .command("show <contact>")
  .description("Show a contact's details")
  .action(
    run((contact: string) => {
      const { store } = requireContext();
      console.log(formatContact(store.getContact(contact)));
    })
  );

contactsCmd
  .command("search <query>")
  .description("Find contacts by name, email or phone")
  .option("-l, --limit <limit>", "Maximum results", parseLimitOption, 20)
  .action(
    run((query: string, options: { limit: number }) => {
      const { store } = requireContext();
      const matches = new ContactIndex(store.listContacts()).search(query, options.limit);

      if (matches.length === 0) {
        console.log(chalk.yellow("No contacts found."));
        return;
      }

      console.log(chalk.bold(`\nFound ${matches.length} contacts:\n`));
      for (const { contact } of matches) {
        console.log(`${chalk.cyan(formatContactLine(contact))} ${chalk.dim(contact.filePath)}`);
      }
    })
  );

// Reminder commands
const remindersCmd = program.command("reminders").description("Manage scheduled reminders");

remindersCmd
  .command("birthdays <contact>")
  .description("Add birthday reminders to one contact")
  .option("-d, --days <days>", "Days of advance notice (defaults to the configured value)", parseDaysOption)
  .action(
    run((contact: string, options: { days?: number }) => {
      const { commands } = requireContext();
      const { filePath, result } = commands.insertBirthdayReminders(contact, options.days);

      console.log(chalk.dim(filePath));
      const message = describeScheduleResult(result);
      console.log(result.status === "scheduled" && result.created.length > 0 ? chalk.green(message) : message);
    })
  );

remindersCmd
  .command("schedule-all")
  .description("Add missing birthday reminders to every contact")
  .option("-d, --days <days>", "Days of advance notice (defaults to the configured value)", parseDaysOption)
  .action(
    run((options: { days?: number }) => {
      const { commands } = requireContext();
      const entries = commands.scheduleAll(options.days);

      let added = 0;
      for (const entry of entries) {
        if (entry.status === "failed") {
          console.log(chalk.red(`✗ ${entry.filePath}: ${entry.error}`));
        } else if (entry.status === "scheduled") {
          for (const text of entry.created) {
            added++;
            console.log(chalk.green(`+ ${text}`) + chalk.dim(` ${entry.filePath}`));
          }
        }
      }

      const failed = entries.filter((entry) => entry.status === "failed").length;
      console.log(chalk.bold(`\nChecked ${entries.length} documents: ${added} reminders added, ${failed} failed.`));
      if (failed > 0) {
        process.exitCode = 1;
      }
    })
  );

remindersCmd
  .command("add <contact> <text>")
  .description("Add a scheduled reminder under the Reminders heading")
  .option("-d, --date <date>", "Date (YYYY-MM-DD [HH:MM]); prompted for when omitted")
  .option("-r, --repeat <interval>", "Repeat interval, e.g. +1y or +2w")
  .action(
    run(async (contact: string, text: string, options: { date?: string; repeat?: string }) => {
      const { commands } = requireContext();

      let date = options.date;
      if (date === undefined) {
        const response = await prompts({
          type: "text",
          name: "date",
          message: "Scheduled date (YYYY-MM-DD [HH:MM]):",
          validate: (value: string) => {
            try {
              parseReminderDate(value);
              return true;
            } catch (error) {
              return errorMessage(error);
            }
          },
        });
        if (typeof response.date !== "string") {
          console.log(chalk.yellow("Cancelled."));
          return;
        }
        date = response.date;
      }

      const result = commands.insertReminder({ contact, text, date, repeat: options.repeat });
      console.log(chalk.green(`Added "${text}" under ${result.heading} in ${result.filePath}`));
    })
  );

// Properties command
program
  .command("properties")
  .description("List the front matter properties used for contact data")
  .action(
    run(() => {
      const { commands } = requireContext();
      for (const key of commands.listManagedProperties()) {
        console.log(key);
      }
    })
  );

// Config command
program
  .command("config")
  .description("Show current configuration")
  .action(
    run(() => {
      if (!configExists()) {
        console.error(chalk.red("No configuration found. Run 'contact-notes init' first."));
        process.exit(1);
      }

      const config = loadConfig();
      console.log(chalk.bold("\nConfiguration:\n"));
      console.log(`Config file: ${getConfigPath()}`);
      console.log(`Notes directory: ${getNotesDirectory(config)}`);
      console.log(`Contacts directory: ${getContactsDirectory(config)}`);
      console.log(`Contact tag: ${config.contactTag}`);
      console.log(`Reminders heading: ${config.reminders.heading}`);
      console.log(`Advance notice: ${config.reminders.advanceNoticeDays} days`);
      console.log(`Daemon: ${config.daemon.enabled ? "enabled" : "disabled"}`);
    })
  );

program.parseAsync().catch((error) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
