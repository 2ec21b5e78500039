import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "../errors.js";
import { Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".contact-notes.json";

export function getConfigPath(): string {
  return process.env.CONTACT_NOTES_CONFIG
    ? expandPath(process.env.CONTACT_NOTES_CONFIG)
    : join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  return parseConfig(readFileSync(configPath, "utf-8"), configPath);
}

export function parseConfig(raw: string, source: string = getConfigPath()): Config {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file: ${source}`, { cause: error });
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${issues}`);
  }
  return result.data;
}

export function saveConfig(config: Config): void {
  const configPath = getConfigPath();
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

export function getNotesDirectory(config: Config): string {
  return expandPath(config.notesDirectory);
}

export function getContactsDirectory(config: Config): string {
  return expandPath(config.contactsDirectory ?? config.notesDirectory);
}

export function getStateDirectory(config: Config): string {
  return join(getNotesDirectory(config), ".contact-notes");
}

export function getPidFilePath(config: Config): string {
  if (config.daemon.pidFile) {
    return expandPath(config.daemon.pidFile);
  }
  return join(getStateDirectory(config), "daemon.pid");
}

export function getLogFilePath(config: Config): string {
  if (config.daemon.logFile) {
    return expandPath(config.daemon.logFile);
  }
  return join(getStateDirectory(config), "daemon.log");
}

export function ensureDirectories(config: Config): void {
  for (const dir of [getContactsDirectory(config), getStateDirectory(config)]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

export * from "./schema.js";
