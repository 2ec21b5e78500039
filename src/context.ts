import { ContactCommands } from "./commands.js";
import { Config } from "./config/index.js";
import { ContactStore } from "./contacts/store.js";
import { resolveContactSettings } from "./contacts/types.js";
import { Logger } from "./logger.js";

export interface AppContext {
  config: Config;
  store: ContactStore;
  commands: ContactCommands;
  logger: Logger;
}

export function createContext(
  config: Config,
  options: { logger?: Logger; now?: () => Date } = {}
): AppContext {
  const logger = options.logger ?? new Logger({ level: config.logLevel });
  const store = new ContactStore(resolveContactSettings(config), { logger, now: options.now });
  const commands = new ContactCommands(store, { now: options.now });
  return { config, store, commands, logger };
}
