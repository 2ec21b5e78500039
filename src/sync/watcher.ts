import chokidar, { FSWatcher } from "chokidar";
import { EventEmitter } from "events";
import { ScheduleResult } from "../contacts/scheduler.js";
import { ContactStore } from "../contacts/store.js";

export interface WatcherEvents {
  scheduled: (filePath: string, result: ScheduleResult) => void;
  error: (error: Error, filePath?: string) => void;
  ready: () => void;
}

/**
 * Watches the contacts directory and schedules birthday reminders for every
 * document that is added or changed. Writes made by the scheduler trigger
 * one more pass, which finds the reminders present and writes nothing.
 */
export class FileWatcher extends EventEmitter {
  private store: ContactStore;
  private watcher: FSWatcher | null = null;

  constructor(store: ContactStore) {
    super();
    this.store = store;
  }

  private isContactFile(filePath: string): boolean {
    return filePath.endsWith(".md");
  }

  handleFileChange(filePath: string): void {
    if (!this.isContactFile(filePath)) {
      return;
    }

    try {
      const result = this.store.scheduleFile(filePath);
      this.emit("scheduled", filePath, result);
    } catch (error) {
      this.emit("error", error instanceof Error ? error : new Error(String(error)), filePath);
    }
  }

  start(): void {
    if (this.watcher) {
      return;
    }

    this.watcher = chokidar.watch(this.store.settings.contactsDirectory, {
      ignored: [
        /(^|[\/\\])\../, // dotfiles
        "**/node_modules/**",
      ],
      persistent: true,
      ignoreInitial: false,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100,
      },
    });

    this.watcher
      .on("add", (path) => this.handleFileChange(path))
      .on("change", (path) => this.handleFileChange(path))
      .on("error", (error) => this.emit("error", error instanceof Error ? error : new Error(String(error))))
      .on("ready", () => this.emit("ready"));
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }
}
