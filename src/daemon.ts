#!/usr/bin/env node

import { readFileSync, writeFileSync, existsSync, unlinkSync } from "fs";
import { spawn, ChildProcess } from "child_process";
import {
  loadConfig,
  configExists,
  getPidFilePath,
  getLogFilePath,
  ensureDirectories,
} from "./config/index.js";
import { createContext } from "./context.js";
import { describeScheduleResult } from "./contacts/format.js";
import { ScheduleResult } from "./contacts/scheduler.js";
import { errorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { FileWatcher } from "./sync/watcher.js";

function writePidFile(pidPath: string): void {
  writeFileSync(pidPath, process.pid.toString());
}

function removePidFile(pidPath: string): void {
  if (existsSync(pidPath)) {
    unlinkSync(pidPath);
  }
}

function readPidFile(pidPath: string): number | null {
  if (!existsSync(pidPath)) {
    return null;
  }
  const pid = parseInt(readFileSync(pidPath, "utf-8").trim(), 10);
  return isNaN(pid) ? null : pid;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export async function startDaemon(): Promise<void> {
  if (!configExists()) {
    console.error("No configuration found. Run 'contact-notes init' first.");
    process.exit(1);
  }

  const config = loadConfig();

  if (!config.daemon.enabled) {
    console.error("Daemon is disabled in configuration.");
    process.exit(1);
  }

  ensureDirectories(config);

  const pidPath = getPidFilePath(config);
  const existingPid = readPidFile(pidPath);

  if (existingPid && isProcessRunning(existingPid)) {
    console.error(`Daemon is already running (PID: ${existingPid})`);
    process.exit(1);
  }

  // Clean up stale PID file
  if (existingPid) {
    removePidFile(pidPath);
  }

  const logger = new Logger({ level: config.logLevel, logFile: getLogFilePath(config) });
  const { store } = createContext(config, { logger });

  logger.info("Starting contact-notes daemon...");
  writePidFile(pidPath);

  const watcher = new FileWatcher(store);

  watcher.on("scheduled", (filePath: string, result: ScheduleResult) => {
    if (result.status === "scheduled" && result.created.length > 0) {
      logger.info(`${filePath}: ${describeScheduleResult(result).replace(/\n/g, " ")}`);
    }
  });

  watcher.on("error", (error: Error, filePath?: string) => {
    logger.error(filePath ? `${filePath}: ${error.message}` : `Watcher error: ${error.message}`);
  });

  watcher.on("ready", () => {
    logger.info("File watcher ready");
  });

  if (config.daemon.watchFiles) {
    watcher.start();
    logger.info(`Watching ${store.settings.contactsDirectory}`);
  } else {
    // Without watching, a single pass over all contacts is all the daemon does
    const entries = store.scheduleAll();
    const failed = entries.filter((entry) => entry.status === "failed").length;
    logger.info(`Checked ${entries.length} documents, ${failed} failed`);
  }

  const shutdown = async () => {
    logger.info("Shutting down daemon...");

    try {
      await watcher.stop();
    } catch (error) {
      logger.error(`Watcher did not close cleanly: ${errorMessage(error)}`);
    }

    removePidFile(pidPath);
    logger.info("Daemon stopped");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
  if (process.platform !== "win32") {
    process.on("SIGHUP", onSignal);
  }

  logger.info(`Daemon started (PID: ${process.pid})`);

  if (!config.daemon.watchFiles) {
    await shutdown();
  }
}

export function stopDaemon(): void {
  if (!configExists()) {
    console.error("No configuration found.");
    process.exit(1);
  }

  const config = loadConfig();
  const pidPath = getPidFilePath(config);
  const pid = readPidFile(pidPath);

  if (!pid) {
    console.log("Daemon is not running (no PID file)");
    return;
  }

  if (!isProcessRunning(pid)) {
    console.log("Daemon is not running (stale PID file)");
    removePidFile(pidPath);
    return;
  }

  try {
    process.kill(pid, "SIGTERM");
    console.log(`Sent SIGTERM to daemon (PID: ${pid})`);

    // Wait for process to exit
    let attempts = 0;
    const checkInterval = setInterval(() => {
      if (!isProcessRunning(pid)) {
        clearInterval(checkInterval);
        console.log("Daemon stopped");
        removePidFile(pidPath);
      } else if (attempts++ > 10) {
        clearInterval(checkInterval);
        console.log("Daemon did not stop gracefully, sending SIGKILL");
        if (isProcessRunning(pid)) {
          process.kill(pid, "SIGKILL");
        }
        removePidFile(pidPath);
      }
    }, 500);
  } catch (error) {
    console.error(`Failed to stop daemon: ${errorMessage(error)}`);
    process.exit(1);
  }
}

export function getDaemonStatus(): {
  running: boolean;
  pid: number | null;
} {
  if (!configExists()) {
    return { running: false, pid: null };
  }

  const config = loadConfig();
  const pidPath = getPidFilePath(config);
  const pid = readPidFile(pidPath);

  if (!pid) {
    return { running: false, pid: null };
  }

  const running = isProcessRunning(pid);

  if (!running) {
    // Clean up stale PID file
    removePidFile(pidPath);
    return { running: false, pid: null };
  }

  return { running: true, pid };
}

export function startDaemonBackground(): ChildProcess {
  const child = spawn(process.execPath, [process.argv[1], "daemon", "run"], {
    detached: true,
    stdio: "ignore",
  });

  child.unref();
  return child;
}
