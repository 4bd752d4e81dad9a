/**
 * Exclusive lock file for long-running processes (the command bot).
 *
 * The file holds the owner's pid. A lock whose owner is gone is stale and
 * is taken over.
 */
import { closeSync, openSync, readFileSync, unlinkSync, writeSync } from "node:fs";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "./logger.js";

const log = createLogger("lock");

export type LockError =
  | { readonly type: "LOCK_HELD"; readonly message: string; readonly pid: number }
  | { readonly type: "LOCK_FAILED"; readonly message: string; readonly path: string };

export interface ProcessLock {
  readonly path: string;
  release(): void;
}

function errorCode(error: unknown): string | null {
  return error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Signal 0 probes a pid without touching it. EPERM means it exists.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

function readOwner(path: string): number | null {
  try {
    const pid = Number.parseInt(readFileSync(path, "utf8").trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    log.debug({ path, error: errorMessage(error) }, "Lock owner unreadable");
    return null;
  }
}

function create(path: string, pid: number): Result<ProcessLock, "exists" | LockError> {
  let fd: number;
  try {
    fd = openSync(path, "wx");
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return err("exists" as const);
    }
    return err({
      type: "LOCK_FAILED",
      message: `Cannot create lock ${path}: ${errorMessage(error)}`,
      path,
    });
  }

  try {
    writeSync(fd, `${pid}\n`);
  } finally {
    closeSync(fd);
  }

  let released = false;
  return ok({
    path,
    release() {
      if (released) return;
      released = true;
      try {
        unlinkSync(path);
        log.debug({ path }, "Lock released");
      } catch (error) {
        log.warn({ path, error: errorMessage(error) }, "Could not remove lock file");
      }
    },
  });
}

/**
 * Take the lock at `path`, replacing a stale one once.
 */
export function acquireLock(
  path: string,
  pid: number = process.pid,
): Result<ProcessLock, LockError> {
  const first = create(path, pid);
  if (first.isOk()) {
    log.debug({ path, pid }, "Lock acquired");
    return ok(first.value);
  }
  if (first.error !== "exists") {
    return err(first.error);
  }

  const owner = readOwner(path);
  if (owner !== null && isProcessAlive(owner)) {
    return err({
      type: "LOCK_HELD",
      message: `Another instance is running (pid ${owner}, lock ${path})`,
      pid: owner,
    });
  }

  log.warn({ path, owner }, "Removing stale lock");
  try {
    unlinkSync(path);
  } catch (error) {
    return err({
      type: "LOCK_FAILED",
      message: `Cannot remove stale lock ${path}: ${errorMessage(error)}`,
      path,
    });
  }

  const second = create(path, pid);
  if (second.isOk()) {
    return ok(second.value);
  }
  return err(
    second.error === "exists"
      ? {
          type: "LOCK_FAILED",
          message: `Lock ${path} was taken while replacing a stale lock`,
          path,
        }
      : second.error,
  );
}
