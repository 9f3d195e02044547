import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { StorageError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { writeFileAtomically } from "./atomicWrite";
import type { SessionBackend } from "./backend";
import type { SessionFileData } from "./types";

const log = createLogger("session-file");

export interface JsonFileSessionBackendOptions {
  filePath: string;
  /** Give up acquiring the lock after this long. */
  lockTimeoutMs?: number;
  /** A lock file older than this is left over from a crashed process. */
  staleLockMs?: number;
  retryDelayMs?: number;
}

export function createJsonFileSessionBackend(options: JsonFileSessionBackendOptions): SessionBackend {
  const filePath = path.resolve(options.filePath);
  const lockPath = `${filePath}.lock`;
  const lockTimeoutMs = options.lockTimeoutMs ?? 2_000;
  const staleLockMs = options.staleLockMs ?? 10_000;
  const retryDelayMs = options.retryDelayMs ?? 25;

  async function read(): Promise<SessionFileData> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return {};
      log.warn("Session file unreadable, starting empty", { filePath, error: errorMessage(err) });
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
      log.warn("Session file is not a JSON object, starting empty", { filePath });
    } catch (err) {
      log.warn("Session file unparseable, starting empty", { filePath, error: errorMessage(err) });
    }
    return {};
  }

  async function acquireLock(): Promise<() => Promise<void>> {
    await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    const started = Date.now();
    for (;;) {
      let handle: FileHandle | undefined;
      try {
        handle = await fs.open(lockPath, "wx", 0o600);
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") {
          throw new StorageError(`Cannot create lock ${lockPath}`, "storage_failed", err);
        }
      }
      if (handle) {
        await writeLockOwner(handle, lockPath);
        return async () => {
          await fs.rm(lockPath, { force: true });
        };
      }
      if (await isStale(lockPath, staleLockMs)) {
        log.warn("Breaking stale session lock", { lockPath });
        await fs.rm(lockPath, { force: true });
        continue;
      }
      if (Date.now() - started >= lockTimeoutMs) {
        throw new StorageError(`Timed out waiting for ${lockPath}`, "lock_timeout");
      }
      await delay(retryDelayMs);
    }
  }

  return {
    read,
    async update(mutate) {
      const release = await acquireLock();
      try {
        const current = await read();
        const next = mutate(current);
        if (next === undefined) return current;
        try {
          await writeFileAtomically(filePath, `${JSON.stringify(next, null, 2)}\n`, { mode: 0o600 });
        } catch (err) {
          throw new StorageError(`Failed to write ${filePath}`, "storage_failed", err);
        }
        return next;
      } finally {
        await release();
      }
    },
  };
}

/** A lock this process created but could not fill is removed, never left to go stale. */
async function writeLockOwner(handle: FileHandle, lockPath: string) {
  try {
    await handle.writeFile(JSON.stringify({ pid: process.pid, at: Date.now() }), "utf8");
  } catch (err) {
    await handle.close();
    await fs.rm(lockPath, { force: true });
    throw new StorageError(`Cannot write lock ${lockPath}`, "storage_failed", err);
  }
  await handle.close();
}

async function isStale(lockPath: string, staleLockMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleLockMs;
  } catch {
    // released between open and stat
    return false;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
