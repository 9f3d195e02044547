import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { StorageError } from "../../../packages/core/errors";
import { createJsonFileSessionBackend } from "../../../packages/core/session/fileBackend";
import { createSessionStore } from "../../../packages/core/session/store";

const T0 = Date.UTC(2024, 0, 1);

describe("JSON file session backend", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "hubpair-sessions-"));
    filePath = path.join(dir, "nested", "sessions.json");
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a missing file as empty", async () => {
    const backend = createJsonFileSessionBackend({ filePath });
    expect(await backend.read()).toEqual({});
  });

  it("writes the whole document and leaves no temp or lock files", async () => {
    const backend = createJsonFileSessionBackend({ filePath });
    const entry = { session_id: "sess-1", token: "tok-1", hostname: "laptop1", last_activity: T0 };

    await backend.update((current) => ({ ...current, "hub-abc123": entry }));

    const raw = await fs.readFile(filePath, "utf8");
    expect(raw).toBe(`${JSON.stringify({ "hub-abc123": entry }, null, 2)}\n`);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["sessions.json"]);
    expect(await backend.read()).toEqual({ "hub-abc123": entry });
  });

  it("creates the file readable by the owner only", async () => {
    const backend = createJsonFileSessionBackend({ filePath });
    await backend.update(() => ({ "hub-a": { session_id: "s", token: "t", hostname: "h", last_activity: T0 } }));

    const stat = await fs.stat(filePath);
    expect(stat.mode & 0o777).toBe(0o600);
  });

  it("skips the write when the mutator reports no change", async () => {
    const backend = createJsonFileSessionBackend({ filePath });
    await backend.update(() => undefined);
    await expect(fs.stat(filePath)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("treats an unparseable file as empty", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{not json", "utf8");
    const backend = createJsonFileSessionBackend({ filePath });

    expect(await backend.read()).toEqual({});
    expect(console.warn).toHaveBeenCalled();
  });

  it("treats a JSON array as empty", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "[1,2]", "utf8");
    const backend = createJsonFileSessionBackend({ filePath });

    expect(await backend.read()).toEqual({});
  });

  it("breaks a stale lock left by a crashed process", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const lockPath = `${filePath}.lock`;
    await fs.writeFile(lockPath, "{}", "utf8");
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, old, old);
    const backend = createJsonFileSessionBackend({ filePath, staleLockMs: 10_000 });

    await backend.update(() => ({ "hub-a": { session_id: "s", token: "t", hostname: "h", last_activity: T0 } }));

    expect(Object.keys(await backend.read())).toEqual(["hub-a"]);
    await expect(fs.stat(lockPath)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("gives up when another process holds the lock", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(`${filePath}.lock`, "{}", "utf8");
    const backend = createJsonFileSessionBackend({ filePath, lockTimeoutMs: 100, retryDelayMs: 10 });

    const attempt = backend.update(() => ({}));
    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    await expect(attempt).rejects.toMatchObject({ code: "lock_timeout" });
  });

  it("removes its own lock file when the lock cannot be written", async () => {
    const realOpen = fs.open;
    jest.spyOn(fs, "open").mockImplementationOnce(async (file, flags, mode) => {
      const handle = await realOpen(file, flags, mode);
      handle.writeFile = async () => {
        throw new Error("disk full");
      };
      return handle;
    });
    const backend = createJsonFileSessionBackend({ filePath, lockTimeoutMs: 100, retryDelayMs: 10 });

    await expect(backend.update(() => ({}))).rejects.toMatchObject({ code: "storage_failed" });
    await expect(fs.stat(`${filePath}.lock`)).rejects.toMatchObject({ code: "ENOENT" });

    await backend.update(() => ({ "hub-a": { session_id: "s", token: "t", hostname: "h", last_activity: T0 } }));
    expect(Object.keys(await backend.read())).toEqual(["hub-a"]);
  });

  it("syncs the directory after renaming the new file into place", async () => {
    const open = jest.spyOn(fs, "open");
    const backend = createJsonFileSessionBackend({ filePath });

    await backend.update(() => ({ "hub-a": { session_id: "s", token: "t", hostname: "h", last_activity: T0 } }));

    expect(open).toHaveBeenLastCalledWith(path.dirname(filePath), "r");
  });

  it("serialises concurrent writers so no hub is lost", async () => {
    const storeA = createSessionStore({ backend: createJsonFileSessionBackend({ filePath }), now: () => T0 });
    const storeB = createSessionStore({ backend: createJsonFileSessionBackend({ filePath }), now: () => T0 });
    await Promise.all([storeA.load(), storeB.load()]);

    await Promise.all([
      storeA.upsert({ sessionId: "sess-a", token: "tok-a", hubIdentity: "hub-a", clientHostname: "laptop1", lastActivity: T0 }),
      storeB.upsert({ sessionId: "sess-b", token: "tok-b", hubIdentity: "hub-b", clientHostname: "laptop1", lastActivity: T0 }),
    ]);

    const reader = createSessionStore({ backend: createJsonFileSessionBackend({ filePath }), now: () => T0 });
    await reader.load();
    expect(reader.list().map((r) => r.hubIdentity).sort()).toEqual(["hub-a", "hub-b"]);
  });
});
