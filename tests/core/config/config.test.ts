import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, splitAndClean } from "../../../packages/core/config/config";
import { ConfigError } from "../../../packages/core/errors";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "hubpair-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(value: unknown) {
    await fs.mkdir(path.join(dir, "hubpair"), { recursive: true });
    await fs.writeFile(path.join(dir, "hubpair", "config.json"), typeof value === "string" ? value : JSON.stringify(value));
  }

  it("falls back to defaults without a config file", async () => {
    expect(await loadConfig({ env: { XDG_CONFIG_HOME: dir } })).toEqual({
      directUrls: ["ws://127.0.0.1:8080/ws"],
      sessionFile: path.join(dir, "hubpair", "sessions.json"),
      connectTimeoutMs: 5_000,
      challengeTimeoutMs: 5_000,
      verdictTimeoutMs: 10_000,
      pairingTimeoutMs: 300_000,
      logLevel: "info",
    });
  });

  it("reads the config file and resolves the session file beside it", async () => {
    await writeConfig({
      directUrls: ["ws://10.0.0.2:8080/ws"],
      relayUrl: "https://relay.example.com",
      relayCode: "room-1",
      sessionFile: "state/sessions.json",
      verdictTimeoutMs: 2_000,
      logLevel: "debug",
    });

    const config = await loadConfig({ env: { XDG_CONFIG_HOME: dir } });

    expect(config).toMatchObject({
      directUrls: ["ws://10.0.0.2:8080/ws"],
      relayUrl: "https://relay.example.com",
      relayCode: "room-1",
      sessionFile: path.join(dir, "hubpair", "state", "sessions.json"),
      verdictTimeoutMs: 2_000,
      connectTimeoutMs: 5_000,
      logLevel: "debug",
    });
  });

  it("lets the environment override the file", async () => {
    await writeConfig({ directUrls: ["ws://10.0.0.2:8080/ws"], relayCode: "room-1" });
    const sessionFile = path.join(dir, "elsewhere.json");

    const config = await loadConfig({
      env: {
        XDG_CONFIG_HOME: dir,
        HUBPAIR_WS: "ws://a.test:1/ws, ws://b.test:2/ws,",
        HUBPAIR_RELAY_URL: "wss://relay.example.com",
        HUBPAIR_RELAY_CODE: "room-2",
        HUBPAIR_SESSION_FILE: sessionFile,
        HUBPAIR_LOG_LEVEL: "WARN",
        HUBPAIR_CONNECT_TIMEOUT_MS: "1500",
      },
    });

    expect(config).toMatchObject({
      directUrls: ["ws://a.test:1/ws", "ws://b.test:2/ws"],
      relayUrl: "wss://relay.example.com",
      relayCode: "room-2",
      sessionFile,
      logLevel: "warn",
      connectTimeoutMs: 1_500,
    });
  });

  it("rejects a file that is not JSON", async () => {
    await writeConfig("{oops");
    await expect(loadConfig({ env: { XDG_CONFIG_HOME: dir } })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a missing file named explicitly", async () => {
    await expect(loadConfig({ path: path.join(dir, "nope.json"), env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects invalid values", async () => {
    await writeConfig({ directUrls: ["http://10.0.0.2:8080"] });
    await expect(loadConfig({ env: { XDG_CONFIG_HOME: dir } })).rejects.toThrow(
      "directUrls: unsupported scheme http: in http://10.0.0.2:8080"
    );

    await writeConfig({ pairingTimeoutMs: -1 });
    await expect(loadConfig({ env: { XDG_CONFIG_HOME: dir } })).rejects.toThrow(
      "pairingTimeoutMs must be a positive number of milliseconds"
    );
  });

  it("rejects invalid environment values", async () => {
    await expect(loadConfig({ env: { XDG_CONFIG_HOME: dir, HUBPAIR_LOG_LEVEL: "loud" } })).rejects.toBeInstanceOf(ConfigError);
    await expect(
      loadConfig({ env: { XDG_CONFIG_HOME: dir, HUBPAIR_CONNECT_TIMEOUT_MS: "soon" } })
    ).rejects.toThrow("HUBPAIR_CONNECT_TIMEOUT_MS must be a positive integer");
  });
});

describe("splitAndClean", () => {
  it("drops blanks around commas", () => {
    expect(splitAndClean(" a, ,b ,")).toEqual(["a", "b"]);
  });
});
