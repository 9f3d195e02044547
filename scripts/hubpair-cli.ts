#!/usr/bin/env node
import process from "node:process";
import { loadConfig, splitAndClean, type Env, type HubPairConfig } from "../packages/core/config/config";
import { HubAuthError, errorMessage } from "../packages/core/errors";
import { setLogLevel } from "../packages/core/logger";
import { connectToHub } from "../packages/core/network/connect";
import { describeCandidate } from "../packages/core/network/endpoints";
import { createConsoleDisplay } from "../packages/core/pairing/render";
import { createJsonFileSessionBackend } from "../packages/core/session/fileBackend";
import { createSessionStore, type SessionStore } from "../packages/core/session/store";

type Command = "connect" | "sessions" | "logout" | "prune";

export type CliOptions = {
  command?: Command;
  hubIdentity?: string;
  all?: boolean;
  configPath?: string;
  storePath?: string;
  relayUrl?: string;
  directUrls: string[];
  qr: boolean;
  help?: boolean;
  error?: string;
};

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  env: Env;
  signal?: AbortSignal;
};

const COMMANDS: readonly Command[] = ["connect", "sessions", "logout", "prune"];

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { directUrls: [], qr: true };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
        opts.configPath = argv[++i];
        break;
      case "--store":
        opts.storePath = argv[++i];
        break;
      case "--relay":
        opts.relayUrl = argv[++i];
        break;
      case "--direct": {
        const value = argv[++i];
        if (value) opts.directUrls.push(...splitAndClean(value));
        break;
      }
      case "--all":
        opts.all = true;
        break;
      case "--no-qr":
        opts.qr = false;
        break;
      case "-h":
      case "--help":
        opts.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          opts.error = `Unknown option ${arg}`;
        } else {
          positional.push(arg);
        }
    }
  }

  const [command, target] = positional;
  if (command === undefined) {
    opts.command = "connect";
  } else if (isCommand(command)) {
    opts.command = command;
  } else {
    opts.error ??= `Unknown command ${command}`;
  }
  if (opts.command === "logout") {
    if (target) opts.hubIdentity = target;
    else if (!opts.all) opts.error ??= "logout needs a hub identity or --all";
  }
  return opts;
}

export function usage(): string {
  return [
    "Usage:",
    "  hubpair [connect] [--direct <ws-url,...>] [--relay <url>] [--no-qr]",
    "  hubpair sessions",
    "  hubpair logout <hub-identity> | --all",
    "  hubpair prune",
    "",
    "Options:",
    "  --config <file>   config file (default ~/.config/hubpair/config.json)",
    "  --store <file>    session file (default ~/.config/hubpair/sessions.json)",
  ].join("\n");
}

/** Runs one command and resolves to the process exit code. */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const opts = parseArgs(argv);
  if (opts.help) {
    io.out(usage());
    return 0;
  }
  if (opts.error || !opts.command) {
    io.err(opts.error ?? "No command");
    io.err(usage());
    return 2;
  }

  try {
    const config = applyFlags(await loadConfig({ path: opts.configPath, env: io.env }), opts);
    setLogLevel(config.logLevel);
    const store = createSessionStore({
      backend: createJsonFileSessionBackend({ filePath: config.sessionFile }),
    });

    switch (opts.command) {
      case "sessions":
        return await listSessions(store, io);
      case "logout":
        return await logout(store, opts, io);
      case "prune": {
        const pruned = await store.pruneExpired();
        io.out(`Pruned ${pruned} expired session(s)`);
        return 0;
      }
      case "connect":
        return await connect(config, store, opts, io);
    }
  } catch (err) {
    io.err(`[hubpair] ${errorMessage(err)}`);
    return HubAuthError.is(err) && err.code === "aborted" ? 130 : 1;
  }
}

function applyFlags(config: HubPairConfig, opts: CliOptions): HubPairConfig {
  return {
    ...config,
    sessionFile: opts.storePath ?? config.sessionFile,
    relayUrl: opts.relayUrl ?? config.relayUrl,
    directUrls: opts.directUrls.length > 0 ? opts.directUrls : config.directUrls,
  };
}

async function listSessions(store: SessionStore, io: CliIO): Promise<number> {
  await store.load();
  const records = store.list();
  if (records.length === 0) {
    io.out("No active sessions");
    return 0;
  }
  for (const record of records) {
    io.out(`${record.hubIdentity}\t${record.clientHostname}\t${new Date(record.lastActivity).toISOString()}`);
  }
  return 0;
}

async function logout(store: SessionStore, opts: CliOptions, io: CliIO): Promise<number> {
  if (opts.all) {
    const removed = await store.removeAll();
    io.out(`Removed ${removed} session(s)`);
    return 0;
  }
  const hubIdentity = opts.hubIdentity ?? "";
  if (await store.remove(hubIdentity)) {
    io.out(`Logged out of ${hubIdentity}`);
    return 0;
  }
  io.err(`No session for ${hubIdentity}`);
  return 1;
}

async function connect(config: HubPairConfig, store: SessionStore, opts: CliOptions, io: CliIO): Promise<number> {
  const session = await connectToHub({
    config,
    store,
    signal: io.signal,
    display: createConsoleDisplay({ write: io.err, qr: opts.qr }),
    onCascade: (cascade) => {
      cascade.on("failed", ({ candidate, reason }) => io.err(`[hubpair] ${describeCandidate(candidate)}: ${reason}`));
    },
  });
  io.err(`[hubpair] Connected to ${session.hubIdentity} via ${describeCandidate(session.candidate)}`);

  session.onMessage((message) => io.out(JSON.stringify(message)));
  await new Promise<void>((resolve) => {
    session.onClose((reason) => {
      io.err(`[hubpair] Disconnected: ${reason}`);
      resolve();
    });
    io.signal?.addEventListener(
      "abort",
      () => {
        void session.close("client exiting").then(resolve, resolve);
      },
      { once: true }
    );
  });
  return 0;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function main() {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  const code = await run(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
    signal: controller.signal,
  });
  process.off("SIGINT", stop);
  process.off("SIGTERM", stop);
  process.exitCode = code;
}

if (require.main === module) {
  void main();
}
