import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import type { Candidate } from "./types";

const log = createLogger("endpoints");

export interface EndpointSettings {
  directUrls: string[];
  relayUrl?: string;
  relayCode?: string;
}

/**
 * Ordered candidates: every direct URL, then one relay room per code.
 * The configured room comes first, then known hubs most recently used first.
 * Without a configured room, a fresh one is registered with the relay last.
 */
export function buildCandidates(settings: EndpointSettings, knownHubIdentities: string[] = []): Candidate[] {
  const candidates: Candidate[] = [];
  const seen = new Set<string>();
  const add = (candidate: Candidate) => {
    if (seen.has(candidate.url)) return;
    seen.add(candidate.url);
    candidates.push(candidate);
  };

  for (const url of settings.directUrls) add({ kind: "direct", url });

  if (settings.relayUrl) {
    const rooms: Array<{ roomCode: string; expectedHubIdentity?: string }> = [];
    if (settings.relayCode) rooms.push({ roomCode: settings.relayCode });
    for (const hubIdentity of knownHubIdentities) rooms.push({ roomCode: hubIdentity, expectedHubIdentity: hubIdentity });

    for (const room of rooms) {
      try {
        add({ kind: "relay", url: relayRoomUrl(settings.relayUrl, room.roomCode), ...room });
      } catch (err) {
        log.warn("Skipping relay candidate", { relayUrl: settings.relayUrl, error: errorMessage(err) });
        break;
      }
    }

    if (!settings.relayCode) {
      try {
        add({ kind: "relay_pairing", url: relayApiUrl(settings.relayUrl, "/api/pair"), relayUrl: settings.relayUrl });
      } catch (err) {
        log.warn("Skipping relay registration", { relayUrl: settings.relayUrl, error: errorMessage(err) });
      }
    }
  }
  return candidates;
}

/** `https://relay.example` -> `wss://relay.example/ws?role=client&code=<room>` */
export function relayRoomUrl(relayUrl: string, roomCode: string): string {
  const url = new URL(relayUrl);
  if (url.protocol === "http:") url.protocol = "ws:";
  else if (url.protocol === "https:") url.protocol = "wss:";
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new Error(`Unsupported relay scheme ${url.protocol}`);
  }
  const base = url.pathname.replace(/\/+$/, "");
  url.pathname = base.endsWith("/ws") ? base : `${base}/ws`;
  url.search = "";
  url.searchParams.set("role", "client");
  url.searchParams.set("code", roomCode);
  return url.toString();
}

/** `wss://relay.example/ws` -> `https://relay.example<apiPath>` */
export function relayApiUrl(relayUrl: string, apiPath: string): string {
  const url = new URL(relayUrl);
  if (url.protocol === "ws:") url.protocol = "http:";
  else if (url.protocol === "wss:") url.protocol = "https:";
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`Unsupported relay scheme ${url.protocol}`);
  }
  const base = url.pathname.replace(/\/+$/, "").replace(/\/ws$/, "");
  url.pathname = `${base}${apiPath}`;
  url.search = "";
  return url.toString();
}

export function describeCandidate(candidate: Candidate): string {
  switch (candidate.kind) {
    case "relay":
      return `relay ${candidate.roomCode}`;
    case "relay_pairing":
      return `relay ${new URL(candidate.relayUrl).host} (new room)`;
    case "direct":
      return candidate.url;
  }
}
