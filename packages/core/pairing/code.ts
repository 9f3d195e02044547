import os from "node:os";
import { randomInt } from "node:crypto";

/** Single-use 8-digit code, uniform over 10000000..99999999. */
export function generatePairingCode(): string {
  return String(randomInt(10_000_000, 100_000_000));
}

export function isPairingCode(value: unknown): value is string {
  return typeof value === "string" && /^\d{8}$/.test(value);
}

/** "12345678" -> "1234-5678" */
export function formatPairingCode(code: string): string {
  if (!isPairingCode(code)) return code;
  return `${code.slice(0, 4)}-${code.slice(4)}`;
}

export function localHostname(): string {
  try {
    const name = os.hostname().trim();
    return name.length > 0 ? name : "unknown";
  } catch {
    return "unknown";
  }
}
