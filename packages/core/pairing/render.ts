import QRCode from "qrcode";
import { formatPairingCode } from "./code";

export interface PairingPrompt {
  code: string;
  hostname: string;
  hubIdentity: string;
}

export type PairingDisplay = (prompt: PairingPrompt) => Promise<void>;

const LINK_SCHEME = "hubpair://pair";

/** Deep link a hub-side app can open to pre-fill the approval dialog. */
export function buildPairingLink(prompt: PairingPrompt): string {
  const params = new URLSearchParams({
    hub: prompt.hubIdentity,
    host: prompt.hostname,
    code: prompt.code,
  });
  return `${LINK_SCHEME}?${params.toString()}`;
}

export function formatPairingPrompt(prompt: PairingPrompt): string[] {
  return [
    `Pairing with hub ${prompt.hubIdentity}`,
    `  Code: ${formatPairingCode(prompt.code)}`,
    `  This machine: ${prompt.hostname}`,
    "  Approve the request on the hub. Waiting for approval...",
  ];
}

export async function renderPairingQr(link: string): Promise<string> {
  return await QRCode.toString(link, { type: "terminal" });
}

export function createConsoleDisplay(options: {
  write?: (line: string) => void;
  qr?: boolean;
} = {}): PairingDisplay {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return async (prompt) => {
    for (const line of formatPairingPrompt(prompt)) write(line);
    if (options.qr) {
      const link = buildPairingLink(prompt);
      write(await renderPairingQr(link));
      write(`  ${link}`);
    }
  };
}
