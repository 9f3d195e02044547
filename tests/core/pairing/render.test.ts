import {
  buildPairingLink,
  createConsoleDisplay,
  formatPairingPrompt,
  renderPairingQr,
} from "../../../packages/core/pairing/render";

const prompt = { code: "12345678", hostname: "laptop1", hubIdentity: "hub-abc123" };

describe("pairing prompt", () => {
  it("formats the code, host and hub", () => {
    expect(formatPairingPrompt(prompt)).toEqual([
      "Pairing with hub hub-abc123",
      "  Code: 1234-5678",
      "  This machine: laptop1",
      "  Approve the request on the hub. Waiting for approval...",
    ]);
  });

  it("builds an escaped deep link", () => {
    expect(buildPairingLink(prompt)).toBe("hubpair://pair?hub=hub-abc123&host=laptop1&code=12345678");
    expect(buildPairingLink({ ...prompt, hubIdentity: "hub/1", hostname: "my laptop" })).toBe(
      "hubpair://pair?hub=hub%2F1&host=my+laptop&code=12345678"
    );
  });

  it("renders the link as a terminal QR code", async () => {
    const qr = await renderPairingQr(buildPairingLink(prompt));
    expect(typeof qr).toBe("string");
    expect(qr.split("\n").length).toBeGreaterThan(10);
  });

  it("writes the prompt to the sink", async () => {
    const lines: string[] = [];
    await createConsoleDisplay({ write: (line) => lines.push(line) })(prompt);
    expect(lines).toEqual(formatPairingPrompt(prompt));
  });

  it("appends the QR code and link when asked", async () => {
    const lines: string[] = [];
    await createConsoleDisplay({ write: (line) => lines.push(line), qr: true })(prompt);
    expect(lines).toHaveLength(6);
    expect(lines[5]).toBe("  hubpair://pair?hub=hub-abc123&host=laptop1&code=12345678");
  });
});
