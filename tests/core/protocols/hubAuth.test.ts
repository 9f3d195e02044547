import {
  classifyErrorReason,
  decodeHubMessage,
  encodeClientMessage,
  isAuthMessage,
  pairingRequestMessage,
  sessionAuthMessage,
} from "../../../packages/core/protocols/hubAuth";

describe("hub auth codec", () => {
  it("encodes session and pairing requests", () => {
    expect(encodeClientMessage(sessionAuthMessage("sess-1"))).toBe('{"status":"auth","session_id":"sess-1"}');
    expect(encodeClientMessage(pairingRequestMessage("12345678", "laptop1"))).toBe(
      '{"status":"auth","pairing_code":"12345678","hostname":"laptop1"}'
    );
  });

  it("decodes the challenge with its hub identity", () => {
    expect(decodeHubMessage('{"status":"auth_required","hub_identity":"hub-abc123"}')).toEqual({
      kind: "challenge",
      hubIdentity: "hub-abc123",
    });
    expect(decodeHubMessage('{"status":"auth_required"}')).toEqual({ kind: "challenge", hubIdentity: null });
  });

  it("decodes verdicts", () => {
    expect(decodeHubMessage('{"status":"authenticated"}')).toEqual({ kind: "authenticated" });
    expect(
      decodeHubMessage('{"status":"auth","result":"granted","session_id":"sess-1","token":"tok-1","pairing_code":"12345678"}')
    ).toEqual({ kind: "granted", sessionId: "sess-1", token: "tok-1", pairingCode: "12345678" });
    expect(decodeHubMessage('{"status":"auth","result":"denied","reason":"rejected by user"}')).toEqual({
      kind: "denied",
      reason: "rejected by user",
      pairingCode: null,
    });
    expect(decodeHubMessage('{"status":"error","message":"expired"}')).toEqual({ kind: "error", reason: "expired" });
    expect(decodeHubMessage('{"status":"error"}')).toEqual({ kind: "error", reason: "unspecified" });
  });

  it("treats authenticated with credentials as a grant", () => {
    expect(decodeHubMessage('{"status":"authenticated","session_id":"sess-2","token":"tok-2"}')).toEqual({
      kind: "granted",
      sessionId: "sess-2",
      token: "tok-2",
      pairingCode: null,
    });
  });

  it("reads fields from a data envelope", () => {
    expect(decodeHubMessage('{"status":"auth","data":{"result":"granted","session_id":"sess-1","token":"tok-1"}}')).toEqual({
      kind: "granted",
      sessionId: "sess-1",
      token: "tok-1",
      pairingCode: null,
    });
  });

  it("passes other traffic through as non-auth", () => {
    const msg = decodeHubMessage('{"status":"agents","agents":[]}');
    expect(msg).toEqual({ kind: "other", status: "agents" });
    expect(msg && isAuthMessage(msg)).toBe(false);
    expect(decodeHubMessage('{"status":"auth","result":"pending"}')).toEqual({ kind: "other", status: "auth" });
  });

  it("rejects frames that are not JSON objects", () => {
    expect(decodeHubMessage("not json")).toBeNull();
    expect(decodeHubMessage("[1,2]")).toBeNull();
    expect(decodeHubMessage("null")).toBeNull();
  });

  it("classifies error reasons", () => {
    expect(classifyErrorReason("expired")).toBe("stale");
    expect(classifyErrorReason("session_expired")).toBe("stale");
    expect(classifyErrorReason("Unknown")).toBe("stale");
    expect(classifyErrorReason("unknown_session")).toBe("stale");
    expect(classifyErrorReason("revoked")).toBe("denied");
  });
});
