import { buildCandidates, describeCandidate, relayApiUrl, relayRoomUrl } from "../../../packages/core/network/endpoints";

describe("endpoint candidates", () => {
  beforeEach(() => jest.spyOn(console, "warn").mockImplementation(() => undefined));
  afterEach(() => jest.restoreAllMocks());

  it("puts direct addresses before relay rooms", () => {
    const candidates = buildCandidates(
      {
        directUrls: ["ws://127.0.0.1:8080/ws", "ws://192.168.1.5:8080/ws", "ws://127.0.0.1:8080/ws"],
        relayUrl: "https://relay.example.com",
        relayCode: "room-1",
      },
      ["hub-abc123", "room-1"]
    );

    expect(candidates).toEqual([
      { kind: "direct", url: "ws://127.0.0.1:8080/ws" },
      { kind: "direct", url: "ws://192.168.1.5:8080/ws" },
      { kind: "relay", url: "wss://relay.example.com/ws?role=client&code=room-1", roomCode: "room-1" },
      {
        kind: "relay",
        url: "wss://relay.example.com/ws?role=client&code=hub-abc123",
        roomCode: "hub-abc123",
        expectedHubIdentity: "hub-abc123",
      },
    ]);
  });

  it("registers a fresh relay room when no room code is configured", () => {
    expect(buildCandidates({ directUrls: ["ws://127.0.0.1:8080/ws"], relayUrl: "https://relay.example.com" }, [])).toEqual([
      { kind: "direct", url: "ws://127.0.0.1:8080/ws" },
      { kind: "relay_pairing", url: "https://relay.example.com/api/pair", relayUrl: "https://relay.example.com" },
    ]);
  });

  it("keeps known hub rooms ahead of a fresh registration", () => {
    expect(buildCandidates({ directUrls: [], relayUrl: "wss://relay.example.com/ws" }, ["hub-abc123"])).toEqual([
      {
        kind: "relay",
        url: "wss://relay.example.com/ws?role=client&code=hub-abc123",
        roomCode: "hub-abc123",
        expectedHubIdentity: "hub-abc123",
      },
      { kind: "relay_pairing", url: "https://relay.example.com/api/pair", relayUrl: "wss://relay.example.com/ws" },
    ]);
  });

  it("has no relay candidates without a relay URL", () => {
    expect(buildCandidates({ directUrls: ["ws://127.0.0.1:8080/ws"], relayCode: "room-1" }, ["hub-abc123"])).toEqual([
      { kind: "direct", url: "ws://127.0.0.1:8080/ws" },
    ]);
  });

  it("skips an unusable relay URL", () => {
    expect(buildCandidates({ directUrls: [], relayUrl: "ftp://relay.example.com", relayCode: "room-1" })).toEqual([]);
    expect(console.warn).toHaveBeenCalled();
  });

  it("maps relay URLs to the client websocket endpoint", () => {
    expect(relayRoomUrl("http://relay.local:9000/", "a b")).toBe("ws://relay.local:9000/ws?role=client&code=a+b");
    expect(relayRoomUrl("wss://relay.example.com/base/ws", "x")).toBe("wss://relay.example.com/base/ws?role=client&code=x");
    expect(relayRoomUrl("https://relay.example.com/path?old=1", "x")).toBe("wss://relay.example.com/path/ws?role=client&code=x");
  });

  it("maps relay URLs to the HTTP API", () => {
    expect(relayApiUrl("wss://relay.example.com/ws", "/api/pair")).toBe("https://relay.example.com/api/pair");
    expect(relayApiUrl("http://relay.local:9000/base/", "/api/pair")).toBe("http://relay.local:9000/base/api/pair");
    expect(() => relayApiUrl("ftp://relay.example.com", "/api/pair")).toThrow("Unsupported relay scheme ftp:");
  });

  it("describes candidates for humans", () => {
    expect(describeCandidate({ kind: "direct", url: "ws://127.0.0.1:8080/ws" })).toBe("ws://127.0.0.1:8080/ws");
    expect(describeCandidate({ kind: "relay", url: "wss://r/ws?role=client&code=x", roomCode: "x" })).toBe("relay x");
    expect(
      describeCandidate({ kind: "relay_pairing", url: "https://r.test/api/pair", relayUrl: "https://r.test" })
    ).toBe("relay r.test (new room)");
  });
});
