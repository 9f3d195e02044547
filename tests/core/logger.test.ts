import { createLogger, getLogLevel, redact, setLogLevel } from "../../packages/core/logger";

describe("logger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    jest.restoreAllMocks();
  });

  it("prefixes the scope and passes metadata through", () => {
    const spy = jest.spyOn(console, "info").mockImplementation(() => undefined);
    createLogger("cascade").info("Trying endpoint", { attempt: 1 });
    expect(spy).toHaveBeenCalledWith("[cascade]", "Trying endpoint", { attempt: 1 });
  });

  it("filters below the current level", () => {
    const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("warn");

    const log = createLogger("auth");
    log.debug("hidden");
    log.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[auth]", "shown");
  });

  it("never prints tokens", () => {
    const spy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger("auth").warn("Saved", { hubIdentity: "hub-abc123", record: { sessionId: "sess-1", token: "test-secret" } });
    expect(spy).toHaveBeenCalledWith("[auth]", "Saved", {
      hubIdentity: "hub-abc123",
      record: { sessionId: "sess-1", token: "[redacted]" },
    });
  });

  it("leaves non-objects alone", () => {
    const err = new Error("boom");
    expect(redact("token")).toBe("token");
    expect(redact(err)).toBe(err);
    expect(redact([{ token: "x" }])).toEqual([{ token: "x" }]);
  });
});
