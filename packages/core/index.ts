export * from "./errors";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./logger";
export * from "./config/config";
export * from "./session/types";
export * from "./session/expiry";
export { createMemorySessionBackend, type SessionBackend } from "./session/backend";
export { createJsonFileSessionBackend, type JsonFileSessionBackendOptions } from "./session/fileBackend";
export { createSessionStore, type SessionStore } from "./session/store";
export * from "./protocols/hubAuth";
export type { HubConnection, CloseInfo } from "./messaging/connection";
export * from "./pairing/types";
export { formatPairingCode, generatePairingCode } from "./pairing/code";
export * from "./pairing/render";
export { createPairingNegotiator, type PairingNegotiator } from "./pairing/negotiator";
export * from "./auth/types";
export { authenticate, type AuthenticateOptions } from "./auth/authenticator";
export * from "./network/types";
export { buildCandidates, relayRoomUrl } from "./network/endpoints";
export { connectWebSocket } from "./network/wsConnector";
export { createEndpointCascade, type EndpointCascade } from "./network/cascade";
export { createHubSession, type HubSession } from "./network/hubSession";
export { connectToHub, type ConnectToHubOptions } from "./network/connect";
