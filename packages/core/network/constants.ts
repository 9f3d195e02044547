// Hub listening on the same machine.
export const DEFAULT_DIRECT_URLS = ["ws://127.0.0.1:8080/ws"];

export const CONNECT_TIMEOUT_MS = 5_000;

// Inbound traffic refreshes the stored session at most this often.
export const ACTIVITY_REFRESH_INTERVAL_MS = 60_000;
