// Default bound for a whole handshake, either side.
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
