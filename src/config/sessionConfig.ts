export const DEFAULT_SESSION_TTL_SECONDS = 3600;
export const DEFAULT_MAX_ACTIVE_SESSIONS = 10;

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;
export const DEFAULT_UPSTREAM_AUTH_TIMEOUT_MS = 15_000;

// Sweep interval for idle sessions
export const SESSION_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

// Upper bound on upstream diagnostics written to the log
export const DIAGNOSTIC_LOG_MAX_LENGTH = 2000;
