// =============================================================================
// STORE ERROR CLASSIFICATION
// =============================================================================
// Maps driver / PostgreSQL failures onto the three outcomes the unit of work
// cares about: retry it, give up because the store is gone, or propagate as is.

/** SQLSTATEs raised by lock contention. Safe to retry the whole unit of work. */
const RETRYABLE_SQLSTATES = new Set([
	"55P03", // lock_not_available (lock_timeout, NOWAIT)
	"40001", // serialization_failure
	"40P01", // deadlock_detected
]);

/** SQLSTATEs meaning the server went away or refused us. */
const UNAVAILABLE_SQLSTATES = new Set([
	"57P01", // admin_shutdown
	"57P02", // crash_shutdown
	"57P03", // cannot_connect_now
	"53300", // too_many_connections
]);

/** Node socket error codes seen when the server is unreachable. */
const UNAVAILABLE_ERRNOS = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ETIMEDOUT",
	"ENOTFOUND",
	"EPIPE",
	"EHOSTUNREACH",
]);

export type StoreErrorKind = "retryable" | "unavailable" | "unknown";

function errorCode(error: unknown): string | null {
	if (typeof error !== "object" || error === null || !("code" in error)) return null;
	return typeof error.code === "string" ? error.code : null;
}

export function classifyStoreError(error: unknown): StoreErrorKind {
	const code = errorCode(error);
	if (code) {
		if (RETRYABLE_SQLSTATES.has(code)) return "retryable";
		if (UNAVAILABLE_SQLSTATES.has(code) || UNAVAILABLE_ERRNOS.has(code)) return "unavailable";
		// Class 08: connection exception
		if (code.startsWith("08")) return "unavailable";
	}

	if (error instanceof Error) {
		const message = error.message.toLowerCase();
		if (message.includes("lock timeout") || message.includes("could not obtain lock")) {
			return "retryable";
		}
		if (
			message.includes("connection terminated") ||
			message.includes("connection refused") ||
			message.includes("timeout exceeded when trying to connect")
		) {
			return "unavailable";
		}
	}

	return "unknown";
}
