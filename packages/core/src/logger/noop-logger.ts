import type { FundflowLogger } from "../types/config.js";

/** Logger that discards everything. */
export function createNoopLogger(): FundflowLogger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
