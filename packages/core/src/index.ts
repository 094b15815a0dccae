// Types
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, FundflowErrorCode, InsufficientFundsDetails, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, FundflowError, getInsufficientFundsDetails } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
