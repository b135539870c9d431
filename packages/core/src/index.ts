// Storage contract
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, ClearlineErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, ClearlineError, errorMessage, isBaseErrorCode } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
