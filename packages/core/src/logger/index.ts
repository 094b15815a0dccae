export { type ConsoleLoggerOptions, createConsoleLogger, formatFields } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { createNoopLogger } from "./noop-logger.js";
export { type LogLevel, maskAccountNumber, type RedactionOptions } from "./redact.js";
