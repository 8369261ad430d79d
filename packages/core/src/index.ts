/**
 * @sdkpath/core
 * Core types, schemas, messages, and the PATH auditor for sdkpath
 */

// Types
export * from "./types.js";

// Schemas
export * from "./schema.js";

// Utilities
export * from "./utils.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";

// Messages and markup
export * from "./messages.js";
export * from "./markup.js";

// Platform gate
export { TARGET_PLATFORM, isTargetPlatform } from "./platform.js";

// Auditor
export * from "./auditor.js";
