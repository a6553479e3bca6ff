/**
 * @shortbox/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, and constants.
 * Import from "@shortbox/shared", never from internal paths.
 */

// Types (LinkRecord, ClickBudget, Notification, ErrorCode, Result, ...)
export * from "./types/index.js";

// Utilities (slug generation, URL/owner validation, short form helpers)
export * from "./utils/index.js";

// Constants (SLUG_CONFIG, SHORT_LINK_CONFIG, LINK_TTL_CONFIG)
export * from "./constants/index.js";
