/**
 * Utilities module exports
 */

// Exclusive lock serializing access to a parsing engine
export { AccessLock } from "./access-lock.js";
