/**
 * Barrel exports.
 *
 * Re-exports the screening modules for library-style use. The server and CLI
 * entrypoints are not included.
 */
export * from "./artifacts";
export * from "./assessment";
export * from "./categorize";
export * from "./errors";
export * from "./history";
export * from "./input";
export * from "./model";
export * from "./predict";
export * from "./recommendations";
export * from "./types";
