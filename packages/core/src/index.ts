/**
 * Core package centralizes shared contracts, configuration, logging and
 * error types. Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./env";
export * from "./market";
export * from "./utils/logger";
export * from "./utils/fingerprint";
