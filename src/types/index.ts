/**
 * Shared type foundations.
 */

export * from "./pipeline.js";
