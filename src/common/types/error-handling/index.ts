/**
 * Error handling type definitions
 */

export * from "./api-error.types";
