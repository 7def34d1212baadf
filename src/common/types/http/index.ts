/**
 * HTTP-related type definitions
 */

export * from "./client.types";
