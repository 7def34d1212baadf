export * from "./http-upstream-telemetry.client";
export * from "./jwt.utils";
export * from "./upstream.errors";
export * from "./upstream.module";
export * from "./upstream.types";
