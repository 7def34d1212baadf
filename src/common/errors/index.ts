export * from "./api-exception";
export * from "./error-classification";
export * from "./error-normalizer";
