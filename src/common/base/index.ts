export * from "./base.service";
export * from "./base.controller";
export * from "./mixins/configurable.mixin";
export * from "./mixins/logging.mixin";
