import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithLogging } from "./mixins/logging.mixin";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

const LoggingBase = WithLogging(SimpleBase);

/**
 * Base service class providing a per-class NestJS logger
 */
export abstract class BaseService extends LoggingBase {}

/**
 * Base class for services that own a typed, runtime-updatable configuration.
 * Usage: `class MyService extends ConfigurableService(DEFAULTS) {}`
 */
export function ConfigurableService<TConfig extends object>(defaultConfig: TConfig) {
  return WithConfiguration<TConfig>(defaultConfig)(LoggingBase);
}
