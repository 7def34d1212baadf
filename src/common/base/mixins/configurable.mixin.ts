import type { Constructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Configuration management capabilities
 */
export interface ConfigurableCapabilities<TConfig extends object> {
  updateConfig(newConfig: Partial<TConfig>): void;
  getConfig(): Readonly<TConfig>;
  validateConfig(config: TConfig): void;
}

/**
 * Mixin that adds validated configuration to a logging-capable service
 */
export function WithConfiguration<TConfig extends object>(defaultConfig: TConfig) {
  return function <TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
    return class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig;

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.config = { ...defaultConfig };
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        const oldConfig = this.config;
        const candidate = { ...this.config, ...newConfig };

        try {
          this.validateConfig(candidate);
        } catch (error) {
          this.logError(error, "Configuration update rejected, keeping previous values");
          throw error;
        }

        this.config = candidate;
        this.onConfigUpdated(oldConfig, candidate);
        this.logger.debug("Configuration updated", {
          service: this.constructor.name,
          changes: this.getConfigChanges(oldConfig, candidate),
        });
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      validateConfig(_config: TConfig): void {
        // Override in subclasses for specific validation
      }

      onConfigUpdated(_oldConfig: TConfig, _newConfig: TConfig): void {
        // Override in subclasses for specific handling
      }

      getConfigChanges(oldConfig: TConfig, newConfig: TConfig): Record<string, { old: unknown; new: unknown }> {
        const changes: Record<string, { old: unknown; new: unknown }> = {};

        for (const key in newConfig) {
          if (oldConfig[key] !== newConfig[key]) {
            changes[key] = { old: oldConfig[key], new: newConfig[key] };
          }
        }

        return changes;
      }
    };
  };
}
