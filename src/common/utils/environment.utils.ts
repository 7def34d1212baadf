/**
 * Environment Utilities
 * Typed parsing of process.env values with range checks and defaults
 */

import { Logger } from "@nestjs/common";

interface NumericOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

const logger = new Logger("EnvironmentUtils");

export class EnvironmentUtils {
  /**
   * Parse an integer, falling back to the default when missing, malformed or out of range
   */
  static parseInt(key: string, defaultValue: number, options: NumericOptions = {}): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const parsed = Number.parseInt(value, 10);
    const name = options.fieldName || key;
    if (Number.isNaN(parsed)) {
      logger.warn(`Invalid integer value "${value}" for ${name}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.min !== undefined && parsed < options.min) {
      logger.warn(`Value ${parsed} for ${name} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      logger.warn(`Value ${parsed} for ${name} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }

  static parseBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.trim().toLowerCase();
    if (["true", "1", "yes", "on"].includes(lowerValue)) return true;
    if (["false", "0", "no", "off"].includes(lowerValue)) return false;

    logger.warn(`Invalid boolean value "${value}" for ${key}, using default ${defaultValue}`);
    return defaultValue;
  }

  static parseString(key: string, defaultValue: string, options: { pattern?: RegExp } = {}): string {
    const value = process.env[key];
    if (!value) return defaultValue;

    if (options.pattern && !options.pattern.test(value)) {
      logger.warn(`Value for ${key} doesn't match ${options.pattern}, using default`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Parse comma-separated list
   */
  static parseList(key: string, defaultValue: string[] = []): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;

    return value
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
  }
}
