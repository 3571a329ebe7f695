/**
 * Validation rules for configuration values.
 *
 * A rule parses an `unknown` (a CLI string, an environment variable or a JSON
 * value) into a typed value, or throws ConfigError naming the field.
 */

import { ConfigError } from '@/utils/errors.js';

/**
 * Base validation rule interface
 */
export interface ValidationRule<T> {
  validate: (value: unknown, field: string) => T;
}

/**
 * Validation options for integer rules
 */
export interface IntegerRuleOptions {
  min?: number;
  max?: number;
}

function describeRange({ min, max }: IntegerRuleOptions): string {
  if (min !== undefined && max !== undefined) return ` between ${min} and ${max}`;
  if (min !== undefined) return ` of at least ${min}`;
  if (max !== undefined) return ` of at most ${max}`;
  return '';
}

/**
 * Integer rule. Accepts numbers and numeric strings.
 *
 * @example
 * ```typescript
 * integerRule({ min: 1, max: 65535 }).validate('9222', 'port'); // 9222
 * integerRule({ min: 1 }).validate('abc', 'port');              // throws ConfigError
 * ```
 */
export function integerRule(options: IntegerRuleOptions = {}): ValidationRule<number> {
  const { min, max } = options;

  return {
    validate: (value, field) => {
      const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : null;
      const parsed = text !== null && /^-?\d+$/.test(text) ? Number(text) : NaN;

      if (!Number.isSafeInteger(parsed) || (min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
        throw new ConfigError(
          `Invalid ${field}: ${JSON.stringify(value)}. Expected an integer${describeRange(options)}`
        );
      }
      return parsed;
    },
  };
}

/**
 * Non-empty string rule. The result is trimmed.
 */
export function nonEmptyStringRule(): ValidationRule<string> {
  return {
    validate: (value, field) => {
      if (typeof value !== 'string') {
        throw new ConfigError(`${field} must be a string, got ${typeof value}`);
      }
      const str = value.trim();
      if (str.length === 0) {
        throw new ConfigError(`${field} cannot be empty`);
      }
      return str;
    },
  };
}

/**
 * Array of non-empty strings.
 */
export function stringListRule(options: { allowEmpty?: boolean } = {}): ValidationRule<string[]> {
  const item = nonEmptyStringRule();

  return {
    validate: (value, field) => {
      if (!Array.isArray(value)) {
        throw new ConfigError(`${field} must be an array of strings`);
      }
      if (value.length === 0 && !options.allowEmpty) {
        throw new ConfigError(`${field} must list at least one entry`);
      }
      return value.map((entry, index) => item.validate(entry, `${field}[${index}]`));
    },
  };
}

export function booleanRule(): ValidationRule<boolean> {
  return {
    validate: (value, field) => {
      if (typeof value !== 'boolean') {
        throw new ConfigError(`${field} must be true or false`);
      }
      return value;
    },
  };
}

/**
 * One of a fixed set of string literals.
 */
export function oneOfRule<T extends string>(choices: readonly T[]): ValidationRule<T> {
  return {
    validate: (value, field) => {
      const match = choices.find((choice) => choice === value);
      if (match === undefined) {
        throw new ConfigError(
          `Invalid ${field}: ${JSON.stringify(value)}. Expected one of: ${choices.join(', ')}`
        );
      }
      return match;
    },
  };
}

/**
 * Wraps a rule so that JSON `null` maps to undefined.
 */
export function nullableRule<T>(rule: ValidationRule<T>): ValidationRule<T | undefined> {
  return {
    validate: (value, field) => (value === null ? undefined : rule.validate(value, field)),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested object rule built from a validator for its fields.
 */
export function objectRule<T>(
  readFields: (source: Record<string, unknown>, field: string) => T
): ValidationRule<T> {
  return {
    validate: (value, field) => {
      if (!isRecord(value)) {
        throw new ConfigError(`${field} must be an object`);
      }
      return readFields(value, field);
    },
  };
}
