import { InvalidOptionsError } from '../errors';
import { BACKEND_KINDS, BackendKind, ModuleOptions } from '../interface';

/**
 * Parsing and validation of kvtree configuration values.
 */
export class KvTreeConfigUtil {
  /**
   * Parse a configuration value as boolean.
   * Handles both boolean and string values from ConfigService or the
   * environment.
   *
   * @example
   * ```typescript
   * KvTreeConfigUtil.parseBoolean(true); // true
   * KvTreeConfigUtil.parseBoolean('TRUE'); // true
   * KvTreeConfigUtil.parseBoolean('anything'); // false
   * ```
   */
  static parseBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  }

  /**
   * Parse a configuration value as integer.
   *
   * @returns the integer, or `fallback` when the value is absent or empty
   * @throws InvalidOptionsError when the value is present but not an integer
   */
  static parseInteger(value: unknown, fallback: number, name: string): number {
    if (value === undefined || value === null || value === '') return fallback;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isInteger(parsed)) {
      throw new InvalidOptionsError(
        `${name} must be an integer, got '${String(value)}'`,
      );
    }
    return parsed;
  }

  static parseBackendKind(value: unknown): BackendKind {
    if (value === undefined || value === null || value === '') {
      return 'parameter-store';
    }
    const kind = BACKEND_KINDS.find((candidate) => candidate === value);
    if (kind === undefined) {
      throw new InvalidOptionsError(
        `unknown backend '${String(value)}'. Supported backends: ${BACKEND_KINDS.join(', ')}`,
      );
    }
    return kind;
  }

  /**
   * Validates module options once, at construction.
   *
   * @throws InvalidOptionsError if validation fails
   */
  static validateOptions(options: ModuleOptions): ModuleOptions {
    this.parseBackendKind(options.backend);

    if (!options.awsRegion || options.awsRegion.trim() === '') {
      throw new InvalidOptionsError(
        'AWS region is required. Set KVTREE_AWS_REGION or AWS_REGION (e.g., us-east-1)',
      );
    }

    if (options.endpoint !== undefined && !URL.canParse(options.endpoint)) {
      throw new InvalidOptionsError(
        `endpoint must be a valid URL. Received: '${options.endpoint}'`,
      );
    }

    if (
      options.maxValueLength !== undefined &&
      (!Number.isInteger(options.maxValueLength) || options.maxValueLength < -1)
    ) {
      throw new InvalidOptionsError(
        `max value length must be an integer >= -1. Received: ${options.maxValueLength}`,
      );
    }

    return options;
  }
}
