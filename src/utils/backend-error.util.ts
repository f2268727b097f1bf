import { BackendError } from '../errors';

export interface BackendErrorContext {
  /** AWS service name used in messages, e.g. 'SSM Parameter Store' */
  service: string;
  /** What was being done, e.g. 'read secrets from' */
  operation: string;
  region: string;
  path: string;
}

interface ErrorShape {
  name?: string;
  code?: string;
  message?: string;
}

/**
 * Turns AWS SDK and network failures into BackendErrors with guidance for the
 * most common causes.
 */
export class BackendErrorUtil {
  /**
   * Builds a detailed error message based on the error type.
   *
   * @example
   * ```typescript
   * BackendErrorUtil.buildErrorMessage(
   *   { name: 'ThrottlingException', message: 'Rate exceeded' },
   *   { service: 'SSM Parameter Store', operation: 'read secrets from', region: 'us-east-1', path: 'secret/app' },
   * );
   * // "Failed to read secrets from 'secret/app' in SSM Parameter Store (region 'us-east-1') - Request throttled. ..."
   * ```
   */
  static buildErrorMessage(
    error: unknown,
    context: BackendErrorContext,
  ): string {
    const { name, code, message = 'Unknown error occurred' } =
      this.shapeOf(error);
    const baseMessage = `Failed to ${context.operation} '${context.path}' in ${context.service} (region '${context.region}')`;

    if (name === 'AccessDeniedException') {
      return (
        `${baseMessage} - Access Denied. ` +
        `Ensure the IAM role/user is allowed to access '${context.path}'. ` +
        `Error: ${message}`
      );
    }

    if (name === 'ParameterNotFound' || name === 'ResourceNotFoundException') {
      return (
        `${baseMessage} - Not found. ` +
        `Verify the path exists in ${context.service}. ` +
        `Error: ${message}`
      );
    }

    if (
      name === 'InvalidParameterException' ||
      name === 'ValidationException'
    ) {
      return (
        `${baseMessage} - Invalid parameter. ` +
        `Check that the path only contains supported characters. ` +
        `Error: ${message}`
      );
    }

    if (name === 'ThrottlingException') {
      return (
        `${baseMessage} - Request throttled. ` +
        `AWS API rate limit exceeded. Retry later or import fewer secrets at once. ` +
        `Error: ${message}`
      );
    }

    if (name === 'DecryptionFailure') {
      return (
        `${baseMessage} - Decryption failed. ` +
        `Ensure your KMS key permissions are correct and the key is enabled.`
      );
    }

    if (code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
      return (
        `${baseMessage} - Network error (${code}). ` +
        `Unable to reach ${context.service}. Check network connectivity and the configured endpoint. ` +
        `Error: ${message}`
      );
    }

    if (message.includes('Missing credentials')) {
      return (
        `${baseMessage} - Missing AWS credentials. ` +
        `Configure credentials via environment variables, AWS credentials file, or IAM role. ` +
        `Error: ${message}`
      );
    }

    return `${baseMessage} - ${message}`;
  }

  /**
   * Wrap a failure in a BackendError that keeps the original as its cause.
   */
  static toBackendError(
    error: unknown,
    context: BackendErrorContext,
  ): BackendError {
    return new BackendError(this.buildErrorMessage(error, context), {
      cause: error,
    });
  }

  /**
   * Name of an AWS SDK error (e.g. 'ResourceNotFoundException'), if any.
   */
  static nameOf(error: unknown): string | undefined {
    return this.shapeOf(error).name;
  }

  private static shapeOf(error: unknown): ErrorShape {
    if (typeof error !== 'object' || error === null) {
      return error === undefined ? {} : { message: String(error) };
    }
    const shape: ErrorShape = {};
    if ('name' in error && typeof error.name === 'string') {
      shape.name = error.name;
    }
    if ('code' in error && typeof error.code === 'string') {
      shape.code = error.code;
    }
    if (
      'message' in error &&
      typeof error.message === 'string' &&
      error.message !== ''
    ) {
      shape.message = error.message;
    }
    return shape;
  }
}
