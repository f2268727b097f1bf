import { LoggerService } from '@nestjs/common';
import { Scalar, SecretLeaf } from '../interface';
import { PathCodec } from './path-codec.util';
import { SecretTreeUtil } from './secret-tree.util';

/**
 * Encoding of a secret leaf as the single string value a backend stores.
 */
export class StoredLeafUtil {
  static serialize(leaf: SecretLeaf): string {
    return JSON.stringify(leaf);
  }

  /**
   * Parse a stored value back into a leaf.
   * Supports both JSON objects of scalars and plain string values.
   *
   * @param raw - The value as stored
   * @param path - Path the value was stored at
   * @param logger - Logger instance for debug messages
   *
   * @example
   * JSON format:
   * ```typescript
   * StoredLeafUtil.parse('{"user":"alice","pass":"s3cret"}', 'secret/app/db');
   * // Returns: { user: 'alice', pass: 's3cret' }
   * ```
   *
   * Anything else uses the last path segment as key:
   * ```typescript
   * StoredLeafUtil.parse('plain-value', 'secret/app/token');
   * // Returns: { token: 'plain-value' }
   * ```
   */
  static parse(raw: string, path: string, logger?: LoggerService): SecretLeaf {
    const segments = PathCodec.split(path);
    const fallbackKey = segments[segments.length - 1] ?? path;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger?.debug?.(
        `Value at '${path}' is not valid JSON. Treating as plain string.`,
      );
      return { [fallbackKey]: raw };
    }

    if (SecretTreeUtil.isPlainObject(parsed)) {
      const leaf = SecretTreeUtil.record<Scalar>();
      let scalarsOnly = true;
      for (const [key, value] of Object.entries(parsed)) {
        if (SecretTreeUtil.isScalar(value)) {
          leaf[key] = value;
        } else {
          scalarsOnly = false;
        }
      }
      if (scalarsOnly) return leaf;
    }

    logger?.debug?.(
      `Value at '${path}' is not a JSON object of scalars. Using '${fallbackKey}' as key.`,
    );
    return { [fallbackKey]: raw };
  }
}
