export const BACKEND_KINDS = ['parameter-store', 'secrets-manager'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

/**
 * Configuration options for the KvTreeModule.
 *
 * @example
 * SSM Parameter Store:
 * ```typescript
 * {
 *   backend: 'parameter-store',
 *   awsRegion: 'us-east-1',
 * }
 * ```
 *
 * @example
 * Secrets Manager against a local endpoint:
 * ```typescript
 * {
 *   backend: 'secrets-manager',
 *   awsRegion: 'eu-west-1',
 *   endpoint: 'http://localhost:4566',
 *   maxValueLength: 8,
 * }
 * ```
 */
export interface ModuleOptions {
  /**
   * Which AWS service stores the secrets.
   *
   * - `parameter-store`: each leaf is one SecureString parameter holding JSON
   * - `secrets-manager`: each leaf is one secret holding a JSON SecretString
   *
   * @default 'parameter-store'
   */
  backend: BackendKind;

  /**
   * AWS region of the secret store.
   *
   * @example 'us-east-1', 'eu-west-1'
   */
  awsRegion: string;

  /**
   * Custom endpoint URL, e.g. for a local AWS emulator.
   */
  endpoint?: string;

  /**
   * Default number of mask characters shown per value.
   * `-1` disables masking.
   *
   * @default 12
   */
  maxValueLength?: number;
}
