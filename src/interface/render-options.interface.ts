import { SecretMetadata } from './secret-tree.interface';

export const OUTPUT_FORMATS = ['native', 'json', 'yaml', 'shell-export'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Options controlling how a secret tree is rendered.
 *
 * Build instances with `SecretRendererUtil.resolveRenderOptions`, which fills
 * in defaults and validates the combination once.
 *
 * @example
 * ```typescript
 * {
 *   format: 'yaml',
 *   maskValues: true,
 *   maskLength: 12,
 *   onlyKeys: false,
 *   onlyPaths: false,
 * }
 * ```
 */
export interface RenderOptions {
  /**
   * @default 'native'
   */
  format: OutputFormat;

  /**
   * Replace values with mask characters before rendering.
   *
   * @default true
   */
  maskValues: boolean;

  /**
   * Maximum number of mask characters per value.
   * `-1` leaves values unmasked even when `maskValues` is true.
   *
   * @default 12
   */
  maskLength: number;

  /**
   * Render keys without their values. Cannot be combined with `onlyPaths`.
   *
   * @default false
   */
  onlyKeys: boolean;

  /**
   * Render paths only. Cannot be combined with `onlyKeys`.
   *
   * @default false
   */
  onlyPaths: boolean;

  /**
   * Per-path metadata keyed by the rendered path (segments joined with '/').
   * Only the native format shows it.
   */
  metadata?: Record<string, SecretMetadata>;
}
