/**
 * Options of one `import` run.
 *
 * @example
 * Preview an import below an engine mount that contains a slash:
 * ```typescript
 * {
 *   enginePath: 'team/kv',
 *   path: 'app',
 *   dryRun: true,
 * }
 * ```
 */
export interface ImportOptions {
  /**
   * Engine mount to import into. Takes precedence over the first segment of
   * `path`.
   */
  enginePath?: string;

  /**
   * Destination path. Without `enginePath` its first segment is the engine.
   * When neither is given the root element of the input is used.
   */
  path?: string;

  /**
   * Write even when the engine already holds secrets.
   *
   * @default false
   */
  force?: boolean;

  /**
   * Render a preview of the merged result instead of writing.
   *
   * @default false
   */
  dryRun?: boolean;

  /**
   * Do not render the imported secrets after writing.
   *
   * @default false
   */
  silent?: boolean;

  /**
   * Render values unmasked.
   *
   * @default false
   */
  showValues?: boolean;

  /**
   * Maximum number of mask characters per value, `-1` disables masking.
   * Defaults to the module's `maxValueLength`.
   */
  maxValueLength?: number;
}

export type ImportStatus = 'unchanged' | 'preview' | 'imported';

export interface ImportResult {
  status: ImportStatus;
  enginePath: string;
  subPath: string;
  /** Absolute paths written (or that would be written on a dry run), sorted. */
  written: string[];
}

/**
 * Options of one `export` run.
 */
export interface ExportOptions {
  enginePath?: string;
  path?: string;

  /**
   * 'native', 'json', 'yaml' or 'shell-export'
   *
   * @default 'native'
   */
  format?: string;

  showValues?: boolean;
  maxValueLength?: number;
  onlyKeys?: boolean;
  onlyPaths?: boolean;

  /**
   * Show the version of each secret (native format only).
   *
   * @default false
   */
  showVersion?: boolean;
}
