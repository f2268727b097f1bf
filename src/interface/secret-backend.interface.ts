import { SecretLeaf, SecretSnapshot } from './secret-tree.interface';

/**
 * Store that holds secret leaves under slash-delimited paths.
 *
 * Paths passed to and returned by a backend are absolute: the engine path
 * followed by the sub-path, without leading or trailing slashes.
 */
export interface SecretBackend {
  /**
   * Whether anything is stored below the engine path.
   */
  hasEngine(enginePath: string): Promise<boolean>;

  /**
   * Prepare the engine path for writes.
   */
  enableEngine(enginePath: string): Promise<void>;

  /**
   * Create or overwrite the leaf stored at `path`.
   */
  writeLeaf(path: string, leaf: SecretLeaf): Promise<void>;

  /**
   * Read every leaf stored at or below `join(enginePath, subPath)`.
   *
   * @param includeMetadata - also return version information per path
   */
  readTreeRecursive(
    enginePath: string,
    subPath: string,
    includeMetadata: boolean,
  ): Promise<SecretSnapshot>;
}

/**
 * Destination of rendered text (stdout by default).
 */
export interface OutputSink {
  write(text: string): void;
}
