import { AmbiguousRootError } from '../errors';
import { SecretNode } from '../interface';
import { PathCodec } from './path-codec.util';

export type RootKind = 'engine' | 'sub-path';

/**
 * Determines where imported secrets live when no destination is given.
 */
export class RootResolver {
  /**
   * Return the single top-level key of a tree.
   *
   * @throws AmbiguousRootError when the tree is a leaf or has zero or several
   *   top-level keys
   *
   * @example
   * ```typescript
   * RootResolver.resolve(SecretTreeUtil.fromPlain({ secret: { app: { db: { user: 'alice' } } } }));
   * // 'secret'
   * ```
   */
  static resolve(tree: SecretNode): string {
    if (tree.kind === 'leaf') {
      throw new AmbiguousRootError([]);
    }
    const keys = Object.keys(tree.children).sort();
    if (keys.length !== 1) {
      throw new AmbiguousRootError(keys);
    }
    return keys[0];
  }

  /**
   * Heuristic: a root with more than one segment names an engine mount
   * (`team/kv`), a single segment names a plain path (`secret`).
   *
   * A single-segment engine mount is reported as `sub-path`; it still ends up
   * as the engine through `PathCodec.splitEnginePath`.
   */
  static classify(rootPath: string): RootKind {
    return PathCodec.split(rootPath).length > 1 ? 'engine' : 'sub-path';
  }
}
