import { DELIMITER } from '../constants';
import { MalformedTreeError } from '../errors';
import {
  FlatSecretSet,
  SecretLeaf,
  SecretNode,
  SecretTree,
} from '../interface';
import { SecretTreeUtil } from './secret-tree.util';

/**
 * Conversion between flat, path-addressed secrets and nested secret trees.
 *
 * All functions are pure: inputs are never mutated and results share no
 * mutable state with them.
 */
export class PathCodec {
  /**
   * Split a path into its non-empty segments.
   *
   * @example
   * ```typescript
   * PathCodec.split('/secret//app/'); // ['secret', 'app']
   * ```
   */
  static split(path: string): string[] {
    return path.split(DELIMITER).filter(Boolean);
  }

  /**
   * Join path fragments, dropping empty segments and surplus delimiters.
   *
   * @example
   * ```typescript
   * PathCodec.join('secret/', '', '/app'); // 'secret/app'
   * ```
   */
  static join(...parts: string[]): string {
    return parts.flatMap((part) => this.split(part)).join(DELIMITER);
  }

  static normalize(path: string): string {
    return this.join(path);
  }

  /**
   * Resolve the engine mount and the sub-path beneath it.
   *
   * An explicit engine path is used as is. Otherwise the first segment of
   * `path` is taken as the engine and the rest as the sub-path.
   *
   * @returns `[enginePath, subPath]`
   *
   * @example
   * ```typescript
   * PathCodec.splitEnginePath('', 'secret/app/db'); // ['secret', 'app/db']
   * PathCodec.splitEnginePath('team/kv', 'app'); // ['team/kv', 'app']
   * ```
   */
  static splitEnginePath(enginePath: string, path: string): [string, string] {
    if (this.normalize(enginePath) !== '') {
      return [this.normalize(enginePath), this.normalize(path)];
    }
    const [engine = '', ...rest] = this.split(path);
    return [engine, rest.join(DELIMITER)];
  }

  /**
   * Flatten a tree into one entry per leaf, keyed by `join(prefix, pathSoFar)`.
   *
   * @throws MalformedTreeError when the tree itself is a leaf and no prefix is
   *   given, since the leaf would have no path
   *
   * @example
   * ```typescript
   * PathCodec.flatten(SecretTreeUtil.fromPlain({ app: { db: { user: 'alice' } } }), 'secret');
   * // { 'secret/app/db': { user: 'alice' } }
   * ```
   */
  static flatten(tree: SecretNode, prefix = ''): FlatSecretSet {
    const result: FlatSecretSet = SecretTreeUtil.record<SecretLeaf>();
    this.collect(tree, this.split(prefix), result);
    return result;
  }

  private static collect(
    node: SecretNode,
    trail: string[],
    result: FlatSecretSet,
  ): void {
    if (node.kind === 'leaf') {
      if (trail.length === 0) {
        throw new MalformedTreeError('cannot flatten a leaf without a path');
      }
      const path = trail.join(DELIMITER);
      if (Object.hasOwn(result, path)) {
        throw new MalformedTreeError(
          `path '${path}' is reached by more than one branch of the tree`,
        );
      }
      result[path] = SecretTreeUtil.record(Object.entries(node.values));
      return;
    }
    for (const key of SecretTreeUtil.sortedKeys(node.children)) {
      this.collect(node.children[key], [...trail, ...this.split(key)], result);
    }
  }

  /**
   * Nest a flat secret set into a tree.
   *
   * Each path loses `absolutePrefix`. When `enginePath` is given, its
   * segments are also dropped from the front of the remainder and the whole
   * result is wrapped under one key equal to the engine path, so an engine
   * mount containing the delimiter appears as a single root node.
   *
   * @throws MalformedTreeError when a path lies outside `absolutePrefix`,
   *   nothing remains of it, or it collides with another path (one path needs
   *   a leaf where another needs a subtree)
   *
   * @example
   * ```typescript
   * PathCodec.unflatten('', { 'team/kv/app/db': { user: 'alice' } }, 'team/kv');
   * // { 'team/kv': { app: { db: { user: 'alice' } } } }
   * ```
   */
  static unflatten(
    absolutePrefix: string,
    flat: FlatSecretSet,
    enginePath = '',
  ): SecretTree {
    const root = SecretTreeUtil.subtree();
    for (const path of Object.keys(flat).sort()) {
      const relative = this.split(
        this.relativize(path, absolutePrefix, enginePath),
      );
      if (relative.length === 0) {
        throw new MalformedTreeError(
          `path '${path}' has no segments below '${this.join(absolutePrefix, enginePath)}'`,
        );
      }
      this.insert(root, relative, flat[path], path);
    }

    const engine = this.normalize(enginePath);
    if (engine === '') return root;
    return SecretTreeUtil.subtree({ [engine]: root });
  }

  /**
   * The part of `path` that `unflatten` nests below its root, i.e. the path
   * without `absolutePrefix` and without a leading `enginePath`.
   *
   * @throws MalformedTreeError when `path` lies outside `absolutePrefix`
   */
  static relativize(
    path: string,
    absolutePrefix: string,
    enginePath = '',
  ): string {
    const segments = this.split(path);
    const prefix = this.split(absolutePrefix);
    if (!this.startsWith(segments, prefix)) {
      throw new MalformedTreeError(
        `path '${path}' is outside of '${this.normalize(absolutePrefix)}'`,
      );
    }
    let relative = segments.slice(prefix.length);
    const engine = this.split(enginePath);
    if (engine.length > 0 && this.startsWith(relative, engine)) {
      relative = relative.slice(engine.length);
    }
    return relative.join(DELIMITER);
  }

  private static insert(
    root: SecretTree,
    segments: string[],
    leaf: SecretLeaf,
    path: string,
  ): void {
    let node: SecretTree = root;
    for (const segment of segments.slice(0, -1)) {
      const child = SecretTreeUtil.child(node, segment);
      if (child === undefined) {
        const created = SecretTreeUtil.subtree();
        node.children[segment] = created;
        node = created;
      } else if (child.kind === 'subtree') {
        node = child;
      } else {
        throw new MalformedTreeError(
          `path '${path}' nests below '${segment}', which already holds secrets`,
        );
      }
    }

    const last = segments[segments.length - 1];
    const existing = SecretTreeUtil.child(node, last);
    let values: SecretLeaf = {};
    if (existing !== undefined) {
      if (existing.kind === 'subtree') {
        throw new MalformedTreeError(
          `path '${path}' holds secrets but also has nested paths`,
        );
      }
      values = existing.values;
    }
    node.children[last] = SecretTreeUtil.leaf({ ...values, ...leaf });
  }

  private static startsWith(segments: string[], prefix: string[]): boolean {
    return (
      prefix.length <= segments.length &&
      prefix.every((segment, index) => segments[index] === segment)
    );
  }
}
