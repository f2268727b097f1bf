import { MalformedTreeError } from '../errors';
import {
  LeafNode,
  Scalar,
  SecretLeaf,
  SecretNode,
  SecretTree,
  SubtreeNode,
} from '../interface';

/**
 * Plain, JSON-compatible view of a secret node.
 * `null` stands for a leaf whose content is hidden.
 */
export type PlainSecretNode = { [key: string]: PlainSecretNode | Scalar };

/**
 * Construction, conversion and comparison helpers for secret trees.
 */
export class SecretTreeUtil {
  static leaf(values: SecretLeaf = {}): LeafNode {
    return { kind: 'leaf', values: this.record(Object.entries(values)) };
  }

  static subtree(children: Record<string, SecretNode> = {}): SubtreeNode {
    return { kind: 'subtree', children: this.record(Object.entries(children)) };
  }

  /**
   * A record without a prototype, so that path segments and keys such as
   * `constructor` or `__proto__` are plain entries.
   */
  static record<T>(entries: Iterable<[string, T]> = []): Record<string, T> {
    const record: Record<string, T> = Object.create(null);
    for (const [key, value] of entries) {
      record[key] = value;
    }
    return record;
  }

  /** The child stored under `key`, ignoring inherited properties. */
  static child(node: SubtreeNode, key: string): SecretNode | undefined {
    return Object.hasOwn(node.children, key) ? node.children[key] : undefined;
  }

  static isScalar(value: unknown): value is Scalar {
    return (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    );
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Build a tree from parsed JSON/YAML.
   *
   * An object whose values are all scalars becomes a leaf, an object whose
   * values are all objects becomes a subtree, and an empty object becomes an
   * empty subtree.
   *
   * @throws MalformedTreeError when a node mixes scalars and objects, holds an
   *   array, or the input is not an object
   *
   * @example
   * ```typescript
   * SecretTreeUtil.fromPlain({ app: { db: { user: 'alice' } } });
   * ```
   */
  static fromPlain(input: unknown): SecretTree {
    if (!this.isPlainObject(input)) {
      throw new MalformedTreeError(
        `expected an object of secret paths, got ${this.describe(input)}`,
      );
    }
    const node = this.nodeFromPlain(input, []);
    if (node.kind === 'leaf') {
      throw new MalformedTreeError(
        'top-level input holds key/value pairs without a path',
      );
    }
    return node;
  }

  private static nodeFromPlain(
    input: Record<string, unknown>,
    trail: string[],
  ): SecretNode {
    const entries = Object.entries(input);
    const where = trail.length > 0 ? `'${trail.join('/')}'` : 'top level';

    for (const [key, value] of entries) {
      if (!this.isScalar(value) && !this.isPlainObject(value)) {
        throw new MalformedTreeError(
          `unsupported value for '${key}' at ${where}: ${this.describe(value)}`,
        );
      }
    }

    const scalars = entries.filter(([, value]) => this.isScalar(value));
    if (scalars.length > 0 && scalars.length < entries.length) {
      throw new MalformedTreeError(
        `node at ${where} mixes key/value pairs with nested paths`,
      );
    }

    if (entries.length > 0 && scalars.length === entries.length) {
      const values = this.record<Scalar>();
      for (const [key, value] of entries) {
        if (this.isScalar(value)) values[key] = value;
      }
      return this.leaf(values);
    }

    const children = this.record<SecretNode>();
    for (const [key, value] of entries) {
      if (this.isPlainObject(value)) {
        children[key] = this.nodeFromPlain(value, [...trail, key]);
      }
    }
    return this.subtree(children);
  }

  /**
   * Convert a node back to plain objects, with keys inserted in lexicographic
   * order at every level.
   */
  static toPlain(node: SecretNode): PlainSecretNode {
    if (node.kind === 'leaf') {
      return Object.fromEntries(
        this.sortedKeys(node.values).map((key): [string, Scalar] => [
          key,
          node.values[key],
        ]),
      );
    }
    return Object.fromEntries(
      this.sortedKeys(node.children).map((key): [string, PlainSecretNode] => [
        key,
        this.toPlain(node.children[key]),
      ]),
    );
  }

  /**
   * Structural equality, independent of key order.
   */
  static equals(a: SecretNode, b: SecretNode): boolean {
    if (a.kind === 'leaf' && b.kind === 'leaf') {
      const keys = Object.keys(a.values);
      if (keys.length !== Object.keys(b.values).length) return false;
      return keys.every(
        (key) =>
          Object.hasOwn(b.values, key) &&
          Object.is(a.values[key], b.values[key]),
      );
    }
    if (a.kind === 'subtree' && b.kind === 'subtree') {
      const keys = Object.keys(a.children);
      if (keys.length !== Object.keys(b.children).length) return false;
      return keys.every(
        (key) =>
          Object.hasOwn(b.children, key) &&
          this.equals(a.children[key], b.children[key]),
      );
    }
    return false;
  }

  static sortedKeys(record: object): string[] {
    return Object.keys(record).sort();
  }

  private static describe(value: unknown): string {
    if (Array.isArray(value)) return 'an array';
    if (value === null) return 'null';
    return typeof value;
  }
}
