/**
 * A single secret value. Values read from JSON or YAML input keep their
 * primitive type; values written to the store are serialized as JSON.
 */
export type Scalar = string | number | boolean | null;

/**
 * Key/value pairs stored at one path.
 *
 * @example
 * ```typescript
 * { user: 'alice', pass: 's3cret' }
 * ```
 */
export interface SecretLeaf {
  [key: string]: Scalar;
}

export interface LeafNode {
  kind: 'leaf';
  values: SecretLeaf;
}

export interface SubtreeNode {
  kind: 'subtree';
  children: Record<string, SecretNode>;
}

/**
 * A node of a secret tree: either a leaf holding key/value pairs, or a subtree
 * holding further path segments. A node never holds both.
 */
export type SecretNode = LeafNode | SubtreeNode;

/**
 * Root of a nested secret tree.
 *
 * @example
 * `{ secret: { app: { db: { user: 'alice' } } } }` is represented as
 * ```typescript
 * {
 *   kind: 'subtree',
 *   children: {
 *     secret: {
 *       kind: 'subtree',
 *       children: {
 *         app: {
 *           kind: 'subtree',
 *           children: { db: { kind: 'leaf', values: { user: 'alice' } } },
 *         },
 *       },
 *     },
 *   },
 * }
 * ```
 */
export type SecretTree = SubtreeNode;

/**
 * Secrets keyed by their full slash-delimited path.
 *
 * @example
 * ```typescript
 * { 'secret/app/db': { user: 'alice', pass: 's3cret' } }
 * ```
 */
export interface FlatSecretSet {
  [path: string]: SecretLeaf;
}

export interface SecretMetadata {
  version?: string;
  updatedAt?: Date;
}

/**
 * Result of a recursive read from a secret backend.
 * `metadata` is keyed like `secrets` and is empty unless it was requested.
 */
export interface SecretSnapshot {
  secrets: FlatSecretSet;
  metadata: Record<string, SecretMetadata>;
}
