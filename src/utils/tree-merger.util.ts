import { SecretNode, SecretTree } from '../interface';
import { SecretTreeUtil } from './secret-tree.util';

/**
 * Deep merge of secret trees, used to preview the store after an import.
 */
export class TreeMerger {
  /**
   * Merge `newTree` on top of `existingTree`.
   *
   * - keys present on one side only are taken as they are
   * - two subtrees are merged recursively
   * - two leaves are merged key by key, new values win and keys only present
   *   in the existing leaf are kept
   * - a leaf against a subtree: the new side wins
   *
   * Neither input is modified.
   *
   * @example
   * ```typescript
   * TreeMerger.deepMerge(
   *   SecretTreeUtil.fromPlain({ a: { k: '1' } }),
   *   SecretTreeUtil.fromPlain({ a: { k: '0', j: '2' } }),
   * );
   * // { a: { k: '1', j: '2' } }
   * ```
   */
  static deepMerge(newTree: SecretTree, existingTree: SecretTree): SecretTree {
    const merged = this.mergeNodes(newTree, existingTree);
    return merged.kind === 'subtree' ? merged : SecretTreeUtil.subtree();
  }

  private static mergeNodes(next: SecretNode, existing: SecretNode): SecretNode {
    if (next.kind === 'leaf' && existing.kind === 'leaf') {
      return SecretTreeUtil.leaf({ ...existing.values, ...next.values });
    }
    if (next.kind === 'subtree' && existing.kind === 'subtree') {
      const children = SecretTreeUtil.record<SecretNode>();
      const keys = new Set([
        ...Object.keys(existing.children),
        ...Object.keys(next.children),
      ]);
      for (const key of keys) {
        const left = SecretTreeUtil.child(next, key);
        const right = SecretTreeUtil.child(existing, key);
        if (left !== undefined && right !== undefined) {
          children[key] = this.mergeNodes(left, right);
        } else if (left !== undefined) {
          children[key] = this.copy(left);
        } else if (right !== undefined) {
          children[key] = this.copy(right);
        }
      }
      return SecretTreeUtil.subtree(children);
    }
    return this.copy(next);
  }

  private static copy(node: SecretNode): SecretNode {
    if (node.kind === 'leaf') return SecretTreeUtil.leaf(node.values);
    const children = SecretTreeUtil.record<SecretNode>();
    for (const [key, child] of Object.entries(node.children)) {
      children[key] = this.copy(child);
    }
    return SecretTreeUtil.subtree(children);
  }
}
