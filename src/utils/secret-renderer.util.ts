import { stringify as stringifyYaml } from 'yaml';
import { MASK_CHAR, MAX_VALUE_LENGTH } from '../constants';
import { InvalidOptionsError, UnsupportedFormatError } from '../errors';
import {
  OUTPUT_FORMATS,
  OutputFormat,
  RenderOptions,
  Scalar,
  SecretNode,
  SecretTree,
  SubtreeNode,
} from '../interface';
import { PathCodec } from './path-codec.util';
import { PlainSecretNode, SecretTreeUtil } from './secret-tree.util';

/**
 * Render options as accepted from callers: every field optional and the
 * format still unchecked.
 */
export type RenderOptionsInput = Partial<Omit<RenderOptions, 'format'>> & {
  format?: string;
};

const INDENT = '  ';
const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]*$/;

/**
 * Renders secret trees as text. Keys are emitted in lexicographic order at
 * every level, so rendering the same tree twice yields identical output.
 */
export class SecretRendererUtil {
  /**
   * Fill in defaults and validate a set of render options.
   *
   * @throws UnsupportedFormatError for an unknown format
   * @throws InvalidOptionsError when `onlyKeys` and `onlyPaths` are both set or
   *   `maskLength` is not an integer >= -1
   */
  static resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
    const formatName = input.format ?? 'native';
    const format = OUTPUT_FORMATS.find((candidate) => candidate === formatName);
    if (format === undefined) {
      throw new UnsupportedFormatError(formatName);
    }

    const options: RenderOptions = {
      format,
      maskValues: input.maskValues ?? true,
      maskLength: input.maskLength ?? MAX_VALUE_LENGTH,
      onlyKeys: input.onlyKeys ?? false,
      onlyPaths: input.onlyPaths ?? false,
    };
    if (input.metadata !== undefined) {
      options.metadata = input.metadata;
    }

    if (options.onlyKeys && options.onlyPaths) {
      throw new InvalidOptionsError(
        'cannot show only keys and only paths at the same time',
      );
    }
    if (!Number.isInteger(options.maskLength) || options.maskLength < -1) {
      throw new InvalidOptionsError(
        `mask length must be an integer >= -1, got ${options.maskLength}`,
      );
    }
    return options;
  }

  /**
   * Render a tree in the configured format.
   *
   * @throws UnsupportedFormatError for an unknown format
   *
   * @example
   * ```typescript
   * const options = SecretRendererUtil.resolveRenderOptions({ maskLength: 4 });
   * SecretRendererUtil.render(SecretTreeUtil.fromPlain({ db: { user: 'alice' } }), options);
   * // 'db\n  user=****\n'
   * ```
   */
  static render(tree: SecretTree, options: RenderOptions): string {
    const prepared =
      options.maskValues && options.maskLength !== -1
        ? this.mask(tree, options.maskLength)
        : tree;

    const format: OutputFormat = options.format;
    switch (format) {
      case 'native':
        return this.toText(this.renderNative(prepared, options, [], 0));
      case 'json':
        return `${this.toJson(this.toRenderable(prepared, options), 0)}\n`;
      case 'yaml':
        return stringifyYaml(this.toRenderable(prepared, options), {
          sortMapEntries: true,
        });
      case 'shell-export':
        return this.toText(this.renderExports(prepared, options));
      default:
        throw new UnsupportedFormatError(String(format));
    }
  }

  /**
   * Replace every value with `min(length, maskLength)` mask characters.
   * A `maskLength` of -1 returns an unmasked copy.
   */
  static mask(tree: SecretTree, maskLength: number): SecretTree {
    const masked = this.maskNode(tree, maskLength);
    return masked.kind === 'subtree' ? masked : SecretTreeUtil.subtree();
  }

  static maskValue(value: Scalar, maskLength: number): string {
    const text = this.stringify(value);
    if (maskLength === -1) return text;
    return MASK_CHAR.repeat(Math.min([...text].length, maskLength));
  }

  static stringify(value: Scalar): string {
    return value === null ? '' : String(value);
  }

  private static maskNode(node: SecretNode, maskLength: number): SecretNode {
    if (node.kind === 'leaf') {
      const values = SecretTreeUtil.record<string>();
      for (const [key, value] of Object.entries(node.values)) {
        values[key] = this.maskValue(value, maskLength);
      }
      return SecretTreeUtil.leaf(values);
    }
    const children = SecretTreeUtil.record<SecretNode>();
    for (const [key, child] of Object.entries(node.children)) {
      children[key] = this.maskNode(child, maskLength);
    }
    return SecretTreeUtil.subtree(children);
  }

  private static renderNative(
    node: SubtreeNode,
    options: RenderOptions,
    trail: string[],
    depth: number,
  ): string[] {
    const lines: string[] = [];
    const indent = INDENT.repeat(depth);

    for (const key of SecretTreeUtil.sortedKeys(node.children)) {
      const child = node.children[key];
      const path = [...trail, key];

      if (child.kind === 'subtree') {
        lines.push(`${indent}${key}/`);
        lines.push(...this.renderNative(child, options, path, depth + 1));
        continue;
      }

      const version = options.metadata?.[PathCodec.join(...path)]?.version;
      lines.push(
        version === undefined
          ? `${indent}${key}`
          : `${indent}${key} [version=${version}]`,
      );
      if (options.onlyPaths) continue;

      for (const name of SecretTreeUtil.sortedKeys(child.values)) {
        lines.push(
          options.onlyKeys
            ? `${indent}${INDENT}${name}`
            : `${indent}${INDENT}${name}=${this.stringify(child.values[name])}`,
        );
      }
    }
    return lines;
  }

  private static renderExports(
    tree: SecretTree,
    options: RenderOptions,
  ): string[] {
    if (options.onlyPaths) return [];

    const flat = PathCodec.flatten(tree);
    const lines: string[] = [];
    for (const path of Object.keys(flat).sort()) {
      const leaf = flat[path];
      for (const name of SecretTreeUtil.sortedKeys(leaf)) {
        const value = options.onlyKeys ? '' : this.stringify(leaf[name]);
        lines.push(`export ${name}=${this.shellQuote(value)}`);
      }
    }
    return lines;
  }

  private static toRenderable(
    node: SecretNode,
    options: RenderOptions,
  ): PlainSecretNode {
    if (node.kind === 'leaf') {
      return Object.fromEntries(
        SecretTreeUtil.sortedKeys(node.values).map((key): [string, Scalar] => [
          key,
          options.onlyKeys ? '' : node.values[key],
        ]),
      );
    }
    return Object.fromEntries(
      SecretTreeUtil.sortedKeys(node.children).map(
        (key): [string, PlainSecretNode | null] => {
          const child = node.children[key];
          return [
            key,
            child.kind === 'leaf' && options.onlyPaths
              ? null
              : this.toRenderable(child, options),
          ];
        },
      ),
    );
  }

  /**
   * Two-space indented JSON with object keys in lexicographic order.
   * `JSON.stringify` alone would move integer-like keys to the front.
   */
  private static toJson(value: PlainSecretNode | Scalar, depth: number): string {
    if (value === null || typeof value !== 'object') {
      return JSON.stringify(value);
    }
    const keys = SecretTreeUtil.sortedKeys(value);
    if (keys.length === 0) return '{}';

    const indent = INDENT.repeat(depth + 1);
    const members = keys.map(
      (key) =>
        `${indent}${JSON.stringify(key)}: ${this.toJson(value[key], depth + 1)}`,
    );
    return `{\n${members.join(',\n')}\n${INDENT.repeat(depth)}}`;
  }

  private static shellQuote(value: string): string {
    if (SHELL_SAFE.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
  }

  private static toText(lines: string[]): string {
    return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
  }
}
