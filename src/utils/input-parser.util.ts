import { parse as parseYaml } from 'yaml';
import { ParseError } from '../errors';
import { SecretTree } from '../interface';
import { SecretTreeUtil } from './secret-tree.util';

export type InputFormat = 'json' | 'yaml';

export interface ParsedInput {
  format: InputFormat;
  tree: SecretTree;
}

/**
 * Parses exported secrets (JSON or YAML) back into a secret tree.
 */
export class InputParserUtil {
  /**
   * Parse `input` as JSON, falling back to YAML.
   *
   * @throws ParseError when the input is empty or neither format yields an
   *   object
   * @throws MalformedTreeError when the object is not a valid secret tree
   *
   * @example
   * ```typescript
   * InputParserUtil.parse('secret:\n  app:\n    user: alice\n');
   * // { format: 'yaml', tree: { secret: { app: { user: 'alice' } } } }
   * ```
   */
  static parse(input: string): ParsedInput {
    if (input.trim() === '') {
      throw new ParseError(
        'no input found, perhaps the piped command failed or the specified file is empty',
      );
    }

    let jsonError: unknown;
    try {
      return { format: 'json', tree: this.toTree(JSON.parse(input)) };
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      jsonError = error;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(input);
    } catch (yamlError) {
      throw new ParseError(
        `cannot parse input as JSON or YAML: ${this.messageOf(yamlError)}`,
        { cause: jsonError },
      );
    }
    return { format: 'yaml', tree: this.toTree(parsed) };
  }

  private static toTree(parsed: unknown): SecretTree {
    if (!SecretTreeUtil.isPlainObject(parsed)) {
      throw new ParseError(
        'cannot parse input: expected a JSON or YAML object of secret paths',
      );
    }
    return SecretTreeUtil.fromPlain(parsed);
  }

  private static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
