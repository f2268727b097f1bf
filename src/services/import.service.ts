import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  KVTREE_OPTIONS,
  MAX_VALUE_LENGTH,
  OUTPUT_SINK,
  SECRET_BACKEND,
} from '../constants';
import {
  AmbiguousRootError,
  BackendError,
  EngineExistsError,
  InvalidOptionsError,
} from '../errors';
import {
  FlatSecretSet,
  ImportOptions,
  ImportResult,
  ImportStatus,
  ModuleOptions,
  OutputSink,
  RenderOptions,
  SecretBackend,
  SecretTree,
} from '../interface';
import { InputParserUtil } from '../utils/input-parser.util';
import { PathCodec } from '../utils/path-codec.util';
import { RootResolver } from '../utils/root-resolver.util';
import { SecretRendererUtil } from '../utils/secret-renderer.util';
import { SecretTreeUtil } from '../utils/secret-tree.util';
import { TreeMerger } from '../utils/tree-merger.util';

/**
 * Imports secrets from exported JSON or YAML into the secret store.
 *
 * @example
 * ```typescript
 * constructor(private readonly importService: ImportService) {}
 *
 * async restore(dump: string) {
 *   // preview first
 *   await this.importService.importSecrets(dump, { path: 'secret', dryRun: true });
 *   // then write
 *   await this.importService.importSecrets(dump, { path: 'secret', force: true });
 * }
 * ```
 */
@Injectable()
export class ImportService {
  private readonly logger = new Logger(ImportService.name);

  constructor(
    @Inject(SECRET_BACKEND) private readonly backend: SecretBackend,
    @Inject(OUTPUT_SINK) private readonly sink: OutputSink,
    @Inject(KVTREE_OPTIONS) private readonly options: ModuleOptions,
  ) {}

  /**
   * @throws InvalidOptionsError for `force` or `silent` combined with `dryRun`
   */
  static validateOptions(options: ImportOptions): void {
    if (options.force && options.dryRun) {
      throw new InvalidOptionsError(
        'invalid flag combination: cannot specify both --force and --dry-run',
      );
    }
    if (options.silent && options.dryRun) {
      throw new InvalidOptionsError(
        'invalid flag combination: cannot specify both --silent and --dry-run',
      );
    }
  }

  /**
   * Parse `input` and write every secret it holds, or preview the result when
   * `dryRun` is set.
   *
   * Writes stop at the first failure; secrets written before it stay written.
   *
   * @throws ParseError | MalformedTreeError for unusable input
   * @throws AmbiguousRootError when no destination is given and the input
   *   has no single root element
   * @throws EngineExistsError when the engine already holds secrets and
   *   `force` is not set
   * @throws BackendError when the store cannot be read or written
   */
  async importSecrets(
    input: string,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    ImportService.validateOptions(options);
    const renderOptions = this.renderOptions(options);

    const { format, tree } = InputParserUtil.parse(input);
    this.logger.log(`Parsing secrets from ${format.toUpperCase()}`);

    const [enginePath, subPath] = this.resolveDestination(tree, options);
    const writes = this.planWrites(tree, enginePath, subPath);
    const written = Object.keys(writes).sort();

    if (options.dryRun) {
      const status = await this.preview(
        enginePath,
        subPath,
        writes,
        renderOptions,
      );
      return { status, enginePath, subPath, written };
    }

    await this.prepareEngine(enginePath, options.force ?? false);

    for (const path of written) {
      try {
        await this.backend.writeLeaf(path, writes[path]);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new BackendError(`error writing secret '${path}': ${reason}`, {
          cause: error,
        });
      }
      this.report(options, `writing secret '${path}'`);
    }
    this.report(options, `successfully imported ${written.length} secret(s)`);

    if (!options.silent) {
      const snapshot = await this.backend.readTreeRecursive(
        enginePath,
        subPath,
        true,
      );
      const result = PathCodec.unflatten('', snapshot.secrets, enginePath);
      this.sink.write('\nresult:\n\n');
      this.sink.write(
        SecretRendererUtil.render(result, {
          ...renderOptions,
          metadata: snapshot.metadata,
        }),
      );
    }

    return { status: 'imported', enginePath, subPath, written };
  }

  /**
   * Absolute paths and leaves an import of `tree` below
   * `join(enginePath, subPath)` writes.
   *
   * A single root element of the input is replaced by the destination; input
   * with several top-level paths keeps them all below it.
   */
  planWrites(
    tree: SecretTree,
    enginePath: string,
    subPath: string,
  ): FlatSecretSet {
    const destination = PathCodec.join(enginePath, subPath);
    const keys = Object.keys(tree.children);
    if (keys.length !== 1) {
      return PathCodec.flatten(tree, destination);
    }

    const root = tree.children[keys[0]];
    if (root.kind === 'leaf') {
      if (PathCodec.normalize(subPath) === '') {
        throw new InvalidOptionsError(
          `cannot write key/value pairs directly to engine path '${enginePath}', specify a path below it`,
        );
      }
      return { [destination]: { ...root.values } };
    }
    return PathCodec.flatten(root, destination);
  }

  private resolveDestination(
    tree: SecretTree,
    options: ImportOptions,
  ): [string, string] {
    let enginePath = PathCodec.normalize(options.enginePath ?? '');
    let path = PathCodec.normalize(options.path ?? '');

    if (enginePath === '' && path === '') {
      this.logger.log(
        'No path specified, trying to determine root path from the provided input',
      );
      let rootPath: string;
      try {
        rootPath = RootResolver.resolve(tree);
      } catch (error) {
        if (!(error instanceof AmbiguousRootError)) throw error;
        throw new AmbiguousRootError(error.candidates, {
          cause: error,
          hint: 'Try specifying a destination path using --path or --engine-path',
        });
      }

      if (RootResolver.classify(rootPath) === 'engine') {
        enginePath = PathCodec.normalize(rootPath);
        this.report(options, `using '${enginePath}' as engine path`);
      } else {
        path = PathCodec.normalize(rootPath);
        this.report(options, `using '${path}' as path`);
      }
    }

    const [engine, subPath] = PathCodec.splitEnginePath(enginePath, path);
    if (engine === '') {
      throw new InvalidOptionsError('destination path cannot be empty');
    }
    return [engine, subPath];
  }

  private async prepareEngine(
    enginePath: string,
    force: boolean,
  ): Promise<void> {
    const exists = await this.backend.hasEngine(enginePath);
    if (exists && !force) {
      throw new EngineExistsError(enginePath);
    }
    if (!exists) {
      await this.backend.enableEngine(enginePath);
      this.logger.log(`Enabled engine '${enginePath}'`);
    }
  }

  private async preview(
    enginePath: string,
    subPath: string,
    writes: FlatSecretSet,
    renderOptions: RenderOptions,
  ): Promise<ImportStatus> {
    const location = PathCodec.join(enginePath, subPath);
    this.logger.log(`Fetching secrets from '${location}' (if any)`);

    const snapshot = await this.backend.readTreeRecursive(
      enginePath,
      subPath,
      false,
    );
    if (Object.keys(snapshot.secrets).length === 0) {
      this.logger.log('No secrets found - nothing to compare with');
    }

    const existing = PathCodec.unflatten('', snapshot.secrets, enginePath);
    const incoming = PathCodec.unflatten('', writes, enginePath);
    const merged = TreeMerger.deepMerge(incoming, existing);

    if (SecretTreeUtil.equals(merged, existing)) {
      this.sink.write('\ninput matches secrets - no changes needed:\n\n');
      this.sink.write(SecretRendererUtil.render(existing, renderOptions));
      return 'unchanged';
    }

    this.logger.log(
      `Deep merging provided secrets with existing secrets read from '${location}'`,
    );
    this.sink.write('\npreview:\n\n');
    this.sink.write(SecretRendererUtil.render(merged, renderOptions));
    this.sink.write('\napply changes by using the --force flag\n');
    return 'preview';
  }

  /** Progress line for the user; suppressed by `silent`. */
  private report(options: ImportOptions, line: string): void {
    if (!options.silent) {
      this.sink.write(`${line}\n`);
    }
  }

  private renderOptions(options: ImportOptions): RenderOptions {
    return SecretRendererUtil.resolveRenderOptions({
      format: 'native',
      maskValues: !(options.showValues ?? false),
      maskLength:
        options.maxValueLength ??
        this.options.maxValueLength ??
        MAX_VALUE_LENGTH,
    });
  }
}
