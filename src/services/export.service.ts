import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  KVTREE_OPTIONS,
  MAX_VALUE_LENGTH,
  OUTPUT_SINK,
  SECRET_BACKEND,
} from '../constants';
import { InvalidOptionsError } from '../errors';
import {
  ExportOptions,
  ModuleOptions,
  OutputSink,
  SecretBackend,
  SecretTree,
} from '../interface';
import { PathCodec } from '../utils/path-codec.util';
import { SecretRendererUtil } from '../utils/secret-renderer.util';

/**
 * Reads a tree of secrets from the store and renders it to the output sink.
 *
 * The `shell-export` format shows values unless `showValues` is explicitly
 * false, since masked exports are of no use to a shell.
 */
@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    @Inject(SECRET_BACKEND) private readonly backend: SecretBackend,
    @Inject(OUTPUT_SINK) private readonly sink: OutputSink,
    @Inject(KVTREE_OPTIONS) private readonly options: ModuleOptions,
  ) {}

  /**
   * @returns the tree that was rendered, unmasked
   * @throws InvalidOptionsError | UnsupportedFormatError for bad options
   * @throws BackendError when the store cannot be read
   */
  async exportSecrets(options: ExportOptions = {}): Promise<SecretTree> {
    const format = options.format ?? 'native';
    const renderOptions = SecretRendererUtil.resolveRenderOptions({
      format,
      maskValues: !(options.showValues ?? format === 'shell-export'),
      maskLength:
        options.maxValueLength ??
        this.options.maxValueLength ??
        MAX_VALUE_LENGTH,
      onlyKeys: options.onlyKeys ?? false,
      onlyPaths: options.onlyPaths ?? false,
    });

    const [enginePath, subPath] = PathCodec.splitEnginePath(
      options.enginePath ?? '',
      options.path ?? '',
    );
    if (enginePath === '') {
      throw new InvalidOptionsError('a path or engine path is required');
    }

    const snapshot = await this.backend.readTreeRecursive(
      enginePath,
      subPath,
      options.showVersion ?? false,
    );
    const tree = PathCodec.unflatten('', snapshot.secrets, enginePath);
    this.logger.debug(
      `Rendering ${Object.keys(snapshot.secrets).length} secret(s) as ${renderOptions.format}`,
    );

    this.sink.write(
      SecretRendererUtil.render(tree, {
        ...renderOptions,
        metadata: snapshot.metadata,
      }),
    );
    return tree;
  }
}
