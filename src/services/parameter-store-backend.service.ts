import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  GetParameterCommand,
  GetParametersByPathCommand,
  GetParametersByPathCommandOutput,
  Parameter,
  PutParameterCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { KVTREE_OPTIONS } from '../constants';
import { InvalidOptionsError } from '../errors';
import {
  FlatSecretSet,
  ModuleOptions,
  SecretBackend,
  SecretLeaf,
  SecretMetadata,
  SecretSnapshot,
} from '../interface';
import {
  BackendErrorContext,
  BackendErrorUtil,
} from '../utils/backend-error.util';
import { PathCodec } from '../utils/path-codec.util';
import { StoredLeafUtil } from '../utils/stored-leaf.util';

const SERVICE_NAME = 'SSM Parameter Store';
const VALID_PATH = /^[A-Za-z0-9_.\-/]+$/;

/**
 * SecretBackend on top of AWS Systems Manager Parameter Store.
 *
 * A leaf stored at `secret/app/db` is the SecureString parameter
 * `/secret/app/db` whose value is the leaf encoded as JSON. Parameter Store
 * has no engine mounts: an engine path is simply the first part of the
 * parameter names below it.
 *
 * @example
 * ```typescript
 * constructor(@Inject(SECRET_BACKEND) private readonly backend: SecretBackend) {}
 *
 * async dump() {
 *   const { secrets } = await this.backend.readTreeRecursive('secret', 'app', false);
 * }
 * ```
 */
@Injectable()
export class ParameterStoreBackendService implements SecretBackend {
  private readonly logger = new Logger(ParameterStoreBackendService.name);
  private readonly client: SSMClient;

  constructor(@Inject(KVTREE_OPTIONS) private readonly options: ModuleOptions) {
    const clientConfiguration: { region: string; endpoint?: string } = {
      region: options.awsRegion,
    };
    if (options.endpoint) {
      clientConfiguration.endpoint = options.endpoint;
    }
    this.client = new SSMClient(clientConfiguration);
  }

  async hasEngine(enginePath: string): Promise<boolean> {
    const engine = PathCodec.normalize(enginePath);
    try {
      const result = await this.client.send(
        new GetParametersByPathCommand({
          Path: this.toParameterName(engine),
          Recursive: true,
          MaxResults: 1,
        }),
      );
      return (result.Parameters ?? []).length > 0;
    } catch (error) {
      throw BackendErrorUtil.toBackendError(
        error,
        this.context('look up', engine),
      );
    }
  }

  /**
   * Parameter Store creates the hierarchy on write, so enabling an engine only
   * checks that its path can name parameters.
   *
   * @throws InvalidOptionsError if the path is empty or has unsupported characters
   */
  async enableEngine(enginePath: string): Promise<void> {
    const engine = this.validatePath(enginePath);
    this.logger.log(
      `Using '${this.toParameterName(engine)}' as parameter hierarchy root`,
    );
  }

  async writeLeaf(path: string, leaf: SecretLeaf): Promise<void> {
    const name = this.toParameterName(this.validatePath(path));
    try {
      await this.client.send(
        new PutParameterCommand({
          Name: name,
          Value: StoredLeafUtil.serialize(leaf),
          Type: 'SecureString',
          Overwrite: true,
        }),
      );
      this.logger.debug(`Wrote parameter ${name}`);
    } catch (error) {
      const backendError = BackendErrorUtil.toBackendError(
        error,
        this.context('write secret to', PathCodec.normalize(path)),
      );
      this.logger.error(backendError.message);
      throw backendError;
    }
  }

  /**
   * Read all parameters at or below `join(enginePath, subPath)`.
   *
   * This method handles pagination automatically and decrypts SecureString
   * parameters. GetParametersByPath never returns the parameter named by the
   * path itself, so a non-empty sub-path is also looked up directly.
   */
  async readTreeRecursive(
    enginePath: string,
    subPath: string,
    includeMetadata: boolean,
  ): Promise<SecretSnapshot> {
    const root = PathCodec.join(enginePath, subPath);
    const secrets: FlatSecretSet = {};
    const metadata: Record<string, SecretMetadata> = {};

    this.logger.log(
      `Reading parameters - Region: ${this.options.awsRegion}, Path: ${this.toParameterName(root)}`,
    );

    let parameters: Parameter[];
    try {
      parameters = await this.fetchAll(root);
      if (PathCodec.normalize(subPath) !== '') {
        const exact = await this.fetchExact(root);
        if (exact !== undefined) parameters.unshift(exact);
      }
    } catch (error) {
      const backendError = BackendErrorUtil.toBackendError(
        error,
        this.context('read secrets from', root),
      );
      this.logger.error(backendError.message);
      throw backendError;
    }

    for (const parameter of parameters) {
      if (!parameter.Name || parameter.Value === undefined) continue;
      const path = PathCodec.normalize(parameter.Name);
      secrets[path] = StoredLeafUtil.parse(parameter.Value, path, this.logger);
      if (includeMetadata) {
        metadata[path] = this.metadataOf(parameter);
      }
    }

    if (parameters.length === 0) {
      this.logger.warn(
        `No parameters found at path '${this.toParameterName(root)}' in region '${this.options.awsRegion}'`,
      );
    }

    return { secrets, metadata };
  }

  private async fetchAll(root: string): Promise<Parameter[]> {
    const parameters: Parameter[] = [];
    let nextToken: string | undefined = undefined;
    let pageCount = 0;

    do {
      pageCount++;
      const commandInput: {
        Path: string;
        Recursive: boolean;
        WithDecryption: boolean;
        NextToken?: string;
      } = {
        Path: this.toParameterName(root),
        Recursive: true,
        WithDecryption: true,
      };
      if (nextToken) {
        commandInput.NextToken = nextToken;
        this.logger.debug(`Fetching page ${pageCount} with NextToken`);
      }
      const result: GetParametersByPathCommandOutput = await this.client.send(
        new GetParametersByPathCommand(commandInput),
      );
      const fetched = result.Parameters ?? [];
      parameters.push(...fetched);
      this.logger.debug(
        `Page ${pageCount}: Retrieved ${fetched.length} parameters`,
      );
      nextToken = result.NextToken;
    } while (nextToken);

    this.logger.log(
      `Fetched ${parameters.length} parameter(s) in ${pageCount} page(s)`,
    );
    return parameters;
  }

  private async fetchExact(path: string): Promise<Parameter | undefined> {
    try {
      const result = await this.client.send(
        new GetParameterCommand({
          Name: this.toParameterName(path),
          WithDecryption: true,
        }),
      );
      return result.Parameter;
    } catch (error) {
      if (BackendErrorUtil.nameOf(error) === 'ParameterNotFound') {
        return undefined;
      }
      throw error;
    }
  }

  private metadataOf(parameter: Parameter): SecretMetadata {
    const metadata: SecretMetadata = {};
    if (parameter.Version !== undefined) {
      metadata.version = String(parameter.Version);
    }
    if (parameter.LastModifiedDate !== undefined) {
      metadata.updatedAt = parameter.LastModifiedDate;
    }
    return metadata;
  }

  private validatePath(path: string): string {
    const normalized = PathCodec.normalize(path);
    if (normalized === '') {
      throw new InvalidOptionsError('parameter path cannot be empty');
    }
    if (!VALID_PATH.test(normalized)) {
      throw new InvalidOptionsError(
        `parameter path '${normalized}' may only contain letters, digits and the characters _.-/`,
      );
    }
    return normalized;
  }

  private toParameterName(path: string): string {
    return `/${PathCodec.normalize(path)}`;
  }

  private context(operation: string, path: string): BackendErrorContext {
    return {
      service: SERVICE_NAME,
      operation,
      region: this.options.awsRegion,
      path,
    };
  }
}
