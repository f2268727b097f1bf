import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CreateSecretCommand,
  GetSecretValueCommand,
  ListSecretsCommand,
  ListSecretsCommandInput,
  ListSecretsCommandOutput,
  PutSecretValueCommand,
  SecretListEntry,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
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

const SERVICE_NAME = 'AWS Secrets Manager';
const VALID_NAME = /^[A-Za-z0-9/_+=.@-]+$/;

interface FetchedSecret {
  path: string;
  leaf: SecretLeaf;
  metadata: SecretMetadata;
}

/**
 * SecretBackend on top of AWS Secrets Manager.
 *
 * A leaf stored at `secret/app/db` is the secret named `secret/app/db`
 * whose SecretString is the leaf encoded as JSON. Engine paths are name
 * prefixes.
 */
@Injectable()
export class SecretsManagerBackendService implements SecretBackend {
  private readonly logger = new Logger(SecretsManagerBackendService.name);
  private readonly client: SecretsManagerClient;

  constructor(@Inject(KVTREE_OPTIONS) private readonly options: ModuleOptions) {
    const clientConfiguration: { region: string; endpoint?: string } = {
      region: options.awsRegion,
    };
    if (options.endpoint) {
      clientConfiguration.endpoint = options.endpoint;
    }
    this.client = new SecretsManagerClient(clientConfiguration);
  }

  async hasEngine(enginePath: string): Promise<boolean> {
    const engine = PathCodec.normalize(enginePath);
    try {
      return (await this.listEntries(engine)).length > 0;
    } catch (error) {
      throw BackendErrorUtil.toBackendError(
        error,
        this.context('look up', engine),
      );
    }
  }

  /**
   * Secrets Manager has no mounts, so enabling an engine only checks that
   * its path can prefix secret names.
   *
   * @throws InvalidOptionsError if the path is empty or has unsupported characters
   */
  async enableEngine(enginePath: string): Promise<void> {
    const engine = this.validateName(enginePath);
    this.logger.log(`Using '${engine}/' as secret name prefix`);
  }

  /**
   * Overwrite the secret at `path`, creating it when it does not exist yet.
   */
  async writeLeaf(path: string, leaf: SecretLeaf): Promise<void> {
    const name = this.validateName(path);
    const secretString = StoredLeafUtil.serialize(leaf);
    try {
      try {
        await this.client.send(
          new PutSecretValueCommand({
            SecretId: name,
            SecretString: secretString,
          }),
        );
        this.logger.debug(`Updated secret ${name}`);
      } catch (error) {
        if (BackendErrorUtil.nameOf(error) !== 'ResourceNotFoundException') {
          throw error;
        }
        await this.client.send(
          new CreateSecretCommand({ Name: name, SecretString: secretString }),
        );
        this.logger.debug(`Created secret ${name}`);
      }
    } catch (error) {
      const backendError = BackendErrorUtil.toBackendError(
        error,
        this.context('write secret to', name),
      );
      this.logger.error(backendError.message);
      throw backendError;
    }
  }

  /**
   * Read every secret named `join(enginePath, subPath)` or below it.
   *
   * Names are listed page by page, then all values are fetched concurrently.
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
      `Reading secrets - Region: ${this.options.awsRegion}, Prefix: ${root || '(all)'}`,
    );

    try {
      const entries = await this.listEntries(root);
      const results = await Promise.allSettled(
        entries.map((entry) => this.fetchSecret(entry)),
      );

      for (const result of results) {
        if (result.status === 'rejected') {
          throw result.reason;
        }
        const { path, leaf, metadata: entryMetadata } = result.value;
        secrets[path] = leaf;
        if (includeMetadata) {
          metadata[path] = entryMetadata;
        }
      }

      this.logger.log(`Fetched ${entries.length} secret(s)`);
      if (entries.length === 0) {
        this.logger.warn(
          `No secrets found below '${root}' in region '${this.options.awsRegion}'`,
        );
      }
    } catch (error) {
      const backendError = BackendErrorUtil.toBackendError(
        error,
        this.context('read secrets from', root),
      );
      this.logger.error(backendError.message);
      throw backendError;
    }

    return { secrets, metadata };
  }

  private async listEntries(prefix: string): Promise<SecretListEntry[]> {
    const entries: SecretListEntry[] = [];
    let nextToken: string | undefined = undefined;

    do {
      const commandInput: ListSecretsCommandInput = {};
      if (prefix !== '') {
        commandInput.Filters = [{ Key: 'name', Values: [prefix] }];
      }
      if (nextToken) {
        commandInput.NextToken = nextToken;
      }
      const result: ListSecretsCommandOutput = await this.client.send(
        new ListSecretsCommand(commandInput),
      );
      for (const entry of result.SecretList ?? []) {
        if (entry.Name && this.isBelow(entry.Name, prefix)) {
          entries.push(entry);
        }
      }
      nextToken = result.NextToken;
    } while (nextToken);

    return entries;
  }

  private async fetchSecret(entry: SecretListEntry): Promise<FetchedSecret> {
    const name = entry.Name ?? '';
    this.logger.debug(`Fetching secret: ${name}`);
    const response = await this.client.send(
      new GetSecretValueCommand({ SecretId: name }),
    );

    let raw: string;
    if (response.SecretString !== undefined) {
      raw = response.SecretString;
    } else if (response.SecretBinary !== undefined) {
      raw = Buffer.from(response.SecretBinary).toString('utf-8');
    } else {
      throw new Error(`Secret '${name}' has no value`);
    }

    const path = PathCodec.normalize(name);
    const metadata: SecretMetadata = {};
    if (response.VersionId !== undefined) {
      metadata.version = response.VersionId;
    }
    if (entry.LastChangedDate !== undefined) {
      metadata.updatedAt = entry.LastChangedDate;
    }
    return {
      path,
      leaf: StoredLeafUtil.parse(raw, path, this.logger),
      metadata,
    };
  }

  /** The name filter matches prefixes; keep only whole path segments. */
  private isBelow(name: string, prefix: string): boolean {
    if (prefix === '') return true;
    const normalized = PathCodec.normalize(name);
    return normalized === prefix || normalized.startsWith(`${prefix}/`);
  }

  private validateName(path: string): string {
    const normalized = PathCodec.normalize(path);
    if (normalized === '') {
      throw new InvalidOptionsError('secret name cannot be empty');
    }
    if (!VALID_NAME.test(normalized)) {
      throw new InvalidOptionsError(
        `secret name '${normalized}' may only contain letters, digits and the characters /_+=.@-`,
      );
    }
    return normalized;
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
