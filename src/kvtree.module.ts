import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  KVTREE_AWS_REGION,
  KVTREE_BACKEND,
  KVTREE_ENDPOINT,
  KVTREE_MAX_VALUE_LENGTH,
  KVTREE_OPTIONS,
  MAX_VALUE_LENGTH,
  OUTPUT_SINK,
  SECRET_BACKEND,
} from './constants';
import {
  ModuleAsyncOptions,
  ModuleOptions,
  OutputSink,
  SecretBackend,
} from './interface';
import {
  ExportService,
  ImportService,
  ParameterStoreBackendService,
  SecretsManagerBackendService,
} from './services';
import { KvTreeConfigUtil } from './utils/kvtree-config.util';

/**
 * Global NestJS module wiring a secret backend, the import and export
 * services and the output sink.
 *
 * @example
 * Static registration:
 * ```typescript
 * @Module({
 *   imports: [
 *     KvTreeModule.register({
 *       backend: 'parameter-store',
 *       awsRegion: 'us-east-1',
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example
 * Async registration with ConfigService:
 * ```typescript
 * @Module({
 *   imports: [
 *     ConfigModule.forRoot({ load: [kvtreeConfig] }),
 *     KvTreeModule.registerAsync({
 *       import: ConfigModule,
 *       useClass: ConfigService,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
@Global()
@Module({})
export class KvTreeModule {
  /**
   * Register the module with static configuration.
   *
   * @throws InvalidOptionsError when the options are invalid
   */
  public static register(moduleOptions: ModuleOptions): DynamicModule {
    return {
      module: KvTreeModule,
      providers: [
        {
          provide: KVTREE_OPTIONS,
          useValue: KvTreeConfigUtil.validateOptions(moduleOptions),
        },
        ...this.createProviders(),
      ],
      exports: [ImportService, ExportService, SECRET_BACKEND],
    };
  }

  /**
   * Register the module with async configuration using ConfigService.
   *
   * @example
   * ```typescript
   * // In your environment:
   * // KVTREE_BACKEND=secrets-manager
   * // KVTREE_AWS_REGION=eu-west-1
   *
   * KvTreeModule.registerAsync({
   *   import: ConfigModule,
   *   useClass: ConfigService,
   * })
   * ```
   */
  public static registerAsync(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: KvTreeModule,
      imports: [moduleAsyncOptions.import],
      providers: [
        {
          provide: KVTREE_OPTIONS,
          useFactory: (configService: ConfigService): ModuleOptions => {
            const options: ModuleOptions = {
              backend: KvTreeConfigUtil.parseBackendKind(
                configService.get<string>(KVTREE_BACKEND),
              ),
              awsRegion: configService.get<string>(KVTREE_AWS_REGION) ?? '',
              maxValueLength: KvTreeConfigUtil.parseInteger(
                configService.get<string | number>(KVTREE_MAX_VALUE_LENGTH),
                MAX_VALUE_LENGTH,
                'KVTREE_MAX_VALUE_LENGTH',
              ),
            };
            const endpoint = configService.get<string>(KVTREE_ENDPOINT);
            if (endpoint) {
              options.endpoint = endpoint;
            }
            return KvTreeConfigUtil.validateOptions(options);
          },
          inject: [moduleAsyncOptions.useClass],
        },
        ...this.createProviders(),
      ],
      exports: [ImportService, ExportService, SECRET_BACKEND],
    };
  }

  private static createProviders(): Provider[] {
    return [
      ImportService,
      ExportService,
      {
        provide: SECRET_BACKEND,
        useFactory: (options: ModuleOptions): SecretBackend =>
          options.backend === 'secrets-manager'
            ? new SecretsManagerBackendService(options)
            : new ParameterStoreBackendService(options),
        inject: [KVTREE_OPTIONS],
      },
      {
        provide: OUTPUT_SINK,
        useValue: {
          write: (text: string) => {
            process.stdout.write(text);
          },
        } satisfies OutputSink,
      },
    ];
  }
}
