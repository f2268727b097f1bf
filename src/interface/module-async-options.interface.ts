import { Type } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

/**
 * Async configuration options for KvTreeModule.
 *
 * The ConfigService should provide values for the following keys
 * (see `kvtreeConfig` for the environment variables behind them):
 * - `kvtree.backend`: `parameter-store` or `secrets-manager`
 * - `kvtree.awsRegion`: AWS region (string)
 * - `kvtree.endpoint`: custom endpoint URL (string, optional)
 * - `kvtree.maxValueLength`: default mask length (number, optional)
 *
 * @example
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
export interface ModuleAsyncOptions {
  import: Type<ConfigModule>;

  useClass: Type<ConfigService>;
}
