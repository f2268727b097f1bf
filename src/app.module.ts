import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { kvtreeConfig } from './config/kvtree.config';
import { KvTreeModule } from './kvtree.module';

@Module({
  imports: [
    ConfigModule.forRoot({ load: [kvtreeConfig], ignoreEnvFile: true }),
    KvTreeModule.registerAsync({
      import: ConfigModule,
      useClass: ConfigService,
    }),
  ],
})
export class AppModule {}
