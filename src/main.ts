#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { createProgram } from './cli';
import { ExportService, ImportService } from './services';

const QUIET: LogLevel[] = ['error', 'warn'];
const VERBOSE: LogLevel[] = ['error', 'warn', 'log', 'debug'];

async function bootstrap(argv: string[]): Promise<void> {
  const contexts: INestApplicationContext[] = [];

  const program = createProgram(async ({ verbose }) => {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: verbose ? VERBOSE : QUIET,
      abortOnError: false,
    });
    contexts.push(app);
    return {
      importService: app.get(ImportService),
      exportService: app.get(ExportService),
    };
  });

  try {
    await program.parseAsync(argv);
  } finally {
    await Promise.all(contexts.map((app) => app.close()));
  }
}

bootstrap(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`error: ${message}\n`);
  process.exitCode = 1;
});
