import { Command, InvalidArgumentError, Option } from 'commander';
import { readFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import { InvalidOptionsError } from './errors';
import { OUTPUT_FORMATS } from './interface';
import { ExportService, ImportService } from './services';
import { KvTreeConfigUtil } from './utils/kvtree-config.util';

export interface CliServices {
  importService: Pick<ImportService, 'importSecrets'>;
  exportService: Pick<ExportService, 'exportSecrets'>;
}

/**
 * Creates the services a command runs against. Called once per command,
 * after the arguments are parsed, so `--help` works without AWS settings.
 */
export type CliServicesFactory = (settings: {
  verbose: boolean;
}) => Promise<CliServices>;

export interface CliInput {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
}

interface GlobalFlags {
  verbose?: boolean;
}

interface ExportFlags {
  path?: string;
  enginePath?: string;
  format?: string;
  showValues?: boolean;
  maxValueLength?: number;
  onlyKeys?: boolean;
  onlyPaths?: boolean;
  showVersion?: boolean;
}

interface ImportFlags {
  path?: string;
  enginePath?: string;
  file?: string;
  force?: boolean;
  dryRun?: boolean;
  silent?: boolean;
  showValues?: boolean;
  maxValueLength?: number;
}

export const defaultInput: CliInput = {
  readFile: (path) => readFile(path, 'utf8'),
  readStdin: async () => {
    if (process.stdin.isTTY) {
      throw new InvalidOptionsError(
        'no input: pipe exported secrets to stdin or pass --file',
      );
    }
    return text(process.stdin);
  },
};

function parseMaxValueLength(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < -1) {
    throw new InvalidArgumentError('must be an integer >= -1.');
  }
  return parsed;
}

/**
 * Boolean flags read their environment variable here rather than through
 * commander, which treats any set variable as `true`.
 */
function flag(value: boolean | undefined, envVar: string): boolean {
  return value ?? KvTreeConfigUtil.parseBoolean(process.env[envVar]);
}

export function createProgram(
  createServices: CliServicesFactory,
  input: CliInput = defaultInput,
): Command {
  const program = new Command();
  program
    .name('kvtree')
    .description('Export and import trees of secrets kept in AWS')
    .option('-v, --verbose', 'Enable progress and debug logging');

  const settings = () => ({
    verbose: program.opts<GlobalFlags>().verbose ?? false,
  });

  program
    .command('export')
    .description('Print the secrets below a path')
    .addOption(
      new Option('-p, --path <path>', 'Path to export').env('KVTREE_EXPORT_PATH'),
    )
    .addOption(
      new Option(
        '-e, --engine-path <path>',
        'Engine path, when it spans several segments',
      ).env('KVTREE_EXPORT_ENGINE_PATH'),
    )
    .addOption(
      new Option('-f, --format <format>', 'Output format')
        .choices(OUTPUT_FORMATS)
        .env('KVTREE_EXPORT_FORMAT'),
    )
    .option('--show-values', 'Do not mask values')
    .addOption(
      new Option('--max-value-length <n>', 'Maximum mask length, -1 to disable')
        .argParser(parseMaxValueLength)
        .env('KVTREE_EXPORT_MAX_VALUE_LENGTH'),
    )
    .option('--only-keys', 'Show only paths and keys')
    .option('--only-paths', 'Show only paths')
    .option('--show-version', 'Show the version of each secret')
    .action(async (flags: ExportFlags) => {
      const { exportService } = await createServices(settings());
      await exportService.exportSecrets({
        path: flags.path,
        enginePath: flags.enginePath,
        format: flags.format,
        showValues: flags.showValues,
        maxValueLength: flags.maxValueLength,
        onlyKeys: flag(flags.onlyKeys, 'KVTREE_EXPORT_ONLY_KEYS'),
        onlyPaths: flag(flags.onlyPaths, 'KVTREE_EXPORT_ONLY_PATHS'),
        showVersion: flag(flags.showVersion, 'KVTREE_EXPORT_SHOW_VERSION'),
      });
    });

  program
    .command('import')
    .description('Import exported JSON or YAML secrets')
    .addOption(
      new Option('-p, --path <path>', 'Destination path').env(
        'KVTREE_IMPORT_PATH',
      ),
    )
    .addOption(
      new Option(
        '-e, --engine-path <path>',
        'Engine path, when it spans several segments',
      ).env('KVTREE_IMPORT_ENGINE_PATH'),
    )
    .addOption(
      new Option('-f, --file <file>', 'Read input from a file instead of stdin')
        .env('KVTREE_IMPORT_FILE'),
    )
    .option('--force', 'Write even when the engine already holds secrets')
    .option('-d, --dry-run', 'Preview the result without writing')
    .option('-s, --silent', 'Do not print the imported secrets')
    .option('--show-values', 'Do not mask values')
    .addOption(
      new Option('--max-value-length <n>', 'Maximum mask length, -1 to disable')
        .argParser(parseMaxValueLength)
        .env('KVTREE_IMPORT_MAX_VALUE_LENGTH'),
    )
    .action(async (flags: ImportFlags) => {
      const source =
        flags.file !== undefined
          ? await input.readFile(flags.file)
          : await input.readStdin();
      const { importService } = await createServices(settings());
      await importService.importSecrets(source, {
        path: flags.path,
        enginePath: flags.enginePath,
        force: flag(flags.force, 'KVTREE_IMPORT_FORCE'),
        dryRun: flag(flags.dryRun, 'KVTREE_IMPORT_DRY_RUN'),
        silent: flag(flags.silent, 'KVTREE_IMPORT_SILENT'),
        showValues: flags.showValues,
        maxValueLength: flags.maxValueLength,
      });
    });

  return program;
}
