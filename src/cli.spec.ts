import { Command } from 'commander';
import { CliInput, CliServices, createProgram } from './cli';

describe('cli', () => {
  let services: {
    importService: { importSecrets: jest.Mock };
    exportService: { exportSecrets: jest.Mock };
  };
  let createServices: jest.Mock<Promise<CliServices>, [{ verbose: boolean }]>;
  let input: jest.Mocked<CliInput>;

  const quiet = (program: Command): Command => {
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({
        writeOut: () => undefined,
        writeErr: () => undefined,
      });
    }
    return program;
  };

  const run = (...args: string[]) =>
    quiet(createProgram(createServices, input)).parseAsync(args, {
      from: 'user',
    });

  beforeEach(() => {
    for (const name of Object.keys(process.env)) {
      if (name.startsWith('KVTREE_')) delete process.env[name];
    }
    services = {
      importService: { importSecrets: jest.fn().mockResolvedValue(undefined) },
      exportService: { exportSecrets: jest.fn().mockResolvedValue(undefined) },
    };
    createServices = jest.fn<Promise<CliServices>, [{ verbose: boolean }]>(
      async () => services,
    );
    input = {
      readFile: jest
        .fn()
        .mockResolvedValue('{"secret": {"db": {"user": "alice"}}}'),
      readStdin: jest
        .fn()
        .mockResolvedValue('secret:\n  db:\n    user: alice\n'),
    };
  });

  afterEach(() => {
    for (const name of Object.keys(process.env)) {
      if (name.startsWith('KVTREE_')) delete process.env[name];
    }
  });

  describe('export', () => {
    it('should map flags to export options', async () => {
      await run(
        'export',
        '-p',
        'secret/app',
        '-f',
        'json',
        '--show-values',
        '--max-value-length',
        '4',
        '--only-keys',
        '--show-version',
      );

      expect(services.exportService.exportSecrets).toHaveBeenCalledWith({
        path: 'secret/app',
        enginePath: undefined,
        format: 'json',
        showValues: true,
        maxValueLength: 4,
        onlyKeys: true,
        onlyPaths: false,
        showVersion: true,
      });
      expect(createServices).toHaveBeenCalledWith({ verbose: false });
    });

    it('should read options from environment variables', async () => {
      process.env.KVTREE_EXPORT_PATH = 'secret';
      process.env.KVTREE_EXPORT_ENGINE_PATH = 'team/kv';
      process.env.KVTREE_EXPORT_FORMAT = 'yaml';
      process.env.KVTREE_EXPORT_MAX_VALUE_LENGTH = '-1';
      process.env.KVTREE_EXPORT_ONLY_PATHS = 'true';

      await run('export');

      expect(services.exportService.exportSecrets).toHaveBeenCalledWith({
        path: 'secret',
        enginePath: 'team/kv',
        format: 'yaml',
        showValues: undefined,
        maxValueLength: -1,
        onlyKeys: false,
        onlyPaths: true,
        showVersion: false,
      });
    });

    it('should prefer flags over environment variables', async () => {
      process.env.KVTREE_EXPORT_PATH = 'secret';

      await run('export', '--path', 'other');

      expect(services.exportService.exportSecrets).toHaveBeenCalledWith(
        expect.objectContaining({ path: 'other' }),
      );
    });

    it('should reject unknown formats', async () => {
      await expect(
        run('export', '-p', 'secret', '-f', 'xml'),
      ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
      expect(createServices).not.toHaveBeenCalled();
    });

    it('should reject a mask length below -1', async () => {
      await expect(
        run('export', '-p', 'secret', '--max-value-length', '-3'),
      ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    });

    it('should pass service errors through', async () => {
      const failure = new Error('a path or engine path is required');
      services.exportService.exportSecrets.mockRejectedValue(failure);

      await expect(run('export')).rejects.toBe(failure);
    });
  });

  describe('import', () => {
    it('should read input from a file', async () => {
      await run('import', '--file', 'dump.json', '--dry-run');

      expect(input.readFile).toHaveBeenCalledWith('dump.json');
      expect(input.readStdin).not.toHaveBeenCalled();
      expect(services.importService.importSecrets).toHaveBeenCalledWith(
        '{"secret": {"db": {"user": "alice"}}}',
        {
          path: undefined,
          enginePath: undefined,
          force: false,
          dryRun: true,
          silent: false,
          showValues: undefined,
          maxValueLength: undefined,
        },
      );
    });

    it('should read input from stdin without a file', async () => {
      await run('import', '-p', 'backup', '--force', '-s', '--show-values');

      expect(input.readStdin).toHaveBeenCalledTimes(1);
      expect(services.importService.importSecrets).toHaveBeenCalledWith(
        'secret:\n  db:\n    user: alice\n',
        expect.objectContaining({
          path: 'backup',
          force: true,
          silent: true,
          showValues: true,
        }),
      );
    });

    it('should read boolean flags from environment variables', async () => {
      process.env.KVTREE_IMPORT_FORCE = 'TRUE';
      process.env.KVTREE_IMPORT_SILENT = 'false';
      process.env.KVTREE_IMPORT_ENGINE_PATH = 'team/kv';

      await run('import');

      expect(services.importService.importSecrets).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({
          enginePath: 'team/kv',
          force: true,
          silent: false,
          dryRun: false,
        }),
      );
    });
  });

  it('should create services with verbose logging when asked', async () => {
    await run('--verbose', 'export', '-p', 'secret');

    expect(createServices).toHaveBeenCalledWith({ verbose: true });
  });

  it('should show help without creating services', async () => {
    await expect(run('--help')).rejects.toMatchObject({
      code: 'commander.helpDisplayed',
    });
    expect(createServices).not.toHaveBeenCalled();
  });
});
