import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  CreateSecretCommand,
  GetSecretValueCommand,
  ListSecretsCommand,
  PutSecretValueCommand,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import { KVTREE_OPTIONS } from '../constants';
import { BackendError, InvalidOptionsError } from '../errors';
import { SecretsManagerBackendService } from './secrets-manager-backend.service';

// Mock the AWS SDK
jest.mock('@aws-sdk/client-secrets-manager');

describe('SecretsManagerBackendService', () => {
  let service: SecretsManagerBackendService;
  let mockSend: jest.Mock;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    mockSend = jest.fn();
    (SecretsManagerClient as jest.Mock).mockImplementation(() => ({
      send: mockSend,
    }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SecretsManagerBackendService,
        {
          provide: KVTREE_OPTIONS,
          useValue: { backend: 'secrets-manager', awsRegion: 'us-east-1' },
        },
      ],
    }).compile();

    service = module.get<SecretsManagerBackendService>(
      SecretsManagerBackendService,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create the client for the configured region', () => {
    expect(SecretsManagerClient).toHaveBeenCalledWith({ region: 'us-east-1' });
  });

  describe('hasEngine', () => {
    it('should return true when a secret is named below the engine', async () => {
      mockSend.mockResolvedValue({
        SecretList: [{ Name: 'secret/app/db' }],
      });

      await expect(service.hasEngine('secret')).resolves.toBe(true);
      expect(ListSecretsCommand).toHaveBeenCalledWith({
        Filters: [{ Key: 'name', Values: ['secret'] }],
      });
    });

    it('should ignore names that only share a prefix with the engine', async () => {
      mockSend.mockResolvedValue({
        SecretList: [{ Name: 'secrets/app' }, { Name: 'secret-old' }],
      });

      await expect(service.hasEngine('secret')).resolves.toBe(false);
    });

    it('should wrap AWS errors in a BackendError', async () => {
      mockSend.mockRejectedValue(new Error('boom'));

      const lookup = service.hasEngine('secret');

      await expect(lookup).rejects.toThrow(BackendError);
      await expect(lookup).rejects.toThrow(
        "Failed to look up 'secret' in AWS Secrets Manager (region 'us-east-1') - boom",
      );
    });
  });

  describe('enableEngine', () => {
    it('should accept a valid name prefix without calling AWS', async () => {
      await expect(service.enableEngine('team/kv')).resolves.toBeUndefined();
      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should reject unsupported characters', async () => {
      await expect(service.enableEngine('team kv')).rejects.toThrow(
        InvalidOptionsError,
      );
    });
  });

  describe('writeLeaf', () => {
    it('should put a new value into an existing secret', async () => {
      mockSend.mockResolvedValue({ VersionId: 'v2' });

      await service.writeLeaf('/secret/app/db/', { user: 'alice' });

      expect(PutSecretValueCommand).toHaveBeenCalledWith({
        SecretId: 'secret/app/db',
        SecretString: '{"user":"alice"}',
      });
      expect(CreateSecretCommand).not.toHaveBeenCalled();
    });

    it('should create the secret when it does not exist', async () => {
      mockSend
        .mockRejectedValueOnce({
          name: 'ResourceNotFoundException',
          message: 'Secrets Manager cannot find the specified secret',
        })
        .mockResolvedValueOnce({ VersionId: 'v1' });

      await service.writeLeaf('secret/app/db', { user: 'alice' });

      expect(CreateSecretCommand).toHaveBeenCalledWith({
        Name: 'secret/app/db',
        SecretString: '{"user":"alice"}',
      });
      expect(mockSend).toHaveBeenCalledTimes(2);
    });

    it('should wrap other failures in a BackendError', async () => {
      mockSend.mockRejectedValue({
        name: 'AccessDeniedException',
        message: 'User is not authorized',
      });

      await expect(
        service.writeLeaf('secret/app/db', { user: 'alice' }),
      ).rejects.toThrow(
        "Failed to write secret to 'secret/app/db' in AWS Secrets Manager (region 'us-east-1') - Access Denied.",
      );
      expect(CreateSecretCommand).not.toHaveBeenCalled();
    });
  });

  describe('readTreeRecursive', () => {
    it('should list names page by page and fetch every value', async () => {
      const changed = new Date('2024-02-01T00:00:00Z');
      mockSend
        .mockResolvedValueOnce({
          SecretList: [{ Name: 'secret/app/db', LastChangedDate: changed }],
          NextToken: 'token-page-2',
        })
        .mockResolvedValueOnce({
          SecretList: [{ Name: 'secret/app/token' }, { Name: 'secret/apps' }],
        })
        .mockResolvedValueOnce({
          SecretString: '{"user":"alice","pass":"test-secret"}',
          VersionId: 'v1',
        })
        .mockResolvedValueOnce({
          SecretBinary: Buffer.from('plain-value'),
          VersionId: 'v7',
        });

      const snapshot = await service.readTreeRecursive('secret', 'app', true);

      expect(snapshot).toEqual({
        secrets: {
          'secret/app/db': { user: 'alice', pass: 'test-secret' },
          'secret/app/token': { token: 'plain-value' },
        },
        metadata: {
          'secret/app/db': { version: 'v1', updatedAt: changed },
          'secret/app/token': { version: 'v7' },
        },
      });
      expect(ListSecretsCommand).toHaveBeenNthCalledWith(2, {
        Filters: [{ Key: 'name', Values: ['secret/app'] }],
        NextToken: 'token-page-2',
      });
      expect(GetSecretValueCommand).toHaveBeenCalledTimes(2);
      expect(GetSecretValueCommand).toHaveBeenCalledWith({
        SecretId: 'secret/app/db',
      });
    });

    it('should leave metadata empty unless requested', async () => {
      mockSend
        .mockResolvedValueOnce({ SecretList: [{ Name: 'secret/db' }] })
        .mockResolvedValueOnce({ SecretString: '{"user":"alice"}' });

      const snapshot = await service.readTreeRecursive('secret', '', false);

      expect(snapshot).toEqual({
        secrets: { 'secret/db': { user: 'alice' } },
        metadata: {},
      });
    });

    it('should warn when nothing is found', async () => {
      mockSend.mockResolvedValueOnce({ SecretList: [] });

      await expect(
        service.readTreeRecursive('secret', 'app', false),
      ).resolves.toEqual({ secrets: {}, metadata: {} });
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        "No secrets found below 'secret/app' in region 'us-east-1'",
      );
    });

    it('should fail when a value cannot be fetched', async () => {
      mockSend
        .mockResolvedValueOnce({
          SecretList: [{ Name: 'secret/a' }, { Name: 'secret/b' }],
        })
        .mockResolvedValueOnce({ SecretString: '{"k":"v"}' })
        .mockRejectedValueOnce({
          name: 'DecryptionFailure',
          message: 'KMS key disabled',
        });

      const reading = service.readTreeRecursive('secret', '', false);

      await expect(reading).rejects.toThrow(BackendError);
      await expect(reading).rejects.toThrow(
        "Failed to read secrets from 'secret' in AWS Secrets Manager (region 'us-east-1') - Decryption failed. Ensure your KMS key permissions are correct and the key is enabled.",
      );
    });

    it('should fail when a secret has no value', async () => {
      mockSend
        .mockResolvedValueOnce({ SecretList: [{ Name: 'secret/a' }] })
        .mockResolvedValueOnce({});

      await expect(
        service.readTreeRecursive('secret', '', false),
      ).rejects.toThrow("- Secret 'secret/a' has no value");
    });
  });
});
