import { registerAs } from '@nestjs/config';

/**
 * Environment-backed configuration under the `kvtree` namespace.
 *
 * - `KVTREE_BACKEND`: `parameter-store` (default) or `secrets-manager`
 * - `KVTREE_AWS_REGION`: AWS region, falls back to `AWS_REGION`
 * - `KVTREE_ENDPOINT`: custom endpoint URL (optional)
 * - `KVTREE_MAX_VALUE_LENGTH`: default mask length (optional)
 *
 * Values stay raw strings here; KvTreeModule parses and validates them.
 */
export const kvtreeConfig = registerAs('kvtree', () => ({
  backend: process.env.KVTREE_BACKEND,
  awsRegion: process.env.KVTREE_AWS_REGION ?? process.env.AWS_REGION,
  endpoint: process.env.KVTREE_ENDPOINT,
  maxValueLength: process.env.KVTREE_MAX_VALUE_LENGTH,
}));
