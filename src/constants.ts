/**
 * Dependency injection token for the active SecretBackend implementation.
 */
export const SECRET_BACKEND = 'SECRET_BACKEND';

/**
 * Dependency injection token for the OutputSink that receives rendered text.
 */
export const OUTPUT_SINK = 'OUTPUT_SINK';

/**
 * Dependency injection token for the validated ModuleOptions.
 */
export const KVTREE_OPTIONS = 'KVTREE_OPTIONS';

/**
 * Configuration key for the backend kind in ConfigService.
 * Expected value: 'parameter-store' or 'secrets-manager'
 */
export const KVTREE_BACKEND = 'kvtree.backend';

/**
 * Configuration key for the AWS region in ConfigService.
 * Expected value: AWS region string (e.g., 'us-east-1', 'eu-west-1')
 */
export const KVTREE_AWS_REGION = 'kvtree.awsRegion';

/**
 * Configuration key for a custom AWS endpoint in ConfigService.
 * Expected value: URL string (e.g., 'http://localhost:4566'), optional
 */
export const KVTREE_ENDPOINT = 'kvtree.endpoint';

/**
 * Configuration key for the default mask length in ConfigService.
 * Expected value: integer >= -1
 */
export const KVTREE_MAX_VALUE_LENGTH = 'kvtree.maxValueLength';

/** Separator between path segments. */
export const DELIMITER = '/';

export const MASK_CHAR = '*';

/** Default number of mask characters per value. */
export const MAX_VALUE_LENGTH = 12;
