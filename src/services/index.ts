/**
 * Barrel export for injectable services.
 *
 * - ParameterStoreBackendService / SecretsManagerBackendService: SecretBackend implementations
 * - ImportService: imports exported secrets into the store
 * - ExportService: reads and renders secrets from the store
 */
export { ExportService } from './export.service';
export { ImportService } from './import.service';
export { ParameterStoreBackendService } from './parameter-store-backend.service';
export { SecretsManagerBackendService } from './secrets-manager-backend.service';
