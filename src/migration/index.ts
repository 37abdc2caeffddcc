export { migrate, parseVersion, formatVersion, documentVersion, pendingMigrations, CURRENT_SCHEMA_VERSION } from './migrate.js';
export { MIGRATIONS } from './steps.js';
export type { MigrationStep } from './steps.js';
