export { timestampColumn, baseEntityColumns, type BaseEntity, type NewEntity } from './common.js';
export { schemaMigrations, type SchemaMigrationRecord } from './migrations.js';
