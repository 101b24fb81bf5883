export * from './types/database.js';
export * from './types/content.js';
export * from './errors/index.js';

export { ConfigManager } from './config/ConfigManager.js';
export type { AppConfig, LoggingConfig, TransferConfig } from './config/types.js';
export { logger, initializeLogger } from './utils/logging.js';

export { DatabaseManager } from './database/DatabaseManager.js';
export { SqliteConnection } from './database/connections/SqliteConnection.js';
export { PostgresConnection } from './database/connections/PostgresConnection.js';
export { MigrationRunner, MIGRATIONS, type MigrationStatus } from './database/MigrationRunner.js';
export { ContentSchemaMigration } from './database/migrations/20240601_001_content_schema.js';

export {
  contentSchema,
  getTable,
  type ColumnDefinition,
  type ColumnType,
  type IndexDefinition,
  type SchemaDefinition,
  type TableDefinition,
} from './database/schema/contentSchema.js';
export {
  qualifiedName,
  renderCreateStatements,
  renderDropStatements,
  renderSchemaScript,
} from './database/schema/ddl.js';
export { applyContentSchema, dropContentSchema } from './database/schema/applySchema.js';

export { legacyRowSchemas, parseLegacyRow } from './validation/contentSchemas.js';
export { SqliteSourceReader } from './services/transfer/SqliteSourceReader.js';
export { ContentLoader } from './services/transfer/ContentLoader.js';
export { TransferVerifier } from './services/transfer/TransferVerifier.js';
export {
  ContentTransferService,
  TRANSFER_ORDER,
  type TableTransferResult,
  type TransferSummary,
} from './services/transfer/ContentTransferService.js';
