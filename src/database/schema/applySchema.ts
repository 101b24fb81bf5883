import { DatabaseConnection } from '../../types/database.js';
import { contentSchema, SchemaDefinition } from './contentSchema.js';
import { renderCreateStatements, renderDropStatements } from './ddl.js';
import { logger } from '../../utils/logging.js';

/**
 * Create the schema on the connection's dialect. Safe to run repeatedly:
 * existing objects are left untouched.
 */
export async function applyContentSchema(
  db: DatabaseConnection,
  schema: SchemaDefinition = contentSchema
): Promise<void> {
  const statements = renderCreateStatements(schema, db.type);
  for (const statement of statements) {
    await db.execute(statement);
  }
  logger.debug('[applyContentSchema] Schema applied', {
    namespace: schema.namespace,
    dialect: db.type,
    statements: statements.length,
  });
}

export async function dropContentSchema(
  db: DatabaseConnection,
  schema: SchemaDefinition = contentSchema
): Promise<void> {
  for (const statement of renderDropStatements(schema, db.type)) {
    await db.execute(statement);
  }
  logger.debug('[dropContentSchema] Schema dropped', {
    namespace: schema.namespace,
    dialect: db.type,
  });
}
