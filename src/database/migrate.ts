import { DatabaseManager } from './DatabaseManager.js';
import { MigrationRunner } from './MigrationRunner.js';
import { contentSchema } from './schema/contentSchema.js';
import { renderSchemaScript } from './schema/ddl.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { DatabaseType } from '../types/database.js';
import { initializeLogger, logger } from '../utils/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';

const COMMANDS = ['up', 'down', 'status', 'print'] as const;
type Command = (typeof COMMANDS)[number];

function parseCommand(value: string | undefined): Command | undefined {
  return COMMANDS.find(command => command === (value ?? 'up'));
}

function parseDialect(value: string | undefined, fallback: DatabaseType): DatabaseType | undefined {
  if (value === undefined) {
    return fallback;
  }
  return value === 'postgres' || value === 'sqlite3' ? value : undefined;
}

function usage(): string {
  return 'Usage: migrate up | down [targetVersion] | status | print [postgres|sqlite3]';
}

async function printStatus(runner: MigrationRunner): Promise<void> {
  const status = await runner.status();
  console.log('\n📋 Migration Status:');
  status.forEach(migration => {
    const icon = migration.executed ? '✅' : '⏳';
    console.log(`${icon} ${migration.version} - ${migration.name}`);
  });
}

async function main(argv: string[]): Promise<void> {
  const configManager = ConfigManager.getInstance();
  const dbConfig = configManager.getDatabaseConfig();

  const command = parseCommand(argv[0]);
  if (!command) {
    console.error(usage());
    process.exitCode = 1;
    return;
  }

  // Printing the script needs no connection
  if (command === 'print') {
    const dialect = parseDialect(argv[1], 'postgres');
    if (!dialect) {
      console.error(usage());
      process.exitCode = 1;
      return;
    }
    process.stdout.write(renderSchemaScript(contentSchema, dialect));
    return;
  }

  configManager.validate();
  initializeLogger();

  console.log(`📊 Database type: ${dbConfig.type}`);
  console.log(
    `📁 Database location: ${
      dbConfig.type === 'sqlite3'
        ? dbConfig.filename
        : `${dbConfig.host}:${dbConfig.port}/${dbConfig.database}`
    }`
  );

  const dbManager = new DatabaseManager(dbConfig);

  try {
    await dbManager.connect();
    const runner = new MigrationRunner(dbManager.getConnection());

    if (command === 'up') {
      const applied = await runner.migrate();
      console.log(`✅ Applied ${applied.length} migration(s)`);
    } else if (command === 'down') {
      const rolledBack = await runner.rollback(argv[1]);
      console.log(`✅ Rolled back ${rolledBack.length} migration(s)`);
    }

    await printStatus(runner);
  } finally {
    await dbManager.disconnect();
  }
}

main(process.argv.slice(2)).catch(error => {
  logger.error('[migrate] Migration failed', { error: getErrorMessage(error) });
  console.error('❌ Migration failed:', getErrorMessage(error));
  process.exitCode = 1;
});
