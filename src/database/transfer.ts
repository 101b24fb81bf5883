import fs from 'fs/promises';
import { DatabaseManager } from './DatabaseManager.js';
import { MigrationRunner } from './MigrationRunner.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { ContentTransferService } from '../services/transfer/ContentTransferService.js';
import { ErrorCode, FileSystemError } from '../errors/index.js';
import { initializeLogger, logger } from '../utils/logging.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

async function main(): Promise<void> {
  const configManager = ConfigManager.getInstance();
  configManager.validate();
  initializeLogger();

  const { sourceFile, batchSize } = configManager.getTransferConfig();

  // sqlite3 would silently create an empty file
  try {
    await fs.access(sourceFile);
  } catch (error) {
    throw new FileSystemError(
      `Legacy database not found: ${sourceFile}`,
      ErrorCode.FS_FILE_NOT_FOUND,
      sourceFile,
      false,
      { service: 'transfer', operation: 'main' },
      toError(error)
    );
  }

  const source = new SqliteConnection({ type: 'sqlite3', database: sourceFile, filename: sourceFile });
  const target = new DatabaseManager(configManager.getDatabaseConfig());

  try {
    await source.connect();
    await target.connect();

    await new MigrationRunner(target.getConnection()).migrate();

    const service = new ContentTransferService(source, target, { batchSize });
    const summary = await service.run({ verify: true });

    console.log('\n📋 Transfer Summary:');
    summary.tables.forEach(result => {
      console.log(
        `✅ ${result.table}: read ${result.read}, inserted ${result.inserted}, skipped ${result.skipped}`
      );
    });
    console.log(`⏱️  ${summary.durationMs} ms, verified: ${summary.verified ? 'yes' : 'no'}`);
  } finally {
    await target.disconnect();
    await source.close();
  }
}

main().catch(error => {
  logger.error('[transfer] Transfer failed', { error: getErrorMessage(error) });
  console.error('❌ Transfer failed:', getErrorMessage(error));
  process.exitCode = 1;
});
