import * as dotenv from 'dotenv';
import { AppConfig, DatabaseConfig, LoggingConfig, TransferConfig } from './types.js';
import { defaultConfig, MAX_TRANSFER_BATCH_SIZE } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    config.env = this.getEnum('NODE_ENV', config.env, ['development', 'production', 'test']);

    // Database configuration
    config.database.type = this.getEnum('DB_TYPE', config.database.type, ['sqlite3', 'postgres']);

    if (config.database.type === 'sqlite3') {
      config.database.filename = this.getString('DB_FILE', config.database.filename);
    } else {
      config.database.host = this.getString('DB_HOST', config.database.host);
      config.database.port = this.getNumber('DB_PORT', config.database.port);
      config.database.database = this.getString('DB_NAME', config.database.database);
      config.database.ssl = this.getBoolean('DB_SSL', config.database.ssl);

      const username = process.env.DB_USER;
      if (username) {
        config.database.username = username;
      }
      const password = process.env.DB_PASSWORD;
      if (password) {
        config.database.password = password;
      }
    }

    // Legacy transfer
    config.transfer.sourceFile = this.getString('SQLITE_SOURCE_FILE', config.transfer.sourceFile);
    config.transfer.batchSize = this.getNumber('TRANSFER_BATCH_SIZE', config.transfer.batchSize);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return value;
  }

  private getNumber(key: string, defaultValue?: number): number {
    const value = process.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getTransferConfig(): TransferConfig {
    return this.config.transfer;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (this.config.database.type === 'postgres') {
      if (!this.config.database.username) {
        errors.push('Database username is required for PostgreSQL (DB_USER)');
      }
      if (!this.config.database.password) {
        errors.push('Database password is required for PostgreSQL (DB_PASSWORD)');
      }
    }

    const { batchSize } = this.config.transfer;
    if (batchSize < 1 || batchSize > MAX_TRANSFER_BATCH_SIZE) {
      errors.push(`TRANSFER_BATCH_SIZE must be between 1 and ${MAX_TRANSFER_BATCH_SIZE}`);
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'validation',
        `Configuration validation failed:\n${errors.join('\n')}`,
        { service: 'ConfigManager', operation: 'validate', metadata: { errors } }
      );
    }
  }
}
