import { DatabaseConfig } from '../types/database.js';

export type { DatabaseConfig };

export type AppEnvironment = 'development' | 'production' | 'test';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface TransferConfig {
  sourceFile: string; // legacy SQLite database
  batchSize: number;
}

export interface AppConfig {
  env: AppEnvironment;
  database: DatabaseConfig;
  logging: LoggingConfig;
  transfer: TransferConfig;
}
