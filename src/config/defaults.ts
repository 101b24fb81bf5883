import { AppConfig } from './types.js';

export const MAX_TRANSFER_BATCH_SIZE = 1000;

export const defaultConfig: AppConfig = {
  env: 'development',
  database: {
    type: 'postgres',
    host: 'localhost',
    port: 5432,
    database: 'movies_database',
    filename: './data/movies.sqlite',
    ssl: false,
    pool: {
      min: 2,
      max: 10,
    },
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  transfer: {
    sourceFile: './data/db.sqlite',
    batchSize: 100,
  },
};
