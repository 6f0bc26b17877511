export {
  DATABASE_FILENAME,
  DEFAULT_INDEX_START,
  getDataDirectory,
  getDatabasePath,
  getIndexStart,
  getLogFile,
  getLogLevel,
  getNodeEnv,
  getTimeZone,
  isTest,
  resetEnvCache,
} from './config.js';
