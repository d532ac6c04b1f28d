export { appConfig, parseBoolean } from './app.config';
export { dbConfig } from './database.config';
export { loggingConfigValues } from './logging.config';
