export {
  AuthflowLogger,
  createLogger,
  describeError,
  isDebugMode,
  setDebugMode,
  type AuthflowLoggerConfig,
  type LogEntry,
  type LoggedError,
  type LogLevel,
} from './logger.js';
