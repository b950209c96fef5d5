/**
 * Shared library utilities
 */
export {
  AppError,
  AuthError,
  TransientError,
  DeliveryError,
  ConfigError,
  isAppError,
  errorKind,
  errorMessage,
  type ErrorKind,
} from './errors';

export { createLogger, setLogLevel, type Logger, type LogLevel } from './logger';

export { sleep } from './sleep';
