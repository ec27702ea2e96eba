/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  ServiceError,
  RunFailedError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, toCliError, EXIT_CANCELLED } from './handler.js';
