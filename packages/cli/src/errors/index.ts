/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  GpxError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError, withErrorHandling } from './handler.js';
