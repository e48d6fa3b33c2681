import { RunConfigValidationError } from '../../config/schema.js';
import { TransformInputError } from '../../plm/errors.js';
import { CliUsageError } from './args.js';

/** Lines printed to stderr for an error that reached the top of the CLI. */
export const formatCliError = (error: unknown): string[] => {
  if (error instanceof TransformInputError) {
    const field = typeof error.field === 'string' ? error.field : error.field.join('+');
    return [`Invalid input ${field}=${error.value}: ${error.message}`];
  }
  if (error instanceof RunConfigValidationError) {
    return [
      error.message,
      ...error.issues
        .filter((issue) => issue.severity === 'error')
        .map((issue) => `  • ${issue.message} (${issue.code})`),
    ];
  }
  if (error instanceof CliUsageError) {
    return [error.message, 'Run "plm --help" for usage.'];
  }
  return [error instanceof Error ? error.message : String(error)];
};
