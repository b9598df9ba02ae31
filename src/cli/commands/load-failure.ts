import type { CliResult } from '../types/cli-result.js';
import { misuse } from '../types/cli-result.js';
import type { LoadRequestFileResult } from '../../application/use-cases/load-request-file.js';
import { assertNever } from '../../runtime/assert-never.js';

type LoadFailure = Exclude<LoadRequestFileResult, { kind: 'loaded' }>;

/**
 * Input files that cannot be loaded are a misuse of the command.
 */
export function describeLoadFailure(result: LoadFailure): CliResult {
  switch (result.kind) {
    case 'file_not_found':
      return misuse(`File not found: ${result.filePath}`, {
        suggestions: ['Check the file path and try again'],
      });

    case 'read_error':
      if (result.code === 'EACCES') {
        return misuse(`Permission denied: ${result.filePath}`, {
          suggestions: ['Check file permissions and try again'],
        });
      }
      return misuse(`Error reading file: ${result.filePath}`, { details: [result.message] });

    case 'json_parse_error':
      return misuse(`Invalid JSON syntax in ${result.filePath}`, {
        details: [result.message],
        suggestions: ['Check the JSON syntax and try again'],
      });

    default:
      return assertNever(result);
  }
}
