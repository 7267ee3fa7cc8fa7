import { errorToString } from '../../error-to-string';
import { DOUBLE_EOL } from '../../constants';

/**
 * Message body for errorObject(): an optional prefix line, then the error
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  const trimmed = prefix.trim();
  const body = errorToString(error);

  return trimmed.length > 0 ? `${trimmed}: ${DOUBLE_EOL}${body}` : body;
}
