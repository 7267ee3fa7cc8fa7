import { EOL, INDENT } from './constants';

function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
      }

      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function readField(error: object, field: string): unknown {
  return field in error ? Reflect.get(error, field) : undefined;
}

/**
 * Renders an error as `Key: value` lines.
 *
 * Picks up the conventional `errPrefix` / `errType` / `errCode` /
 * `additionalInfo` fields used by the runtime's own errors, follows `cause`
 * one level per nesting, and appends the stack last.
 */
export function errorToString(error: unknown, depth = 0): string {
  const pad = INDENT.repeat(depth);

  if (error === null || typeof error !== 'object') {
    return pad + `Value: ${describeValue(error)}`;
  }

  const lines: string[] = [];
  const push = (label: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      lines.push(`${pad}${label}: ${describeValue(value)}`);
    }
  };

  push('Message', readField(error, 'message'));
  push('Name', readField(error, 'name'));
  push('Code', readField(error, 'code'));
  push('Prefix', readField(error, 'errPrefix'));
  push('errType', readField(error, 'errType'));
  push('errCode', readField(error, 'errCode'));

  const additionalInfo = readField(error, 'additionalInfo');
  if (typeof additionalInfo === 'object' && additionalInfo !== null) {
    for (const [key, value] of Object.entries(additionalInfo)) {
      push(`AdditionalInfo.${key}`, value);
    }
  }

  const cause = readField(error, 'cause');
  if (cause !== undefined && depth < 3) {
    lines.push(`${pad}Cause:`);
    lines.push(errorToString(cause, depth + 1));
  }

  const stack = readField(error, 'stack');
  if (typeof stack === 'string' && depth === 0) {
    lines.push(`${pad}Stack:`, stack);
  }

  return lines.join(EOL);
}
