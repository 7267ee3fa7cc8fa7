const PLACEHOLDER = /\\?{{\s*([\w.]+)\s*}}/g;

function lookup(params: Record<string, unknown>, path: string): unknown {
  let current: unknown = params;

  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }

  return current;
}

function render(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }

  if (Array.isArray(value)) {
    return value.map((item) => render(item)).join(', ');
  }

  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return '[Unserializable]';
    }
  }

  return String(value);
}

/**
 * Fills `{{name}}` and `{{nested.path}}` placeholders from `params`.
 *
 * Missing or null values render as `fallback`. A placeholder preceded by a
 * backslash is emitted literally, without the backslash.
 */
export function renderTemplate(
  template: string,
  params: Record<string, unknown>,
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER, (match: string, path: string) => {
    if (match.startsWith('\\')) {
      return match.slice(1);
    }

    const value = lookup(params, path);

    return value === undefined || value === null ? fallback : render(value);
  });
}
