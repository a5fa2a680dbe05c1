/**
 * Read a single string parameter from parsed query or form data.
 * Files and arrays are treated as absent.
 */
export function stringParam(
  params: Record<string, unknown>,
  name: string
): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Keep only the string-valued entries of parsed form data
 */
export function stringParams(params: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}
