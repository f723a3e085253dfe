/**
 *
 * @param prefix
 * @param rawOutput
 * @returns
 *
 * Prefixes the given rawOutput with the specified prefix if it's a relative path.
 */

export function prefixPath(
  prefix: string,
  rawOutput?: string
): string | undefined {
  if (!rawOutput) return undefined;
  if (rawOutput.startsWith("/") || rawOutput.startsWith(`${prefix}/`)) {
    return rawOutput;
  }
  return `${prefix}/${rawOutput}`;
}

/**
 * Quote a SQL identifier, doubling embedded quotes.
 */
export function quoteIdent(value: string): string {
  return '"' + value.replace(/"/g, '""') + '"';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
