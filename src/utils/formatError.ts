function ownRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  return { ...value };
}

function responseStatus(error: Error): number | undefined {
  if (!('response' in error)) return undefined;
  const { response } = error;
  if (typeof response !== 'object' || response === null || !('status' in response)) return undefined;
  return typeof response.status === 'number' ? response.status : undefined;
}

/**
 * Flattens an error into log fields. Engine errors keep their `code` and
 * `details`; HTTP client errors keep the response status and drop the request
 * config, whose URL carries the bot token.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const details = 'details' in error ? ownRecord(error.details) : undefined;
    const status = responseStatus(error);
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      ...(details ? { details } : {}),
      ...(status !== undefined ? { status } : {}),
      ...('isAxiosError' in error ? {} : { stack: error.stack }),
    };
  }
  if (typeof error === 'object' && error !== null) {
    try {
      const parsed: unknown = JSON.parse(JSON.stringify(error));
      return ownRecord(parsed) ?? { message: String(error) };
    } catch {
      return { message: String(error) };
    }
  }
  return { message: String(error) };
}
