export type FetchErrorKind = 'timeout' | 'not-found' | 'transport' | 'malformed';

export type FetchError =
  | { kind: 'timeout'; url: string; timeoutMs: number }
  | { kind: 'not-found'; url: string }
  | { kind: 'transport'; url: string; status: number | null; message: string }
  | { kind: 'malformed'; url: string; message: string };

export type Result<T, E = FetchError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'timeout':
      return `timed out after ${error.timeoutMs}ms (${error.url})`;
    case 'not-found':
      return `not found (${error.url})`;
    case 'transport':
      return error.status === null
        ? `transport failure: ${error.message} (${error.url})`
        : `upstream answered ${error.status} (${error.url})`;
    case 'malformed':
      return `malformed response: ${error.message} (${error.url})`;
  }
}
