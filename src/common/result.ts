export type FetchErrorKind = 'source-unavailable' | 'query-failed';

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly collection?: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export type Result<T, E = FetchError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** The value on success, `fallback` otherwise. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Run an async store call and capture any rejection as a `query-failed`
 * FetchError for `collection`.
 */
export async function tryAsync<T>(collection: string, run: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new FetchError('query-failed', message, collection));
  }
}
