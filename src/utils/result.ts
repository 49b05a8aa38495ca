/**
 * Typed result for operations that can fail.
 *
 * Role in system:
 * - Repositories, coordinators and handlers return `Result` instead of throwing, so a
 *   single failed remote call or write never takes the process down.
 * - `Ok(null)` means "nothing there"; `Err(error)` means "the operation failed".
 *
 * Contract:
 * - Callers check `isErr()`/`isOk()` before reading `value`/`error`.
 * - `Err.unwrap()` does not throw: it logs and returns `undefined`, so it must only be
 *   reached behind a guard.
 *
 * ```ts
 * const res = await registry.addServer(id, name);
 * if (res.isErr()) return ErrResult(res.error);
 * const entry = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_default: T): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * Does not throw. Logs a warning and returns `undefined`; guard with `isErr()` first.
   */
  unwrap(): T {
    console.warn("Result.unwrap called on Err; returning undefined fallback.", this.error);
    return undefined as unknown as T;
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<T, F>(fn(this.error));
  }
}

/** Successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok<T, E>(value);

/** Failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err<T, E>(error);

/** Normalizes anything caught into an `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
