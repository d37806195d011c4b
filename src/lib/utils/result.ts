/**
 * Result<T, E>: discriminated union for explicit ok/err returns.
 *
 * Vault operations whose failures are part of the contract (wrong password,
 * tampered container, unknown id, corrupt file, backup failure) return a
 * Result so callers branch on the error kind instead of catching.
 *
 * Usage:
 *   const opened = await Vault.open(password, { path });
 *   if (isErr(opened)) {
 *     console.error(opened.error.code);
 *     return;
 *   }
 *   const vault = opened.value;
 */

// ============================================================================
// Types
// ============================================================================

export interface OkResult<T> {
  success: true;
  value: T;
}

export interface ErrResult<E> {
  success: false;
  error: E;
}

/**
 * Either an OkResult<T> or an ErrResult<E>. Narrow with isOk() / isErr().
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * @example
 *   return ok(container);
 */
export function ok<T>(value: T): OkResult<T> {
  return { success: true, value };
}

/**
 * @example
 *   return err(new NotFoundError(id));
 */
export function err<E = Error>(error: E): ErrResult<E> {
  return { success: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.success === true;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return result.success === false;
}

// ============================================================================
// Unwrapping
// ============================================================================

/**
 * Return the value or throw the error. For call sites (the CLI, tests) where a
 * failure ends the operation anyway.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

/**
 * Run an async function and return a Result instead of throwing.
 * Non-Error throwables are converted with String().
 *
 * @example
 *   const sent = await tryCatch(() => gateway.upload(file, name));
 *   if (isErr(sent)) return err(new BackupTransportError(sent.error.message));
 */
export async function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await fn();
    return ok(value);
  } catch (thrown) {
    if (thrown instanceof Error) {
      return err(thrown);
    }
    return err(new Error(String(thrown)));
  }
}
