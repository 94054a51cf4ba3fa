/**
 * Typed result for operations that fail in expected ways.
 *
 * Lookups return `err(...)` for user-facing failures (unknown item, ambiguous
 * name) instead of throwing. Callers branch on `ok`.
 */
export type Result<T, E> = OkResult<T> | ErrResult<E>

export interface OkResult<T> {
	readonly ok: true
	readonly value: T
}

export interface ErrResult<E> {
	readonly ok: false
	readonly error: E
}

export function ok<T>(value: T): OkResult<T> {
	return { ok: true, value }
}

export function err<E>(error: E): ErrResult<E> {
	return { ok: false, error }
}
