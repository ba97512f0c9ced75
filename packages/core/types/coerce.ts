import type { Alias, NonEmptyString } from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

// Aliases become shim file names and command names.
const ALIAS_INVALID_CHARS = /[\s/\\:*?"<>|]/

export function coerceAlias(value: string): Alias | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed === "." || trimmed === "..") return null
	// Object keys in the config; this one cannot be stored as a table name.
	if (trimmed === "__proto__") return null
	if (ALIAS_INVALID_CHARS.test(trimmed)) return null
	return trimmed as Alias
}

export interface CoercionError {
	field: string
	value: string
	reason: string
}

export type CoercionResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: CoercionError }

export function coerceAliasWithError(value: string, field: string): CoercionResult<Alias> {
	const result = coerceAlias(value)
	if (result === null) {
		return {
			error: {
				field,
				reason: 'must be non-empty, not ".", ".." or "__proto__", and contain no whitespace or any of / \\ : * ? " < > |',
				value,
			},
			ok: false,
		}
	}
	return { ok: true, value: result }
}

export function coerceNonEmptyWithError(
	value: string,
	field: string,
): CoercionResult<NonEmptyString> {
	const result = coerceNonEmpty(value)
	if (result === null) {
		return {
			error: { field, reason: "must be non-empty", value },
			ok: false,
		}
	}
	return { ok: true, value: result }
}
