import type { CoercionError } from "@cmdlink/core"
import type { ValidationError } from "@/types/errors"

export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}

export function coercionFailure(error: CoercionError): ValidationError {
	return {
		field: error.field,
		message: `Invalid ${error.field} "${error.value}": ${error.reason}.`,
		source: "manual",
		type: "validation",
	}
}
