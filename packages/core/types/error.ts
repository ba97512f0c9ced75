export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type Result<T, E extends BaseError = BaseError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
