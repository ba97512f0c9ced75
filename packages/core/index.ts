/**
 * @cmdlink/core
 *
 * Shared constants, branded types, and pure shim rendering.
 */

export {
	BINS_DIRNAME,
	CONFIG_FILENAME,
	HOME_ENV_VAR,
	PROJECT_DIRNAME,
} from "./constants"
export type { Platform } from "./link/shim"
export { detectPlatform, renderShim, shimExtension, shimFileName } from "./link/shim"
export type { AbsolutePath, Alias, NonEmptyString } from "./types/branded"
export type { CoercionError, CoercionResult } from "./types/coerce"
export {
	coerceAlias,
	coerceAliasWithError,
	coerceNonEmpty,
	coerceNonEmptyWithError,
} from "./types/coerce"
export type { BaseError, Result } from "./types/error"
