import type { AbsolutePath, Alias, NonEmptyString, Platform } from "@cmdlink/core"

/**
 * A resolved shim: where it lives and what it should contain.
 * Derived from (alias, cmd, platform) and never persisted.
 */
export interface Link {
	readonly alias: Alias
	readonly cmd: NonEmptyString
	readonly path: AbsolutePath
	readonly contents: string
	readonly platform: Platform
}

export type PendingAction = "none" | "create" | "update" | "remove"
