import type { Alias, NonEmptyString } from "@cmdlink/core"
import type { Link, PendingAction } from "@/link/types"
import type { ProjectLayout } from "@/project/layout"

export type { PendingAction } from "@/link/types"

/**
 * The persisted part of an alias.
 */
export interface AliasRecord {
	readonly alias: Alias
	readonly cmd: NonEmptyString
	readonly description?: string
}

/**
 * Derived, table-owned state for one alias. Populated for every record
 * when the table is loaded, so a record never exists without it.
 */
export interface LinkState {
	readonly link: Link
	readonly action: PendingAction
}

export interface AliasTable {
	readonly layout: ProjectLayout
	readonly records: ReadonlyMap<Alias, AliasRecord>
	readonly links: ReadonlyMap<Alias, LinkState>
	/** Records as they were last read from or written to the config */
	readonly persisted: ReadonlyMap<Alias, AliasRecord>
	/** True while any record has unsaved changes or owes a filesystem action */
	readonly dirty: boolean
}

export interface AliasRow {
	alias: Alias
	description: string
}
