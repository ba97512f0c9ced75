import type { Alias, NonEmptyString, Result } from "@cmdlink/core"
import type { AliasRecord, AliasTable, LinkState, PendingAction } from "@/aliases/types"
import { resolveLink } from "@/link/link"
import type { ProjectLayout } from "@/project/layout"
import type { AliasExistsError } from "@/types/errors"

/**
 * Pure transformation functions for AliasTable.
 * These return new AliasTable instances - no mutation, no filesystem access.
 */

export interface CreateAliasInput {
	alias: Alias
	cmd: NonEmptyString
	description?: string
	force: boolean
}

/**
 * Build a table from persisted records. Every record gets its link state
 * here, with no pending action.
 */
export function buildAliasTable(
	layout: ProjectLayout,
	records: ReadonlyMap<Alias, AliasRecord>,
): AliasTable {
	const links = new Map<Alias, LinkState>()
	for (const [alias, record] of records) {
		links.set(alias, { action: "none", link: resolveLink(layout, alias, record.cmd) })
	}

	return { dirty: false, layout, links, persisted: records, records: new Map(records) }
}

/**
 * Insert or overwrite an alias and schedule its shim write.
 * Overwriting requires `force`; a fresh alias is scheduled `create`,
 * a forced write `update`.
 */
export function createAlias(
	table: AliasTable,
	input: CreateAliasInput,
): Result<AliasTable, AliasExistsError> {
	const { alias, cmd, description, force } = input
	if (hasAlias(table, alias) && !force) {
		return {
			error: {
				alias,
				message: `Alias '${alias}' already exists. Use --force to overwrite it.`,
				type: "alias_exists",
			},
			ok: false,
		}
	}

	// A record still pending removal may have a shim on disk, so it is rewritten.
	const action: PendingAction = force || table.records.has(alias) ? "update" : "create"
	const record: AliasRecord = description ? { alias, cmd, description } : { alias, cmd }

	const records = new Map(table.records)
	records.set(alias, record)
	const links = new Map(table.links)
	links.set(alias, { action, link: resolveLink(table.layout, alias, cmd) })

	return { ok: true, value: { ...table, dirty: true, links, records } }
}

/**
 * Schedule removal of an alias. Unknown aliases leave the table untouched.
 */
export function removeAlias(
	table: AliasTable,
	alias: Alias,
): { table: AliasTable; removed: boolean } {
	const state = table.links.get(alias)
	if (!state || !table.records.has(alias)) {
		return { removed: false, table }
	}

	return { removed: true, table: scheduleAction(table, alias, "remove") }
}

export function scheduleAction(
	table: AliasTable,
	alias: Alias,
	action: PendingAction,
): AliasTable {
	const state = table.links.get(alias)
	if (!state) {
		return table
	}

	const links = new Map(table.links)
	links.set(alias, { ...state, action })
	return { ...table, dirty: true, links }
}

/**
 * Whether the alias is present and not pending removal.
 */
export function hasAlias(table: AliasTable, alias: Alias): boolean {
	return table.records.has(alias) && getPendingAction(table, alias) !== "remove"
}

export function getPendingAction(table: AliasTable, alias: Alias): PendingAction | undefined {
	return table.links.get(alias)?.action
}
