import type { Alias, Result } from "@cmdlink/core"
import { buildAliasTable, scheduleAction } from "@/aliases/transform"
import type { AliasRecord, AliasTable, LinkState, PendingAction } from "@/aliases/types"
import { loadConfig, saveConfig } from "@/config/fs"
import { linkExists, linkIsStale, performLinkAction } from "@/link/link"
import { ensureProjectLayout, type ProjectLayout } from "@/project/layout"
import type { CmdlinkError, ConfigError, LinkError } from "@/types/errors"

export interface AliasTableLoadResult {
	table: AliasTable
	/** True when the config file did not exist and was written empty */
	created: boolean
	warnings: string[]
}

export interface RefreshOptions {
	/** Also rewrite shims whose contents no longer match their command */
	rewrite?: boolean
}

export interface ScheduledAction {
	alias: Alias
	action: PendingAction
}

export interface RefreshResult {
	table: AliasTable
	scheduled: ScheduledAction[]
}

export interface ApplySummary {
	table: AliasTable
	applied: ScheduledAction[]
	failures: LinkError[]
	saved: boolean
}

/**
 * Load the alias table from the project directory, creating the directory
 * layout and an empty config as needed. Missing shims are reported as
 * warnings only; they get a pending action through refreshAliases.
 */
export async function loadAliasTable(
	layout: ProjectLayout,
): Promise<Result<AliasTableLoadResult, CmdlinkError>> {
	const ensured = await ensureProjectLayout(layout)
	if (!ensured.ok) {
		return ensured
	}

	const config = await loadConfig(layout)
	if (!config.ok) {
		return config
	}

	const table = buildAliasTable(layout, config.value.records)
	const warnings: string[] = []
	for (const [alias, state] of table.links) {
		if (!(await linkExists(state.link))) {
			warnings.push(
				`Link for alias "${alias}" is missing (${state.link.path}). Run \`cmdlink refresh\` to recreate it.`,
			)
		}
	}

	return { ok: true, value: { created: config.value.created, table, warnings } }
}

/**
 * Re-check every shim against the filesystem. Aliases with no pending
 * action whose shim is missing are scheduled `create`; with `rewrite`,
 * shims whose contents are stale are scheduled `update`. Actions already
 * pending are kept as they are.
 */
export async function refreshAliases(
	table: AliasTable,
	options: RefreshOptions = {},
): Promise<RefreshResult> {
	let next = table
	const scheduled: ScheduledAction[] = []

	for (const [alias, state] of table.links) {
		const action = await refreshedAction(state, options)
		if (action === "none") {
			continue
		}

		next = scheduleAction(next, alias, action)
		scheduled.push({ action, alias })
	}

	return { scheduled, table: next }
}

async function refreshedAction(
	state: LinkState,
	options: RefreshOptions,
): Promise<PendingAction> {
	if (state.action !== "none") {
		return "none"
	}

	if (!(await linkExists(state.link))) {
		return "create"
	}

	if (options.rewrite && (await linkIsStale(state.link))) {
		return "update"
	}

	return "none"
}

/**
 * Apply every pending action to the filesystem, prune removed aliases,
 * and write the config. A failed link action does not stop the others;
 * the alias keeps its pending action and is reported in `failures`.
 * The config only records what is on disk: an alias whose create or
 * update failed is written as it was last persisted, or left out if it
 * was never persisted. Config write failures are returned as errors.
 *
 * Nothing is written when the table is clean.
 */
export async function applyAndSave(
	table: AliasTable,
): Promise<Result<ApplySummary, ConfigError>> {
	// TODO: hold an advisory lock on the project directory from load until the
	// config is written; two concurrent invocations can currently lose updates.
	if (!table.dirty) {
		return { ok: true, value: { applied: [], failures: [], saved: false, table } }
	}

	const records = new Map(table.records)
	const links = new Map(table.links)
	const applied: ScheduledAction[] = []
	const failures: LinkError[] = []
	const pruned: Alias[] = []
	const unwritten = new Set<Alias>()

	for (const [alias, state] of table.links) {
		if (state.action === "none") {
			continue
		}

		const result = await performLinkAction(state.link, state.action)
		if (!result.ok) {
			failures.push(result.error)
			if (state.action !== "remove") {
				unwritten.add(alias)
			}
			continue
		}

		applied.push({ action: state.action, alias })
		if (state.action === "remove") {
			pruned.push(alias)
		} else {
			links.set(alias, { ...state, action: "none" })
		}
	}

	for (const alias of pruned) {
		records.delete(alias)
		links.delete(alias)
	}

	const persisted = persistableRecords(records, table.persisted, unwritten)
	const saved = await saveConfig(table.layout, persisted)
	if (!saved.ok) {
		return saved
	}

	return {
		ok: true,
		value: {
			applied,
			failures,
			saved: true,
			table: { ...table, dirty: failures.length > 0, links, persisted, records },
		},
	}
}

function persistableRecords(
	records: ReadonlyMap<Alias, AliasRecord>,
	previous: ReadonlyMap<Alias, AliasRecord>,
	unwritten: ReadonlySet<Alias>,
): Map<Alias, AliasRecord> {
	const persistable = new Map<Alias, AliasRecord>()
	for (const [alias, record] of records) {
		if (!unwritten.has(alias)) {
			persistable.set(alias, record)
			continue
		}

		const last = previous.get(alias)
		if (last) {
			persistable.set(alias, last)
		}
	}
	return persistable
}
