import { consola } from "consola"
import { type ApplySummary, applyAndSave, loadAliasTable } from "@/aliases/table"
import type { AliasTable, PendingAction } from "@/aliases/types"
import { CommandResult } from "@/commands/types"
import { CMDLINK_HOME } from "@/env"
import { isOnSearchPath, type ProjectLayout, resolveProjectLayout } from "@/project/layout"

const ACTION_LABELS: Record<PendingAction, string> = {
	create: "Created",
	none: "Kept",
	remove: "Removed",
	update: "Updated",
}

export interface SessionOptions {
	/** Overrides the layout resolved from CMDLINK_HOME or the home directory */
	layout?: ProjectLayout
	/** PATH value checked for the bins directory; defaults to process.env.PATH */
	searchPath?: string
}

export function sessionLayout(options: SessionOptions): ProjectLayout {
	return options.layout ?? resolveProjectLayout({ projectDir: CMDLINK_HOME })
}

export async function openAliasTable(
	options: SessionOptions,
	{ warnMissingLinks = true }: { warnMissingLinks?: boolean } = {},
): Promise<CommandResult<AliasTable>> {
	const layout = sessionLayout(options)
	consola.debug(`Project directory: ${layout.rootDir}`)

	const loaded = await loadAliasTable(layout)
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	if (loaded.value.created) {
		consola.info(`Created config file: ${layout.configPath}.`)
	}
	for (const warning of loaded.value.warnings) {
		if (warnMissingLinks) {
			consola.warn(warning)
		} else {
			consola.debug(warning)
		}
	}

	return CommandResult.completed(loaded.value.table)
}

/**
 * Apply pending link actions and persist the table. Link failures are
 * logged; the first one becomes the command's failure.
 */
export async function commitAliasTable(
	table: AliasTable,
	options: SessionOptions,
): Promise<CommandResult<ApplySummary>> {
	const result = await applyAndSave(table)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const summary = result.value
	if (!summary.saved) {
		return CommandResult.unchanged("No changes to apply.")
	}

	for (const { action, alias } of summary.applied) {
		const link = table.links.get(alias)?.link
		const location = link ? ` (${link.path})` : ""
		consola.success(`${ACTION_LABELS[action]} link for "${alias}"${location}.`)
	}
	consola.debug(`Config saved: ${table.layout.configPath}`)

	warnIfNotOnSearchPath(table.layout, options.searchPath ?? process.env.PATH)

	const [firstFailure, ...otherFailures] = summary.failures
	if (firstFailure) {
		for (const failure of otherFailures) {
			consola.error(failure.message)
		}
		return CommandResult.failed(firstFailure)
	}

	return CommandResult.completed(summary)
}

export function warnIfNotOnSearchPath(
	layout: ProjectLayout,
	searchPath: string | undefined,
): void {
	if (isOnSearchPath(layout, searchPath)) {
		return
	}

	consola.warn(
		`${layout.binsDir} is not on your PATH. Add it to run aliases by name.`,
	)
}

