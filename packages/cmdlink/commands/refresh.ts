import { consola } from "consola"
import { type ApplySummary, refreshAliases } from "@/aliases/table"
import { commitAliasTable, openAliasTable, type SessionOptions } from "@/commands/session"
import { CommandResult, printOutcome } from "@/commands/types"

export interface RefreshCommandOptions extends SessionOptions {
	rewrite: boolean
}

export async function refresh(options: RefreshCommandOptions): Promise<void> {
	printOutcome(await runRefresh(options))
}

export async function runRefresh(
	options: RefreshCommandOptions,
): Promise<CommandResult<ApplySummary>> {
	// Missing links are what refresh repairs, so they are not warned about here.
	const opened = await openAliasTable(options, { warnMissingLinks: false })
	if (opened.status !== "completed") {
		return opened
	}

	consola.start("Checking links...")
	const { scheduled, table } = await refreshAliases(opened.value, {
		rewrite: options.rewrite,
	})
	if (scheduled.length === 0) {
		return CommandResult.unchanged("All links are up to date.")
	}

	for (const { action, alias } of scheduled) {
		consola.debug(`Scheduled ${action} for "${alias}".`)
	}

	return await commitAliasTable(table, options)
}
