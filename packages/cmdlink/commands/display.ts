import { listAliases, renderAliasTable } from "@/aliases/display"
import type { AliasRow } from "@/aliases/types"
import { openAliasTable, type SessionOptions } from "@/commands/session"
import { CommandResult, printOutcome } from "@/commands/types"

export async function display(options: SessionOptions): Promise<void> {
	const result = await runDisplay(options)
	if (result.status !== "completed") {
		printOutcome(result)
		return
	}

	if (result.value.length === 0) {
		console.log("No aliases defined.")
		return
	}

	console.log(renderAliasTable(result.value).trimEnd())
}

export async function runDisplay(
	options: SessionOptions,
): Promise<CommandResult<AliasRow[]>> {
	const opened = await openAliasTable(options)
	if (opened.status !== "completed") {
		return opened
	}

	return CommandResult.completed(listAliases(opened.value))
}
