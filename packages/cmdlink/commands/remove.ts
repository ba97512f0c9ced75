import { coerceAliasWithError } from "@cmdlink/core"
import { consola } from "consola"
import type { ApplySummary } from "@/aliases/table"
import { removeAlias } from "@/aliases/transform"
import { commitAliasTable, openAliasTable, type SessionOptions } from "@/commands/session"
import { CommandResult, printOutcome } from "@/commands/types"
import { coercionFailure } from "@/utils/errors"

export async function remove(alias: string, options: SessionOptions): Promise<void> {
	printOutcome(await runRemove(alias, options))
}

export async function runRemove(
	aliasInput: string,
	options: SessionOptions,
): Promise<CommandResult<ApplySummary>> {
	const alias = coerceAliasWithError(aliasInput, "alias")
	if (!alias.ok) {
		return CommandResult.failed(coercionFailure(alias.error))
	}

	const opened = await openAliasTable(options)
	if (opened.status !== "completed") {
		return opened
	}

	const { removed, table } = removeAlias(opened.value, alias.value)
	if (!removed) {
		consola.warn(`Alias "${alias.value}" not found.`)
	} else {
		consola.start(`Removing alias "${alias.value}"`)
	}

	return await commitAliasTable(table, options)
}
