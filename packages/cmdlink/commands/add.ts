import { confirm, isCancel } from "@clack/prompts"
import { coerceAliasWithError, coerceNonEmptyWithError } from "@cmdlink/core"
import { consola } from "consola"
import type { ApplySummary } from "@/aliases/table"
import { createAlias, hasAlias } from "@/aliases/transform"
import { commitAliasTable, openAliasTable, type SessionOptions } from "@/commands/session"
import { CommandResult, printOutcome } from "@/commands/types"
import { coercionFailure } from "@/utils/errors"

export interface AddOptions extends SessionOptions {
	cmd: string
	description?: string
	force: boolean
	nonInteractive: boolean
}

export async function add(alias: string, options: AddOptions): Promise<void> {
	printOutcome(await runAdd(alias, options))
}

export async function runAdd(
	aliasInput: string,
	options: AddOptions,
): Promise<CommandResult<ApplySummary>> {
	const alias = coerceAliasWithError(aliasInput, "alias")
	if (!alias.ok) {
		return CommandResult.failed(coercionFailure(alias.error))
	}

	const cmd = coerceNonEmptyWithError(options.cmd, "cmd")
	if (!cmd.ok) {
		return CommandResult.failed(coercionFailure(cmd.error))
	}

	const opened = await openAliasTable(options)
	if (opened.status !== "completed") {
		return opened
	}
	const table = opened.value

	let force = options.force
	if (!force && hasAlias(table, alias.value) && isInteractive(options)) {
		const overwrite = await confirm({
			initialValue: false,
			message: `Alias "${alias.value}" already exists. Overwrite it?`,
		})
		if (isCancel(overwrite) || !overwrite) {
			return CommandResult.cancelled()
		}
		force = true
	}

	const description = options.description?.trim()
	const created = createAlias(table, {
		alias: alias.value,
		cmd: cmd.value,
		description: description ? description : undefined,
		force,
	})
	if (!created.ok) {
		return CommandResult.failed(created.error)
	}

	consola.start(`Adding alias "${alias.value}": ${cmd.value}`)
	return await commitAliasTable(created.value, options)
}

function isInteractive(options: AddOptions): boolean {
	return !options.nonInteractive && Boolean(process.stdin.isTTY)
}
