#!/usr/bin/env node

import { Command, Option } from "commander"
import { consola } from "consola"
import { add } from "@/commands/add"
import { display } from "@/commands/display"
import { configureLogging, type VerbosityOptions } from "@/commands/logging"
import { refresh } from "@/commands/refresh"
import { remove } from "@/commands/remove"
import { formatError } from "@/utils/errors"
import pkg from "./package.json" with { type: "json" }

function increaseVerbosity(_value: string, previous: number): number {
	return previous + 1
}

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("cmdlink")
		.description("Turn short aliases into executable command shims")
		.version(pkg.version, "-V, --version", "Output the version number")
		.option("-v, --verbose", "Increase log output (repeatable)", increaseVerbosity, 0)
		.addOption(
			new Option("-q, --quiet", "Only print errors").conflicts("verbose"),
		)
		.showHelpAfterError()
		.showSuggestionAfterError()
		.hook("preAction", (command) => {
			configureLogging(command.opts<VerbosityOptions>())
		})

	program
		.command("add")
		.description("Add an alias, or overwrite one with --force")
		.argument("<alias>", "Alias name")
		.requiredOption("-c, --cmd <cmd>", "Command the alias runs")
		.option("-d, --desc <description>", "Description shown by display")
		.option("-f, --force", "Overwrite an existing alias")
		.option("--non-interactive", "Run without prompts")
		.action(
			async (
				alias: string,
				options: {
					cmd: string
					desc?: string
					force?: boolean
					nonInteractive?: boolean
				},
			) => {
				await add(alias, {
					cmd: options.cmd,
					description: options.desc,
					force: Boolean(options.force),
					nonInteractive: Boolean(options.nonInteractive),
				})
			},
		)

	program
		.command("remove")
		.alias("rm")
		.description("Remove an alias and its link")
		.argument("<alias>", "Alias name")
		.action(async (alias: string) => {
			await remove(alias, {})
		})

	program
		.command("refresh")
		.description("Recreate missing links")
		.option("--rewrite", "Also rewrite links whose contents are out of date")
		.action(async (options: { rewrite?: boolean }) => {
			await refresh({ rewrite: Boolean(options.rewrite) })
		})

	program
		.command("display")
		.alias("list")
		.description("List aliases")
		.action(async () => {
			await display({})
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
	consola.error(`fatal error occurred: ${formatError(error)}`)
	consola.debug(error)
	process.exitCode = 1
})
