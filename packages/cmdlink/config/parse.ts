import type { AbsolutePath, Alias, NonEmptyString, Result } from "@cmdlink/core"
import { coerceAlias, coerceNonEmpty } from "@cmdlink/core"
import { parse, TomlError } from "smol-toml"
import type { ZodError } from "zod"
import type { AliasRecord } from "@/aliases/types"
import { configFileSchema } from "@/config/schema"
import type { ConfigParseError } from "@/types/errors"

export type ConfigParseResult = Result<ReadonlyMap<Alias, AliasRecord>, ConfigParseError>

/**
 * Parse config.toml contents into alias records, in file order.
 */
export function parseConfig(contents: string, configPath: AbsolutePath): ConfigParseResult {
	let data: unknown

	try {
		data = parse(contents)
	} catch (error) {
		const detail =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return failure(detail, configPath, {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	const parsed = configFileSchema.safeParse(data)
	if (!parsed.success) {
		return failure(formatZodError(parsed.error), configPath, {
			zodError: parsed.error,
		})
	}

	const records = new Map<Alias, AliasRecord>()
	for (const [key, entry] of Object.entries(parsed.data.aliases ?? {})) {
		const alias = coerceAlias(key)
		if (!alias || alias !== key) {
			return failure(`Invalid alias name "${key}".`, configPath, { key })
		}

		const cmd = coerceNonEmpty(entry.cmd)
		if (!cmd) {
			return failure(`aliases.${key}.cmd: cmd must not be empty.`, configPath, { key })
		}

		records.set(alias, buildRecord(alias, cmd, entry.description))
	}

	return { ok: true, value: records }
}

function buildRecord(
	alias: Alias,
	cmd: NonEmptyString,
	description: string | undefined,
): AliasRecord {
	return description ? { alias, cmd, description } : { alias, cmd }
}

function formatZodError(error: ZodError): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "config"
		return `${path}: ${issue.message}`
	})
	return `Invalid config: ${issues.join("; ")}`
}

function failure(
	detail: string,
	configPath: AbsolutePath,
	extra: Pick<ConfigParseError, "key" | "rawError" | "zodError"> = {},
): ConfigParseResult {
	return {
		error: {
			...extra,
			message: `Failed to parse config file: ${detail}`,
			path: configPath,
			type: "config_parse",
		},
		ok: false,
	}
}
