import type { Alias, Result } from "@cmdlink/core"
import type { AliasRecord } from "@/aliases/types"
import { parseConfig } from "@/config/parse"
import { serializeConfig } from "@/config/write"
import { readTextFile, safeStat, writeTextFile } from "@/io/fs"
import type { ProjectLayout } from "@/project/layout"
import type { ConfigError } from "@/types/errors"

export interface ConfigLoadResult {
	/** True when no config existed and an empty one was written */
	created: boolean
	records: ReadonlyMap<Alias, AliasRecord>
}

/**
 * Read the alias config, writing an empty one first if none exists.
 */
export async function loadConfig(
	layout: ProjectLayout,
): Promise<Result<ConfigLoadResult, ConfigError>> {
	const { configPath } = layout
	const stats = await safeStat(configPath)
	if (!stats.ok) {
		return {
			error: {
				cause: stats.error,
				message: `Failed to read config file: ${stats.error.message}`,
				path: configPath,
				type: "config_read",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		const records = new Map<Alias, AliasRecord>()
		const saved = await saveConfig(layout, records)
		if (!saved.ok) {
			return saved
		}

		return { ok: true, value: { created: true, records } }
	}

	const contents = await readTextFile(configPath)
	if (!contents.ok) {
		return {
			error: {
				cause: contents.error,
				message: `Failed to read config file: ${contents.error.message}`,
				path: configPath,
				type: "config_read",
			},
			ok: false,
		}
	}

	const parsed = parseConfig(contents.value, configPath)
	if (!parsed.ok) {
		return parsed
	}

	return { ok: true, value: { created: false, records: parsed.value } }
}

export async function saveConfig(
	layout: ProjectLayout,
	records: ReadonlyMap<Alias, AliasRecord>,
): Promise<Result<void, ConfigError>> {
	const { configPath } = layout
	const serialized = serializeConfig(records, configPath)
	if (!serialized.ok) {
		return serialized
	}

	const written = await writeTextFile(configPath, serialized.value)
	if (!written.ok) {
		return {
			error: {
				cause: written.error,
				message: `Error writing config data: ${written.error.message}`,
				path: configPath,
				type: "config_write",
			},
			ok: false,
		}
	}

	return { ok: true, value: undefined }
}
