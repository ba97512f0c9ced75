import type { AbsolutePath, Alias, Result } from "@cmdlink/core"
import { stringify } from "smol-toml"
import type { AliasRecord } from "@/aliases/types"
import type { ConfigSerializeError } from "@/types/errors"

/**
 * Serialize alias records to config.toml contents. Only `description`
 * and `cmd` are written per alias.
 */
export function serializeConfig(
	records: ReadonlyMap<Alias, AliasRecord>,
	configPath: AbsolutePath,
): Result<string, ConfigSerializeError> {
	// Assigning "__proto__" on a plain object sets its prototype; fromEntries defines an own key.
	const aliases = Object.fromEntries(
		[...records].map(([alias, record]) => [
			alias,
			record.description
				? { description: record.description, cmd: record.cmd }
				: { cmd: record.cmd },
		]),
	)

	try {
		const toml = stringify({ aliases })
		return { ok: true, value: toml.endsWith("\n") ? toml : `${toml}\n` }
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error)
		return {
			error: {
				message: `Failed to serialize config data: ${detail}`,
				path: configPath,
				rawError: error instanceof Error ? error : undefined,
				type: "config_serialize",
			},
			ok: false,
		}
	}
}
