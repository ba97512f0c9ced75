import { HOME_ENV_VAR } from "@cmdlink/core"

export const CMDLINK_HOME = normalizeHome(process.env[HOME_ENV_VAR])

function normalizeHome(value: string | undefined): string | undefined {
	const trimmed = value?.trim()
	return trimmed ? trimmed : undefined
}
