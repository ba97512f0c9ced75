import { consola, type LogLevel, LogLevels } from "consola"

export type VerbosityOptions = {
	/** Number of times -v was given */
	verbose?: number
	quiet?: boolean
}

export function resolveLogLevel(options: VerbosityOptions): LogLevel {
	if (options.quiet) {
		return LogLevels.error
	}

	const verbose = options.verbose ?? 0
	if (verbose >= 3) {
		return LogLevels.trace
	}
	if (verbose === 2) {
		return LogLevels.debug
	}
	return LogLevels.info
}

export function configureLogging(options: VerbosityOptions): void {
	consola.level = resolveLogLevel(options)
}
