/**
 * Shim rendering.
 *
 * A shim is the small script placed in the bins directory under the alias
 * name. Its file name depends only on the alias and platform; its contents
 * depend only on the command and platform.
 */

export type Platform = "posix" | "windows"

export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
	return nodePlatform === "win32" ? "windows" : "posix"
}

export function shimExtension(platform: Platform): string {
	return platform === "windows" ? ".bat" : ".sh"
}

export function shimFileName(alias: string, platform: Platform): string {
	return `${alias}${shimExtension(platform)}`
}

/**
 * Render the shim body for a command. Arguments given to the shim are
 * forwarded verbatim: `"$@"` on POSIX, `%*` on Windows.
 */
export function renderShim(cmd: string, platform: Platform): string {
	switch (platform) {
		case "windows":
			return `@echo off\necho.\n${cmd} %*`
		case "posix":
			return `#!/bin/sh\nexec ${cmd} "$@"`
	}
}
