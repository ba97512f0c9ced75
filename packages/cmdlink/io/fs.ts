import { chmod, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@cmdlink/core"
import type { IoResult } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export interface WriteOptions {
	/** Fail with EEXIST instead of truncating an existing file */
	exclusive?: boolean
	mode?: number
}

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (errorCode(error) === "ENOENT") {
			return { ok: true, value: null }
		}

		return ioFailure(error, `Unable to access ${targetPath}.`, targetPath, "stat")
	}
}

export async function pathExists(targetPath: string): Promise<boolean> {
	const stats = await safeStat(targetPath)
	return stats.ok && stats.value !== null
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return {
			error: {
				message: `Expected directory at ${targetPath}.`,
				operation: "mkdir",
				path: toAbsolutePath(targetPath),
				type: "io",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(error, `Unable to create ${targetPath}.`, targetPath, "mkdir")
		}
	}

	return { ok: true, value: undefined }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(error, `Unable to read ${targetPath}.`, targetPath, "readFile")
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
	options: WriteOptions = {},
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, {
			encoding: "utf8",
			flag: options.exclusive ? "wx" : "w",
			mode: options.mode,
		})
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, `Unable to write ${targetPath}.`, targetPath, "writeFile")
	}
}

export async function setMode(targetPath: string, mode: number): Promise<IoResult<void>> {
	try {
		await chmod(targetPath, mode)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, `Unable to change mode of ${targetPath}.`, targetPath, "chmod")
	}
}

/**
 * Remove a single file. A file that is already gone is reported as
 * `removed: false` rather than as an error.
 */
export async function removeFile(
	targetPath: string,
): Promise<IoResult<{ removed: boolean }>> {
	try {
		await rm(targetPath)
		return { ok: true, value: { removed: true } }
	} catch (error) {
		if (errorCode(error) === "ENOENT") {
			return { ok: true, value: { removed: false } }
		}

		return ioFailure(error, `Unable to remove ${targetPath}.`, targetPath, "rm")
	}
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const code = (error as { code?: unknown }).code
		return typeof code === "string" ? code : undefined
	}

	return undefined
}

function ioFailure<T>(
	error: unknown,
	message: string,
	targetPath: string,
	operation: string,
): IoResult<T> {
	const detail = error instanceof Error ? ` ${error.message}` : ""
	return {
		error: {
			code: errorCode(error),
			message: `${message}${detail}`,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}

function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}
