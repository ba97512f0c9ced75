import { homedir } from "node:os"
import path from "node:path"
import {
	type AbsolutePath,
	BINS_DIRNAME,
	CONFIG_FILENAME,
	detectPlatform,
	type Platform,
	PROJECT_DIRNAME,
	type Result,
} from "@cmdlink/core"
import { ensureDir } from "@/io/fs"
import type { ProjectDirCreationError } from "@/types/errors"

export interface ProjectLayout {
	readonly rootDir: AbsolutePath
	readonly binsDir: AbsolutePath
	readonly configPath: AbsolutePath
	readonly platform: Platform
}

export interface LayoutOptions {
	/** Project directory; defaults to ~/.cmdlink */
	projectDir?: string
	homeDir?: string
	platform?: Platform
}

export function resolveProjectLayout(options: LayoutOptions = {}): ProjectLayout {
	const rootDir = path.resolve(
		options.projectDir ?? path.join(options.homeDir ?? homedir(), PROJECT_DIRNAME),
	) as AbsolutePath

	return {
		binsDir: path.join(rootDir, BINS_DIRNAME) as AbsolutePath,
		configPath: path.join(rootDir, CONFIG_FILENAME) as AbsolutePath,
		platform: options.platform ?? detectPlatform(),
		rootDir,
	}
}

/**
 * Create the project directory and its bins directory when missing.
 */
export async function ensureProjectLayout(
	layout: ProjectLayout,
): Promise<Result<void, ProjectDirCreationError>> {
	for (const dir of [layout.rootDir, layout.binsDir]) {
		const ensured = await ensureDir(dir)
		if (!ensured.ok) {
			return {
				error: {
					cause: ensured.error,
					message: `Failed to create project directory: ${ensured.error.message}`,
					path: dir,
					type: "project_dir_creation",
				},
				ok: false,
			}
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Whether the bins directory is one of the entries of a PATH-style value.
 */
export function isOnSearchPath(
	layout: ProjectLayout,
	searchPath: string | undefined,
): boolean {
	if (!searchPath) {
		return false
	}

	const separator = layout.platform === "windows" ? ";" : ":"
	const target = normalizeEntry(layout.binsDir, layout.platform)
	return searchPath
		.split(separator)
		.filter((entry) => entry.trim().length > 0)
		.some((entry) => normalizeEntry(entry, layout.platform) === target)
}

function normalizeEntry(entry: string, platform: Platform): string {
	const trimmed = entry.trim().replace(/[/\\]+$/, "")
	return platform === "windows" ? trimmed.toLowerCase() : trimmed
}
