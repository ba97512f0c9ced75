import path from "node:path"
import {
	type AbsolutePath,
	type Alias,
	type NonEmptyString,
	type Result,
	renderShim,
	shimFileName,
} from "@cmdlink/core"
import { pathExists, readTextFile, removeFile, setMode, writeTextFile } from "@/io/fs"
import type { IoError, IoResult } from "@/io/types"
import type { Link, PendingAction } from "@/link/types"
import type { ProjectLayout } from "@/project/layout"
import type { LinkError } from "@/types/errors"

const EXECUTABLE_MODE = 0o755

export function resolveLink(layout: ProjectLayout, alias: Alias, cmd: NonEmptyString): Link {
	return {
		alias,
		cmd,
		contents: renderShim(cmd, layout.platform),
		path: path.join(layout.binsDir, shimFileName(alias, layout.platform)) as AbsolutePath,
		platform: layout.platform,
	}
}

/**
 * Check the filesystem for the shim. Never cached: every call stats the file.
 */
export async function linkExists(link: Link): Promise<boolean> {
	return pathExists(link.path)
}

/**
 * Whether the shim on disk differs from what the link would write.
 * A missing or unreadable shim counts as stale.
 */
export async function linkIsStale(link: Link): Promise<boolean> {
	const contents = await readTextFile(link.path)
	return !contents.ok || contents.value !== link.contents
}

export async function performLinkAction(
	link: Link,
	action: PendingAction,
): Promise<Result<void, LinkError>> {
	switch (action) {
		case "create":
			return createLink(link)
		case "update":
			return updateLink(link)
		case "remove":
			return removeLink(link)
		case "none":
			return { ok: true, value: undefined }
	}
}

async function createLink(link: Link): Promise<Result<void, LinkError>> {
	const written = await writeTextFile(link.path, link.contents, {
		exclusive: true,
		mode: EXECUTABLE_MODE,
	})
	if (!written.ok) {
		if (written.error.code === "EEXIST") {
			return {
				error: {
					alias: link.alias,
					cause: written.error,
					message: `Link for alias '${link.alias}' already exists at ${link.path}.`,
					path: link.path,
					type: "link_already_exists",
				},
				ok: false,
			}
		}

		return linkFailure("link_creation", "create", link, written.error)
	}

	const executable = await makeExecutable(link)
	if (!executable.ok) {
		return linkFailure("link_creation", "create", link, executable.error)
	}

	return { ok: true, value: undefined }
}

async function updateLink(link: Link): Promise<Result<void, LinkError>> {
	const written = await writeTextFile(link.path, link.contents, { mode: EXECUTABLE_MODE })
	if (!written.ok) {
		return linkFailure("link_update", "update", link, written.error)
	}

	const executable = await makeExecutable(link)
	if (!executable.ok) {
		return linkFailure("link_update", "update", link, executable.error)
	}

	return { ok: true, value: undefined }
}

// A shim that is already gone satisfies the removal.
async function removeLink(link: Link): Promise<Result<void, LinkError>> {
	const removed = await removeFile(link.path)
	if (!removed.ok) {
		return linkFailure("link_removal", "remove", link, removed.error)
	}

	return { ok: true, value: undefined }
}

// The mode passed to writeFile only applies to new files and is masked by umask.
async function makeExecutable(link: Link): Promise<IoResult<void>> {
	if (link.platform !== "posix") {
		return { ok: true, value: undefined }
	}

	return setMode(link.path, EXECUTABLE_MODE)
}

function linkFailure(
	type: "link_creation" | "link_update" | "link_removal",
	verb: string,
	link: Link,
	cause: IoError,
): Result<never, LinkError> {
	return {
		error: {
			alias: link.alias,
			cause,
			message: `Failed to ${verb} link for alias '${link.alias}': ${cause.message}`,
			path: link.path,
			type,
		},
		ok: false,
	}
}
