import { mkdir, readFile, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import "@/tests/helpers/assertions"
import { applyAndSave, loadAliasTable, refreshAliases } from "@/aliases/table"
import { createAlias, removeAlias } from "@/aliases/transform"
import type { AliasTable } from "@/aliases/types"
import { parseConfig } from "@/config/parse"
import type { ProjectLayout } from "@/project/layout"
import { alias, nes } from "@/tests/helpers/branded"
import { exists, readText, withTempDir } from "@/tests/helpers/fs"
import { actionsOf, shimPath, testLayout, writeRawConfig } from "@/tests/helpers/layout"

async function load(layout: ProjectLayout): Promise<AliasTable> {
	const loaded = await loadAliasTable(layout)
	if (!loaded.ok) {
		throw new Error(loaded.error.message)
	}
	return loaded.value.table
}

async function save(table: AliasTable): Promise<AliasTable> {
	const applied = await applyAndSave(table)
	if (!applied.ok) {
		throw new Error(applied.error.message)
	}
	return applied.value.table
}

function add(table: AliasTable, name: string, cmd: string, force = false): AliasTable {
	const created = createAlias(table, { alias: alias(name), cmd: nes(cmd), force })
	if (!created.ok) {
		throw new Error(created.error.message)
	}
	return created.value
}

async function savedRecords(layout: ProjectLayout) {
	const parsed = parseConfig(await readText(layout.configPath), layout.configPath)
	if (!parsed.ok) {
		throw new Error(parsed.error.message)
	}
	return parsed.value
}

describe("loadAliasTable", () => {
	it("bootstraps the project directory and an empty config", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)

			const result = await loadAliasTable(layout)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.created).toBe(true)
				expect(result.value.table.records.size).toBe(0)
				expect(result.value.table.dirty).toBe(false)
				expect(result.value.warnings).toEqual([])
			}
			expect(await exists(layout.binsDir)).toBe(true)
			expect((await savedRecords(layout)).size).toBe(0)
		})
	})

	it("warns about missing shims without scheduling anything", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await writeRawConfig(layout, '[aliases.t]\ncmd = "cargo test"\n')

			const result = await loadAliasTable(layout)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.created).toBe(false)
				expect(result.value.warnings).toEqual([
					`Link for alias "t" is missing (${shimPath(layout, "t")}). Run \`cmdlink refresh\` to recreate it.`,
				])
				expect(actionsOf(result.value.table)).toEqual({ t: "none" })
				expect(result.value.table.dirty).toBe(false)
			}
		})
	})

	it("surfaces config parse errors", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await writeRawConfig(layout, "[aliases\n")

			const result = await loadAliasTable(layout)

			expect(result).toBeErrOfType("config_parse")
		})
	})

	it("surfaces project directory failures", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await writeFile(layout.rootDir, "occupied")

			expect(await loadAliasTable(layout)).toBeErrOfType("project_dir_creation")
		})
	})
})

describe("applyAndSave", () => {
	it("does nothing for a clean table", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const table = await load(layout)
			await rm(layout.configPath)

			const result = await applyAndSave(table)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.saved).toBe(false)
				expect(result.value.table).toBe(table)
			}
			expect(await exists(layout.configPath)).toBe(false)
		})
	})

	it("writes shims, resets actions and persists records", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const table = add(add(await load(layout), "build", "cargo build"), "t", "cargo test")

			const result = await applyAndSave(table)

			expect(result).toBeOk()
			if (!result.ok) {
				return
			}
			expect(result.value.applied).toEqual([
				{ action: "create", alias: "build" },
				{ action: "create", alias: "t" },
			])
			expect(result.value.failures).toEqual([])
			expect(result.value.table.dirty).toBe(false)
			expect(actionsOf(result.value.table)).toEqual({ build: "none", t: "none" })
			expect(await readText(shimPath(layout, "t"))).toBe('#!/bin/sh\nexec cargo test "$@"')
			expect([...(await savedRecords(layout)).keys()]).toEqual(["build", "t"])
		})
	})

	it("prunes removed aliases after deleting their shims", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const saved = await save(add(add(await load(layout), "build", "cargo build"), "t", "cargo test"))

			const { table } = removeAlias(saved, alias("t"))
			const after = await save(table)

			expect(after.records.has(alias("t"))).toBe(false)
			expect(after.links.has(alias("t"))).toBe(false)
			expect(await exists(shimPath(layout, "t"))).toBe(false)
			expect([...(await savedRecords(layout)).keys()]).toEqual(["build"])
		})
	})

	it("treats an already-missing shim as removed", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const saved = await save(add(await load(layout), "t", "cargo test"))
			await rm(shimPath(layout, "t"))

			const result = await applyAndSave(removeAlias(saved, alias("t")).table)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.failures).toEqual([])
				expect(result.value.table.records.size).toBe(0)
			}
		})
	})

	it("surfaces a create conflict and keeps the create pending", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const table = add(await load(layout), "build", "cargo build")
			await writeFile(shimPath(layout, "build"), "external")

			const result = await applyAndSave(table)

			expect(result).toBeOk()
			if (!result.ok) {
				return
			}
			expect(result.value.failures.map((failure) => failure.type)).toEqual([
				"link_already_exists",
			])
			expect(result.value.table.dirty).toBe(true)
			expect(actionsOf(result.value.table)).toEqual({ build: "create" })
			expect(await readFile(shimPath(layout, "build"), "utf8")).toBe("external")
			expect((await savedRecords(layout)).size).toBe(0)
		})
	})

	it("keeps the last saved record when an update fails", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await writeRawConfig(layout, '[aliases.b]\ncmd = "make"\n')
			// A directory where the shim belongs makes the write fail.
			await mkdir(join(shimPath(layout, "b"), "nested"), { recursive: true })
			const table = add(await load(layout), "b", "cargo build", true)

			const result = await applyAndSave(table)

			expect(result).toBeOk()
			if (!result.ok) {
				return
			}
			expect(result.value.failures.map((failure) => failure.type)).toEqual(["link_update"])
			expect(result.value.table.records.get(alias("b"))?.cmd).toBe("cargo build")
			expect(actionsOf(result.value.table)).toEqual({ b: "update" })
			expect([...(await savedRecords(layout)).values()]).toEqual([
				{ alias: "b", cmd: "make" },
			])
		})
	})

	it("keeps applying other aliases when one fails", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const table = add(add(await load(layout), "build", "cargo build"), "t", "cargo test")
			await writeFile(shimPath(layout, "build"), "external")

			const result = await applyAndSave(table)

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.applied).toEqual([{ action: "create", alias: "t" }])
				expect(actionsOf(result.value.table)).toEqual({ build: "create", t: "none" })
			}
			expect(await exists(shimPath(layout, "t"))).toBe(true)
		})
	})

	it("fails with config_write when the config cannot be written", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			const table = add(await load(layout), "t", "cargo test")
			await rm(layout.configPath)
			// A directory in place of the config file makes the write fail.
			await mkdir(layout.configPath)

			const result = await applyAndSave(table)

			expect(result).toBeErrOfType("config_write")
		})
	})
})

describe("refreshAliases", () => {
	it("schedules create for a shim deleted out of band and regenerates it", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await save(add(await load(layout), "t", "cargo test"))
			const original = await readText(shimPath(layout, "t"))
			await rm(shimPath(layout, "t"))

			const { scheduled, table } = await refreshAliases(await load(layout))

			expect(scheduled).toEqual([{ action: "create", alias: "t" }])
			expect(table.dirty).toBe(true)
			await save(table)
			expect(await readText(shimPath(layout, "t"))).toBe(original)
		})
	})

	it("is idempotent when nothing changes between calls", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await save(add(add(await load(layout), "build", "cargo build"), "t", "cargo test"))
			await rm(shimPath(layout, "t"))
			const table = await load(layout)

			const first = await refreshAliases(table)
			const second = await refreshAliases(table)

			expect(actionsOf(second.table)).toEqual(actionsOf(first.table))
			expect(actionsOf(first.table)).toEqual({ build: "none", t: "create" })

			const again = await refreshAliases(first.table)
			expect(again.scheduled).toEqual([])
			expect(actionsOf(again.table)).toEqual(actionsOf(first.table))
		})
	})

	it("leaves a clean table untouched when every shim exists", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await save(add(await load(layout), "t", "cargo test"))
			const table = await load(layout)

			const result = await refreshAliases(table)

			expect(result.scheduled).toEqual([])
			expect(result.table).toBe(table)
			expect(result.table.dirty).toBe(false)
		})
	})

	it("never clobbers a pending remove or update", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await save(add(add(await load(layout), "build", "cargo build"), "t", "cargo test"))
			await rm(shimPath(layout, "build"))
			await rm(shimPath(layout, "t"))

			let table = await load(layout)
			table = removeAlias(table, alias("build")).table
			table = add(table, "t", "cargo nextest run", true)

			const { scheduled, table: refreshed } = await refreshAliases(table)

			expect(scheduled).toEqual([])
			expect(actionsOf(refreshed)).toEqual({ build: "remove", t: "update" })
		})
	})

	it("rewrites stale shims only when asked", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await save(add(await load(layout), "t", "cargo test"))
			await writeFile(shimPath(layout, "t"), "#!/bin/sh\nexec make test")
			const table = await load(layout)

			expect((await refreshAliases(table)).scheduled).toEqual([])

			const rewritten = await refreshAliases(table, { rewrite: true })
			expect(rewritten.scheduled).toEqual([{ action: "update", alias: "t" }])
			await save(rewritten.table)
			expect(await readText(shimPath(layout, "t"))).toBe('#!/bin/sh\nexec cargo test "$@"')
		})
	})
})

describe("round trip", () => {
	it("reloads exactly what was saved, with no pending actions", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			let table = await load(layout)
			table = add(table, "build", "cargo build")
			const described = createAlias(table, {
				alias: alias("t"),
				cmd: nes("cargo test"),
				description: "Run tests",
				force: false,
			})
			expect(described).toBeOk()
			if (!described.ok) {
				return
			}
			const saved = await save(described.value)

			const reloaded = await load(layout)

			expect([...reloaded.records.values()]).toEqual([...saved.records.values()])
			expect(actionsOf(reloaded)).toEqual({ build: "none", t: "none" })
			expect(reloaded.dirty).toBe(false)
		})
	})

	it("writes windows shims with batch contents", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir, "windows")
			await save(add(await load(layout), "build", "cargo build"))

			expect(await readText(shimPath(layout, "build"))).toBe(
				"@echo off\necho.\ncargo build %*",
			)
		})
	})
})
