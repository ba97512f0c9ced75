import { rm, writeFile } from "node:fs/promises"
import { consola, LogLevels } from "consola"
import { beforeAll, describe, expect, it } from "vitest"
import { runAdd } from "@/commands/add"
import { runRefresh } from "@/commands/refresh"
import { readText, withTempDir } from "@/tests/helpers/fs"
import { shimPath, testLayout } from "@/tests/helpers/layout"

beforeAll(() => {
	consola.level = LogLevels.silent
})

describe("runRefresh", () => {
	it("recreates shims deleted out of band", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await runAdd("t", { cmd: "cargo test", force: false, layout, nonInteractive: true })
			await rm(shimPath(layout, "t"))

			const result = await runRefresh({ layout, rewrite: false, searchPath: "" })

			expect(result.status).toBe("completed")
			if (result.status === "completed") {
				expect(result.value.applied).toEqual([{ action: "create", alias: "t" }])
			}
			expect(await readText(shimPath(layout, "t"))).toBe('#!/bin/sh\nexec cargo test "$@"')
		})
	})

	it("reports when everything is up to date", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await runAdd("t", { cmd: "cargo test", force: false, layout, nonInteractive: true })

			const result = await runRefresh({ layout, rewrite: false, searchPath: "" })

			expect(result).toEqual({ reason: "All links are up to date.", status: "unchanged" })
		})
	})

	it("rewrites stale shims with --rewrite", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await runAdd("t", { cmd: "cargo test", force: false, layout, nonInteractive: true })
			await writeFile(shimPath(layout, "t"), "#!/bin/sh\nexec make test")

			const result = await runRefresh({ layout, rewrite: true, searchPath: "" })

			expect(result.status).toBe("completed")
			expect(await readText(shimPath(layout, "t"))).toBe('#!/bin/sh\nexec cargo test "$@"')
		})
	})
})
