import { defineConfig } from "tsup"

export default defineConfig({
	clean: true,
	entry: ["cli.ts"],
	format: ["esm"],
	noExternal: ["@cmdlink/core"],
	platform: "node",
	target: "node20",
})
