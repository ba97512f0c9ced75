/**
 * Zod schemas for validating config.toml files.
 */

import { z } from "zod"

const aliasEntrySchema = z
	.object({
		cmd: z
			.string()
			.transform((value) => value.trim())
			.refine((value) => value.length > 0, {
				message: "cmd must not be empty.",
			}),
		description: z
			.string()
			.transform((value) => value.trim())
			.optional(),
	})
	.strict()

export const configFileSchema = z
	.object({
		aliases: z.record(aliasEntrySchema).optional(),
	})
	.strict()
