import { table } from "table"
import type { AliasRow, AliasTable } from "@/aliases/types"

/**
 * Rows for display, sorted by alias. The description falls back to the
 * command. Aliases pending removal are left out.
 */
export function listAliases(aliasTable: AliasTable): AliasRow[] {
	const rows: AliasRow[] = []
	for (const [alias, record] of aliasTable.records) {
		if (aliasTable.links.get(alias)?.action === "remove") {
			continue
		}

		rows.push({ alias, description: record.description ?? record.cmd })
	}

	return rows.sort((a, b) => (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0))
}

export function renderAliasTable(rows: AliasRow[]): string {
	return table([["Alias", "Description"], ...rows.map((row) => [row.alias, row.description])])
}
