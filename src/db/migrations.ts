import type Database from 'better-sqlite3'

export interface YieldNormalizationResult {
	normalized: boolean
	rowsUpdated: number
}

/**
 * Older databases stored reprocessing outputs per portion together with a
 * `batch_size` column. Quantities are divided by the batch size and the column
 * is dropped, leaving per-unit yields. No-op on the current schema.
 */
export function normalizeYieldQuantities(db: Database.Database): YieldNormalizationResult {
	const columns = db.prepare<[], { name: string }>('PRAGMA table_info(reprocessing_outputs)').all()
	const hasBatchSize = columns.some((col) => col.name === 'batch_size')
	if (!hasBatchSize) {
		return { normalized: false, rowsUpdated: 0 }
	}

	const run = db.transaction(() => {
		const update = db
			.prepare(
				`UPDATE reprocessing_outputs
				SET quantity = CAST(quantity AS REAL) / batch_size
				WHERE batch_size IS NOT NULL AND batch_size > 1`
			)
			.run()
		db.exec('ALTER TABLE reprocessing_outputs DROP COLUMN batch_size')
		return update.changes
	})

	return { normalized: true, rowsUpdated: run() }
}
