// Wires the services together over one database connection

import type { Db } from './db/db'
import { BatchAnalyzer } from './services/batch-analyzer'
import { SqliteCatalog } from './services/catalog'
import { ExclusionStore } from './services/exclusion-store'
import { SqliteQuantityCache } from './services/input-quantity-cache'
import { InputQuantityResolver } from './services/input-quantity-resolver'
import { ManufacturingAnalyzer } from './services/manufacturing-analyzer'
import { MarketSnapshot } from './services/market-snapshot'
import { ReprocessingCalculator } from './services/reprocessing-calculator'

export interface Engine {
	catalog: SqliteCatalog
	resolver: InputQuantityResolver
	calculator: ReprocessingCalculator
	exclusions: ExclusionStore
	manufacturing: ManufacturingAnalyzer
	/** Loads the market snapshot, then builds an analyzer that never queries per item */
	createBatchAnalyzer(): BatchAnalyzer
}

export function createEngine(db: Db): Engine {
	const catalog = new SqliteCatalog(db)
	const cache = new SqliteQuantityCache(db)
	const resolver = new InputQuantityResolver(catalog, cache)
	const exclusions = new ExclusionStore(db)

	return {
		catalog,
		resolver,
		calculator: new ReprocessingCalculator(catalog, resolver),
		exclusions,
		manufacturing: new ManufacturingAnalyzer(db),
		createBatchAnalyzer() {
			const snapshot = MarketSnapshot.fromDatabase(db)
			const snapshotResolver = new InputQuantityResolver(snapshot, cache)
			return new BatchAnalyzer(snapshot, new ReprocessingCalculator(snapshot, snapshotResolver), exclusions)
		},
	}
}
