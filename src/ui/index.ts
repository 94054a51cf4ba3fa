/**
 * UI Module Index
 *
 * Re-exports all UI utilities
 */

export {
	renderTable,
	formatIsk,
	formatIskShort,
	formatPercent,
	type Column,
	type TableOptions,
} from './table'
