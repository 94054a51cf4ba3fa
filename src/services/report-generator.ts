// Report Generation Service

import * as fs from 'fs'
import * as path from 'path'
import type { AnalysisRow, AnalysisSummary, ReprocessingValuation } from '../types'
import { formatIsk, formatIskShort, formatPercent, renderTable, type Column } from '../ui'
import type { ManufacturingResult } from './manufacturing-analyzer'

const MODULE_MODE_LABELS = {
	buyOrder: 'Buy order (buy max + fees)',
	instantBuy: 'Instant buy (sell min)',
} as const

const MINERAL_MODE_LABELS = {
	instantSell: 'Instant sell (buy max - tax)',
	sellOrder: 'Sell order (sell min - fees)',
} as const

// ============================================================================
// TEXT REPORTS
// ============================================================================

/**
 * Full breakdown of a single valuation
 */
export function formatValuation(v: ReprocessingValuation): string {
	const lines: string[] = []
	const rule = '='.repeat(72)

	lines.push(rule)
	lines.push(`REPROCESSING VALUE: ${v.item.name} (${v.item.id})`)
	lines.push(rule)
	lines.push(`Yield:              ${v.yieldPercent}%`)
	lines.push(`Module price:       ${MODULE_MODE_LABELS[v.modulePriceMode]}`)
	lines.push(`Mineral price:      ${MINERAL_MODE_LABELS[v.mineralPriceMode]}`)
	lines.push(
		`Input quantity:     ${v.inputQuantity} (${v.inputQuantitySource}${v.needsReview ? ', needs review' : ''})`
	)
	lines.push('')
	lines.push(`Module price before costs: ${formatIsk(v.modulePriceBeforeCosts)} ISK`)
	lines.push(`Module price after costs:  ${formatIsk(v.modulePriceAfterCosts)} ISK`)
	lines.push('')

	const columns: Column[] = [
		{ header: 'Material', width: 24 },
		{ header: 'Per unit', width: 10, align: 'right' },
		{ header: 'After yield', width: 12, align: 'right' },
		{ header: 'Price', width: 12, align: 'right' },
		{ header: 'Value', width: 16, align: 'right' },
	]
	const rows = v.materials.map((m) => [
		m.materialName,
		String(m.quantityPerUnit),
		formatIsk(m.quantityAfterYield),
		formatIsk(m.priceAfterCosts),
		formatIsk(m.value),
	])
	lines.push(renderTable({ columns }, rows))
	lines.push('')

	lines.push(`Total mineral value:   ${formatIsk(v.totalMineralValue)} ISK`)
	lines.push(`Total module cost:     ${formatIsk(v.totalModuleCost)} ISK`)
	lines.push(
		`Reprocessing cost:     ${formatIsk(v.reprocessingCost)} ISK ` +
			`(${v.reprocessingCostPercent}% x ${v.yieldPercent}% yield = ${v.effectiveReprocessingCostPercent.toFixed(4)}%)`
	)
	lines.push(`Net reprocessing value: ${formatIsk(v.netReprocessingValue)} ISK`)
	lines.push(
		`Profit margin:         ${v.profitMargin.kind === 'value' ? formatPercent(v.profitMargin.percent) : 'N/A'}`
	)
	lines.push(
		`Breakeven module price: ${
			v.breakevenModulePrice.kind === 'value' ? `${formatIsk(v.breakevenModulePrice.price)} ISK` : 'N/A'
		}`
	)

	if (v.warnings.length > 0) {
		lines.push('')
		lines.push(`No price data (valued at 0): ${v.warnings.join(', ')}`)
	}

	return lines.join('\n')
}

/**
 * Ranked table of batch analysis results
 */
export function formatAnalysis(summary: AnalysisSummary): string {
	const columns: Column[] = [
		{ header: '#', width: 4, align: 'right' },
		{ header: 'Item', width: 36 },
		{ header: 'Qty', width: 6, align: 'right' },
		{ header: 'Price', width: 10, align: 'right' },
		{ header: 'Breakeven', width: 10, align: 'right' },
		{ header: 'Profit/unit', width: 12, align: 'right' },
		{ header: 'Return', width: 9, align: 'right' },
	]

	const rows = summary.rows.map((row, i) => [
		String(i + 1),
		row.needsReview ? `${row.item.name} *` : row.item.name,
		String(row.inputQuantity),
		formatIskShort(row.modulePrice),
		row.breakevenModulePrice === null ? 'N/A' : formatIskShort(row.breakevenModulePrice),
		formatIsk(row.profitPerUnit),
		formatPercent(row.returnPercent),
	])

	const footer =
		`${summary.candidates} candidates, ${summary.priceFiltered} outside price band, ` +
		`${summary.excluded} excluded, ${summary.skipped} without prices, ${summary.valued} valued`

	return [renderTable({ columns }, rows), footer, '* input quantity inferred, needs review'].join('\n')
}

export function formatManufacturing(results: ManufacturingResult[]): string {
	const columns: Column[] = [
		{ header: 'Product', width: 32 },
		{ header: 'Qty', width: 6, align: 'right' },
		{ header: 'Cost', width: 10, align: 'right' },
		{ header: 'Profit/unit', width: 12, align: 'right' },
		{ header: 'Total', width: 10, align: 'right' },
		{ header: 'ROI', width: 9, align: 'right' },
		{ header: 'Skills', width: 6 },
		{ header: 'Runs', width: 6, align: 'right' },
	]

	const rows = results.map((r) => [
		r.productName,
		String(r.outputQuantity),
		formatIskShort(r.totalCost),
		formatIsk(r.profitPerUnit),
		formatIskShort(r.totalProfit),
		formatPercent(r.roiPercent),
		r.skillsMet ? 'Yes' : 'No',
		r.maxRuns === null ? 'N/A' : String(r.maxRuns),
	])

	return renderTable({ columns }, rows)
}

// ============================================================================
// CSV REPORTS
// ============================================================================

export function csvField(value: string | number): string {
	const text = String(value)
	return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function toCsv(headers: string[], rows: Array<Array<string | number>>): string {
	return [headers, ...rows].map((row) => row.map(csvField).join(',')).join('\n') + '\n'
}

export class ReportGenerator {
	private outputDir: string

	constructor(outputDir: string = './reports') {
		this.outputDir = outputDir
	}

	/**
	 * Write batch analysis rows as CSV. Returns the file path.
	 */
	generateAnalysisCSV(rows: AnalysisRow[], filename: string): string {
		const headers = [
			'Type_ID',
			'Name',
			'Input_Quantity',
			'Quantity_Source',
			'Needs_Review',
			'Module_Price',
			'Breakeven_Price',
			'Net_Value',
			'Profit_Per_Unit',
			'Return_%',
		]
		const data = rows.map((row) => [
			row.item.id,
			row.item.name,
			row.inputQuantity,
			row.inputQuantitySource,
			row.needsReview ? 'yes' : 'no',
			row.modulePrice.toFixed(2),
			row.breakevenModulePrice === null ? '' : row.breakevenModulePrice.toFixed(2),
			row.netReprocessingValue.toFixed(2),
			row.profitPerUnit.toFixed(2),
			row.returnPercent === null ? '' : row.returnPercent.toFixed(2),
		])
		return this.write(filename, toCsv(headers, data))
	}

	generateManufacturingCSV(results: ManufacturingResult[], filename: string): string {
		const headers = [
			'Blueprint_ID',
			'Product',
			'Output_Quantity',
			'Product_Price',
			'Material_Cost',
			'Manufacturing_Fee',
			'Total_Cost',
			'Revenue',
			'Profit_Per_Unit',
			'Total_Profit',
			'Margin_%',
			'ROI_%',
			'Missing_Skills',
			'Max_Runs',
		]
		const data = results.map((r) => [
			r.blueprintId,
			r.productName,
			r.outputQuantity,
			r.productPrice.toFixed(2),
			r.materialCost.toFixed(2),
			r.manufacturingFee.toFixed(2),
			r.totalCost.toFixed(2),
			r.revenue.toFixed(2),
			r.profitPerUnit.toFixed(2),
			r.totalProfit.toFixed(2),
			r.profitMarginPercent === null ? '' : r.profitMarginPercent.toFixed(2),
			r.roiPercent === null ? '' : r.roiPercent.toFixed(2),
			r.missingSkills.join('; '),
			r.maxRuns === null ? '' : r.maxRuns,
		])
		return this.write(filename, toCsv(headers, data))
	}

	private write(filename: string, contents: string): string {
		const filepath = path.resolve(this.outputDir, filename)
		const dir = path.dirname(filepath)
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true })
		}
		fs.writeFileSync(filepath, contents)
		return filepath
	}
}
