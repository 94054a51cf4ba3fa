import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ZERO_FEES } from '../test/seed'
import type { AnalysisRow, ReprocessingValuation } from '../types'
import { ReportGenerator, csvField, formatAnalysis, formatValuation, toCsv } from './report-generator'

function valuation(overrides: Partial<ReprocessingValuation> = {}): ReprocessingValuation {
	return {
		item: { id: 100, name: 'Small Rail', groupId: null, categoryId: 7 },
		yieldPercent: 50,
		modulePriceMode: 'buyOrder',
		mineralPriceMode: 'sellOrder',
		feeParams: ZERO_FEES,
		inputQuantity: 1,
		inputQuantitySource: 'default',
		needsReview: true,
		modulePriceBeforeCosts: 100,
		modulePriceAfterCosts: 100,
		materials: [
			{
				materialId: 34,
				materialName: 'Tritanium',
				quantityPerUnit: 10,
				quantityAfterYield: 5,
				rawPrice: 5,
				priceAfterCosts: 5,
				value: 25,
			},
		],
		totalMineralValue: 25,
		totalModuleCost: 100,
		reprocessingCostPercent: 0,
		effectiveReprocessingCostPercent: 0,
		reprocessingCost: 0,
		netReprocessingValue: -75,
		profitMargin: { kind: 'value', percent: -75 },
		breakevenModulePrice: { kind: 'value', price: 25 },
		warnings: [],
		...overrides,
	}
}

function row(v: ReprocessingValuation): AnalysisRow {
	return {
		item: v.item,
		inputQuantity: v.inputQuantity,
		inputQuantitySource: v.inputQuantitySource,
		needsReview: v.needsReview,
		modulePrice: v.modulePriceBeforeCosts,
		netReprocessingValue: v.netReprocessingValue,
		profitPerUnit: v.netReprocessingValue / v.inputQuantity,
		returnPercent: v.profitMargin.kind === 'value' ? v.profitMargin.percent : null,
		breakevenModulePrice: v.breakevenModulePrice.kind === 'value' ? v.breakevenModulePrice.price : null,
		valuation: v,
	}
}

// ============================================================================
// TEXT REPORTS
// ============================================================================

describe('formatValuation', () => {
	test('prints the totals', () => {
		const lines = formatValuation(valuation()).split('\n')

		expect(lines).toContain('REPROCESSING VALUE: Small Rail (100)')
		expect(lines).toContain('Input quantity:     1 (default, needs review)')
		expect(lines).toContain('Net reprocessing value: -75.00 ISK')
		expect(lines).toContain('Profit margin:         -75.0%')
		expect(lines).toContain('Breakeven module price: 25.00 ISK')
	})

	test('prints N/A for undefined figures and lists missing prices', () => {
		const lines = formatValuation(
			valuation({
				profitMargin: { kind: 'undefined' },
				breakevenModulePrice: { kind: 'undefined' },
				warnings: ['Small Rail'],
			})
		).split('\n')

		expect(lines).toContain('Profit margin:         N/A')
		expect(lines).toContain('Breakeven module price: N/A')
		expect(lines[lines.length - 1]).toBe('No price data (valued at 0): Small Rail')
	})
})

describe('formatAnalysis', () => {
	test('marks rows needing review and sums up the run', () => {
		const text = formatAnalysis({ rows: [row(valuation())], candidates: 5, priceFiltered: 2, excluded: 1, skipped: 1, valued: 1 })
		const lines = text.split('\n')

		expect(lines[3]).toBe(
			'│   1│' + 'Small Rail *'.padEnd(36) + '│     1│       100│        25│      -75.00│   -75.0%│'
		)
		expect(lines[lines.length - 2]).toBe('5 candidates, 2 outside price band, 1 excluded, 1 without prices, 1 valued')
		expect(lines[lines.length - 1]).toBe('* input quantity inferred, needs review')
	})
})

// ============================================================================
// CSV
// ============================================================================

describe('toCsv', () => {
	test('quotes fields with commas, quotes or newlines', () => {
		expect(csvField('plain')).toBe('plain')
		expect(csvField(12.5)).toBe('12.5')
		expect(toCsv(['a', 'b'], [[1, 'x,y'], [2, 'say "hi"']])).toBe('a,b\n1,"x,y"\n2,"say ""hi"""\n')
	})
})

describe('ReportGenerator', () => {
	let dir: string

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'industry-reports-'))
	})

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true })
	})

	test('writes analysis rows as CSV, creating the directory', () => {
		const outputDir = path.join(dir, 'nested')
		const filepath = new ReportGenerator(outputDir).generateAnalysisCSV([row(valuation())], 'analysis.csv')

		expect(filepath).toBe(path.join(outputDir, 'analysis.csv'))
		expect(fs.readFileSync(filepath, 'utf8').split('\n')).toEqual([
			'Type_ID,Name,Input_Quantity,Quantity_Source,Needs_Review,Module_Price,Breakeven_Price,Net_Value,Profit_Per_Unit,Return_%',
			'100,Small Rail,1,default,yes,100.00,25.00,-75.00,-75.00,-75.00',
			'',
		])
	})

	test('writes to an absolute path as given', () => {
		const target = path.join(dir, 'elsewhere', 'out.csv')
		const filepath = new ReportGenerator(path.join(dir, 'reports')).generateAnalysisCSV([], target)

		expect(filepath).toBe(target)
		expect(fs.readFileSync(target, 'utf8').split('\n')[1]).toBe('')
	})

	test('creates the directories of a nested relative path', () => {
		const filepath = new ReportGenerator(dir).generateAnalysisCSV([row(valuation())], 'reports/2026/a.csv')

		expect(filepath).toBe(path.join(dir, 'reports', '2026', 'a.csv'))
		expect(fs.existsSync(filepath)).toBe(true)
	})

	test('leaves undefined figures empty', () => {
		const v = valuation({ profitMargin: { kind: 'undefined' }, breakevenModulePrice: { kind: 'undefined' } })
		const filepath = new ReportGenerator(dir).generateAnalysisCSV([row(v)], 'analysis.csv')

		expect(fs.readFileSync(filepath, 'utf8').split('\n')[1]).toBe('100,Small Rail,1,default,yes,100.00,,-75.00,-75.00,')
	})
})
