// Manufacturing Profitability Analyzer
// Ranks blueprints by the profit of building their product and selling it

import { assumptions } from '../constants/assumptions'
import type { Db } from '../db/db'
import { getDb } from '../db/db'

// ============================================================================
// TYPES
// ============================================================================

export interface ManufacturingOptions {
	/** Material efficiency level, 1% material reduction per level */
	meLevel: number
	manufacturingFeePercent: number
	salesTaxPercent: number
	/** Only keep blueprints the character has the skills for */
	filterSkills: boolean
	/** Only keep blueprints buildable from inventory */
	filterResources: boolean
	minProfit: number
	topN: number
}

export interface ManufacturingResult {
	blueprintId: number
	productId: number
	productName: string
	outputQuantity: number
	productPrice: number
	materialCost: number
	manufacturingFee: number
	totalCost: number
	revenue: number
	profitPerUnit: number
	totalProfit: number
	profitMarginPercent: number | null
	roiPercent: number | null
	skillsMet: boolean
	missingSkills: string[]
	/** Runs buildable from inventory, null when the blueprint needs no materials */
	maxRuns: number | null
	missingMaterials: string[]
}

interface BlueprintRow {
	blueprint_type_id: number
	product_type_id: number
	product_name: string
	output_quantity: number
	product_price: number | null
}

interface MaterialRow {
	blueprint_type_id: number
	material_name: string
	quantity: number
	material_price: number | null
	available: number
}

interface SkillRow {
	blueprint_type_id: number
	skill_name: string
	required_level: number
	character_level: number
}

export function resolveManufacturingOptions(options: Partial<ManufacturingOptions> = {}): ManufacturingOptions {
	return {
		meLevel: 0,
		manufacturingFeePercent: assumptions.manufacturing.manufacturingFeePercent,
		salesTaxPercent: assumptions.fees.salesTaxPercent,
		filterSkills: false,
		filterResources: false,
		minProfit: 0,
		topN: 20,
		...options,
	}
}

/**
 * Material multiplier for a material efficiency level, never below 90%.
 */
export function materialEfficiencyFactor(meLevel: number): number {
	const level = Math.min(Math.max(meLevel, 0), assumptions.manufacturing.maxMaterialEfficiency)
	return 1 - level / 100
}

// ============================================================================
// ANALYZER
// ============================================================================

export class ManufacturingAnalyzer {
	private db: Db

	constructor(db: Db = getDb()) {
		this.db = db
	}

	analyze(options: Partial<ManufacturingOptions> = {}): ManufacturingResult[] {
		const opts = resolveManufacturingOptions(options)
		const factor = materialEfficiencyFactor(opts.meLevel)

		const blueprints = this.db
			.prepare<[], BlueprintRow>(
				`SELECT b.blueprint_type_id, b.product_type_id, b.product_name, b.output_quantity, p.sell_min AS product_price
				FROM blueprints b
				LEFT JOIN prices p ON p.type_id = b.product_type_id
				WHERE b.output_quantity > 0
				ORDER BY b.blueprint_type_id`
			)
			.all()

		const materials = groupBy(
			this.db
				.prepare<[], MaterialRow>(
					`SELECT mm.blueprint_type_id, mm.material_name, mm.quantity,
						p.sell_min AS material_price, COALESCE(inv.quantity, 0) AS available
					FROM manufacturing_materials mm
					LEFT JOIN prices p ON p.type_id = mm.material_type_id
					LEFT JOIN inventory inv ON inv.type_id = mm.material_type_id
					ORDER BY mm.blueprint_type_id, mm.material_type_id`
				)
				.all()
		)

		const skills = groupBy(
			this.db
				.prepare<[], SkillRow>(
					`SELECT ms.blueprint_type_id, ms.skill_name, ms.level AS required_level,
						COALESCE(cs.level, 0) AS character_level
					FROM manufacturing_skills ms
					LEFT JOIN character_skills cs ON cs.skill_id = ms.skill_id
					ORDER BY ms.blueprint_type_id, ms.skill_id`
				)
				.all()
		)

		const results: ManufacturingResult[] = []

		for (const blueprint of blueprints) {
			const blueprintMaterials = materials.get(blueprint.blueprint_type_id) ?? []

			const missingSkills = (skills.get(blueprint.blueprint_type_id) ?? [])
				.filter((skill) => skill.character_level < skill.required_level)
				.map((skill) => `${skill.skill_name} ${skill.required_level}`)
			const skillsMet = missingSkills.length === 0
			if (opts.filterSkills && !skillsMet) continue

			const { maxRuns, missingMaterials } = checkResources(blueprintMaterials)
			if (opts.filterResources && maxRuns === 0) continue

			const materialCost = blueprintMaterials.reduce(
				(sum, material) => sum + material.quantity * factor * (material.material_price ?? 0),
				0
			)
			const manufacturingFee = materialCost * (opts.manufacturingFeePercent / 100)
			const totalCost = materialCost + manufacturingFee

			const productPrice = blueprint.product_price ?? 0
			const revenuePerUnit = productPrice * (1 - opts.salesTaxPercent / 100)
			const revenue = revenuePerUnit * blueprint.output_quantity
			const profitPerUnit = revenuePerUnit - totalCost / blueprint.output_quantity
			const totalProfit = revenue - totalCost

			if (profitPerUnit < opts.minProfit) continue

			results.push({
				blueprintId: blueprint.blueprint_type_id,
				productId: blueprint.product_type_id,
				productName: blueprint.product_name,
				outputQuantity: blueprint.output_quantity,
				productPrice,
				materialCost,
				manufacturingFee,
				totalCost,
				revenue,
				profitPerUnit,
				totalProfit,
				profitMarginPercent: revenuePerUnit > 0 ? (profitPerUnit / revenuePerUnit) * 100 : null,
				roiPercent: totalCost > 0 ? (totalProfit / totalCost) * 100 : null,
				skillsMet,
				missingSkills,
				maxRuns,
				missingMaterials,
			})
		}

		if (results.length === 0) {
			console.warn('No profitable blueprints found with current filters')
		}

		results.sort((a, b) => b.totalProfit - a.totalProfit || a.blueprintId - b.blueprintId)
		return results.slice(0, Math.max(0, opts.topN))
	}
}

/**
 * Runs buildable from inventory. Any short material means zero runs.
 */
function checkResources(materials: MaterialRow[]): { maxRuns: number | null; missingMaterials: string[] } {
	if (materials.length === 0) return { maxRuns: null, missingMaterials: [] }

	let maxRuns = Number.POSITIVE_INFINITY
	const missingMaterials: string[] = []

	for (const material of materials) {
		if (material.available < material.quantity) {
			missingMaterials.push(`${material.material_name}: need ${material.quantity}, have ${material.available}`)
			maxRuns = 0
		} else if (material.quantity > 0) {
			maxRuns = Math.min(maxRuns, Math.floor(material.available / material.quantity))
		}
	}

	return { maxRuns: Number.isFinite(maxRuns) ? maxRuns : null, missingMaterials }
}

function groupBy<T extends { blueprint_type_id: number }>(rows: T[]): Map<number, T[]> {
	const grouped = new Map<number, T[]>()
	for (const row of rows) {
		const list = grouped.get(row.blueprint_type_id)
		if (list) {
			list.push(row)
		} else {
			grouped.set(row.blueprint_type_id, [row])
		}
	}
	return grouped
}
