// Default market and industry assumptions. All percentages in percent units (1.37 means 1.37%).

export const assumptions = {
	fees: {
		brokerFeePercent: 1.37,
		salesTaxPercent: 3.5,
		bufferPercent: 10,
		averageRelists: 3,
		relistDiscountPercent: 80,
	},
	reprocessing: {
		yieldPercent: 55,
		reprocessingCostPercent: 3.37,
	},
	manufacturing: {
		manufacturingFeePercent: 2,
		maxMaterialEfficiency: 10,
	},
	analysis: {
		minPrice: 1,
		maxPrice: 100_000,
		topN: 30,
	},
} as const
