// Item category IDs that never show up in reprocessing analysis

export const CATEGORY_CELESTIAL = 2
export const CATEGORY_SHIP = 6
export const CATEGORY_BLUEPRINT = 9
export const CATEGORY_SKILL = 16
export const CATEGORY_IMPLANT = 20
export const CATEGORY_APPAREL = 30
export const CATEGORY_SKIN = 91

export const DEFAULT_EXCLUDED_CATEGORY_IDS: readonly number[] = [
	CATEGORY_CELESTIAL,
	CATEGORY_SHIP,
	CATEGORY_BLUEPRINT,
	CATEGORY_SKILL,
	CATEGORY_IMPLANT,
	CATEGORY_APPAREL,
	CATEGORY_SKIN,
]
