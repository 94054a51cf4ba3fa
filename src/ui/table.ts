/**
 * Simple table formatting utilities for CLI output
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Column {
	header: string
	width: number
	align?: 'left' | 'right' | 'center'
}

export interface TableOptions {
	columns: Column[]
	borderStyle?: 'single' | 'none'
}

// ============================================================================
// TABLE RENDERING
// ============================================================================

/**
 * Render a table with the given columns and rows
 */
export function renderTable(
	options: TableOptions,
	rows: string[][]
): string {
	const { columns, borderStyle = 'single' } = options
	const lines: string[] = []

	const chars = getBorderChars(borderStyle)

	// Top border
	if (chars.top) {
		lines.push(
			chars.topLeft +
				columns.map((col) => chars.horizontal.repeat(col.width)).join(chars.topMid) +
				chars.topRight
		)
	}

	// Header row
	const headerCells = columns.map((col) => padCell(col.header, col.width, col.align ?? 'left'))
	lines.push(chars.vertical + headerCells.join(chars.vertical) + chars.vertical)

	// Header separator
	lines.push(
		chars.midLeft +
			columns.map((col) => chars.horizontal.repeat(col.width)).join(chars.midMid) +
			chars.midRight
	)

	// Data rows
	for (const row of rows) {
		const cells = columns.map((col, i) => {
			const value = row[i] ?? ''
			return padCell(value, col.width, col.align ?? 'left')
		})
		lines.push(chars.vertical + cells.join(chars.vertical) + chars.vertical)
	}

	// Bottom border
	if (chars.bottom) {
		lines.push(
			chars.bottomLeft +
				columns.map((col) => chars.horizontal.repeat(col.width)).join(chars.bottomMid) +
				chars.bottomRight
		)
	}

	return lines.join('\n')
}

// ============================================================================
// HELPERS
// ============================================================================

function padCell(text: string, width: number, align: 'left' | 'right' | 'center'): string {
	// Truncate if too long
	const truncated = text.length > width ? text.slice(0, width - 1) + '…' : text

	switch (align) {
		case 'right':
			return truncated.padStart(width)
		case 'center': {
			const leftPad = Math.floor((width - truncated.length) / 2)
			return truncated.padStart(leftPad + truncated.length).padEnd(width)
		}
		case 'left':
		default:
			return truncated.padEnd(width)
	}
}

interface BorderChars {
	horizontal: string
	vertical: string
	topLeft: string
	topRight: string
	topMid: string
	bottomLeft: string
	bottomRight: string
	bottomMid: string
	midLeft: string
	midRight: string
	midMid: string
	top: boolean
	bottom: boolean
}

function getBorderChars(style: 'single' | 'none'): BorderChars {
	switch (style) {
		case 'none':
			return {
				horizontal: ' ',
				vertical: ' ',
				topLeft: '',
				topRight: '',
				topMid: '',
				bottomLeft: '',
				bottomRight: '',
				bottomMid: '',
				midLeft: '',
				midRight: '',
				midMid: '',
				top: false,
				bottom: false,
			}
		case 'single':
		default:
			return {
				horizontal: '─',
				vertical: '│',
				topLeft: '┌',
				topRight: '┐',
				topMid: '┬',
				bottomLeft: '└',
				bottomRight: '┘',
				bottomMid: '┴',
				midLeft: '├',
				midRight: '┤',
				midMid: '┼',
				top: true,
				bottom: true,
			}
	}
}

// ============================================================================
// FORMATTING HELPERS
// ============================================================================

/**
 * Format an ISK amount with thousands separators
 */
export function formatIsk(amount: number, decimals = 2): string {
	return amount.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals })
}

/**
 * Format an ISK amount with K/M/B suffixes
 */
export function formatIskShort(amount: number): string {
	const abs = Math.abs(amount)
	if (abs >= 1_000_000_000) return (amount / 1_000_000_000).toFixed(1) + 'B'
	if (abs >= 1_000_000) return (amount / 1_000_000).toFixed(1) + 'M'
	if (abs >= 1_000) return (amount / 1_000).toFixed(1) + 'K'
	return amount.toFixed(0)
}

/**
 * Format a percentage with sign
 */
export function formatPercent(value: number | null): string {
	if (value === null) return 'N/A'
	const sign = value >= 0 ? '+' : ''
	return `${sign}${value.toFixed(1)}%`
}
