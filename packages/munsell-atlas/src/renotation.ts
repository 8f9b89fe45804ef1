/**
 * Munsell renotation grid and forward (H, V, C) → xyY interpolation under Illuminant C.
 *
 * Off-grid hues interpolate along ovoids (polar about the white point), odd or
 * fractional chromas along radials (linear in xy), and fractional values linearly
 * between the bracketing value planes.
 */

import renotationData from '../data/munsell-renotation.json' with { type: 'json' }
import {
	GRID_HUE_EPSILON,
	HUE_CIRCLE,
	HUE_FAMILIES,
	MAX_CHROMA_EPSILON,
	RENOTATION_CHROMA_STEP,
	RENOTATION_HUE_STEP,
	RENOTATION_MAX_VALUE,
	RENOTATION_MIN_VALUE,
} from './constants.ts'
import { OutOfGamutError } from './errors.ts'
import { whiteChromaticity } from './illuminants.ts'
import type { XyY } from './types.ts'
import { angleDifference, lerp, toDegrees, toRadians, wrapHue } from './util.ts'
import { luminanceFromValue } from './value.ts'

const STEPS_PER_CIRCLE = HUE_CIRCLE / RENOTATION_HUE_STEP

export interface Chromaticity {
	readonly x: number
	readonly y: number
}

export interface RenotationEntry {
	/** Grid hue step, 1–40. Step 40 is 10RP (hue position 0). */
	readonly step: number
	/** Hue position on the 100-unit circle */
	readonly hue: number
	readonly value: number
	readonly chroma: number
	readonly x: number
	readonly y: number
	/** Luminance of the value plane, 0–1 */
	readonly Y: number
}

export interface RenotationTable {
	/** Illuminant the chromaticities are defined under */
	readonly illuminant: 'C'
	readonly size: number
	entries(): Iterable<RenotationEntry>
	entriesAtValue(value: number): readonly RenotationEntry[]
	/** Tabulated chromaticity of a grid cell, or `undefined` beyond the cell's chroma limit */
	lookup(step: number, value: number, chroma: number): Chromaticity | undefined
	/** Highest tabulated chroma of a grid hue on an integer value plane */
	gridMaxChroma(step: number, value: number): number
	/** Highest chroma reachable by interpolation at any hue position and value */
	maxChroma(hue: number, value: number): number
	/**
	 * Chromaticity and luminance of a hue position, value and chroma.
	 * Throws `OutOfGamutError` when chroma exceeds `maxChroma(hue, value)`.
	 */
	renotate(hue: number, value: number, chroma: number): XyY
}

// =============================================================================
// Loading
// =============================================================================

/** `[hue, value, chroma, x, y, Y]` with Y in percent */
export type RenotationRow = readonly [string, number, number, number, number, number]

export interface RenotationData {
	readonly entries: readonly RenotationRow[]
}

const HUE_TOKEN_REGEX = /^(\d+(?:\.\d+)?)([A-Z]{1,2})$/

/**
 * Hue position of a grid hue token such as `2.5R` or `10RP`.
 */
export function gridHuePosition(token: string): number {
	const match = HUE_TOKEN_REGEX.exec(token)
	const family = HUE_FAMILIES.findIndex((f) => f === match?.[2])
	if (match?.[1] === undefined || family === -1) {
		throw new Error(`Invalid renotation hue '${token}'`)
	}
	return wrapHue(family * 10 + Number(match[1]))
}

function isRenotationRow(entry: unknown): entry is RenotationRow {
	return (
		Array.isArray(entry) &&
		entry.length === 6 &&
		typeof entry[0] === 'string' &&
		entry.slice(1).every((n) => typeof n === 'number' && Number.isFinite(n))
	)
}

function readEntries(data: unknown): readonly RenotationRow[] {
	if (typeof data !== 'object' || data === null || !('entries' in data) || !Array.isArray(data.entries)) {
		throw new Error('Renotation data must be an object with an entries array')
	}
	const entries: unknown[] = data.entries
	for (const [i, entry] of entries.entries()) {
		if (!isRenotationRow(entry)) {
			throw new Error(`Renotation entry ${i} must be [hue, value, chroma, x, y, Y]`)
		}
	}
	return entries.filter(isRenotationRow)
}

function stepOf(hue: number): number {
	return Math.round(hue / RENOTATION_HUE_STEP) % STEPS_PER_CIRCLE || STEPS_PER_CIRCLE
}

function cellKey(step: number, value: number, chroma: number): string {
	return `${step}:${value}:${chroma}`
}

// =============================================================================
// Interpolation
// =============================================================================

interface Bracket {
	readonly lower: number
	readonly upper: number
	/** Fraction of the way from lower to upper; 0 means a single exact plane or step */
	readonly t: number
}

function hueSteps(hue: number): Bracket {
	const s = wrapHue(hue) / RENOTATION_HUE_STEP
	if (Math.abs(s - Math.round(s)) < GRID_HUE_EPSILON) {
		const step = Math.round(s) % STEPS_PER_CIRCLE || STEPS_PER_CIRCLE
		return { lower: step, upper: step, t: 0 }
	}
	const lo = Math.floor(s)
	return {
		lower: lo % STEPS_PER_CIRCLE || STEPS_PER_CIRCLE,
		upper: (lo + 1) % STEPS_PER_CIRCLE || STEPS_PER_CIRCLE,
		t: s - lo,
	}
}

class RenotationTableImpl implements RenotationTable {
	readonly illuminant = 'C'
	readonly size: number

	readonly #cells = new Map<string, Chromaticity>()
	readonly #maxChroma = new Map<string, number>()
	readonly #planes = new Map<number, RenotationEntry[]>()
	readonly #planeLuminance = new Map<number, number>()
	readonly #white: Chromaticity

	constructor(raw: readonly RenotationRow[]) {
		this.#white = whiteChromaticity('C')

		for (const [token, value, chroma, x, y, Y] of raw) {
			const hue = gridHuePosition(token)
			const step = stepOf(hue)
			if (!Number.isInteger(value) || value < RENOTATION_MIN_VALUE || value > RENOTATION_MAX_VALUE) {
				throw new Error(`Renotation value ${value} for ${token} is not a tabulated plane`)
			}
			if (chroma <= 0 || chroma % RENOTATION_CHROMA_STEP !== 0) {
				throw new Error(`Renotation chroma ${chroma} for ${token} is not an even step`)
			}

			const entry: RenotationEntry = { step, hue, value, chroma, x, y, Y: Y / 100 }
			this.#cells.set(cellKey(step, value, chroma), { x, y })

			const limitKey = `${step}:${value}`
			this.#maxChroma.set(limitKey, Math.max(this.#maxChroma.get(limitKey) ?? 0, chroma))

			const plane = this.#planes.get(value)
			if (plane === undefined) {
				this.#planes.set(value, [entry])
			} else {
				plane.push(entry)
			}
			this.#planeLuminance.set(value, entry.Y)
		}

		for (let value = RENOTATION_MIN_VALUE; value <= RENOTATION_MAX_VALUE; value++) {
			if (!this.#planes.has(value)) {
				throw new Error(`Renotation data has no entries at value ${value}`)
			}
		}

		this.size = raw.length
	}

	*entries(): Iterable<RenotationEntry> {
		for (const plane of this.#planes.values()) {
			yield* plane
		}
	}

	entriesAtValue(value: number): readonly RenotationEntry[] {
		return this.#planes.get(value) ?? []
	}

	lookup(step: number, value: number, chroma: number): Chromaticity | undefined {
		return this.#cells.get(cellKey(step, value, chroma))
	}

	gridMaxChroma(step: number, value: number): number {
		return this.#maxChroma.get(`${step}:${value}`) ?? 0
	}

	maxChroma(hue: number, value: number): number {
		const planes = this.#valuePlanes(value)
		const lower = this.#planeMaxChroma(hue, planes.lower)
		return planes.t === 0 ? lower : Math.min(lower, this.#planeMaxChroma(hue, planes.upper))
	}

	renotate(hue: number, value: number, chroma: number): XyY {
		const Y = luminanceFromValue(value)
		if (chroma === 0) {
			return { ...this.#white, Y }
		}

		const limit = this.maxChroma(hue, value)
		if (chroma > limit + MAX_CHROMA_EPSILON) {
			throw new OutOfGamutError(
				`Chroma ${chroma} exceeds the renotation limit ${limit} at hue ${hue}, value ${value}`,
			)
		}

		const c = Math.min(chroma, limit)
		const planes = this.#valuePlanes(value)
		const lower = this.#onPlane(hue, planes.lower, c)
		if (planes.t === 0) {
			return { ...lower, Y }
		}
		const upper = this.#onPlane(hue, planes.upper, c)
		return { x: lerp(lower.x, upper.x, planes.t), y: lerp(lower.y, upper.y, planes.t), Y }
	}

	#valuePlanes(value: number): Bracket {
		if (value <= RENOTATION_MIN_VALUE) {
			return { lower: RENOTATION_MIN_VALUE, upper: RENOTATION_MIN_VALUE, t: 0 }
		}
		if (value >= RENOTATION_MAX_VALUE) {
			return { lower: RENOTATION_MAX_VALUE, upper: RENOTATION_MAX_VALUE, t: 0 }
		}
		const lo = Math.floor(value)
		if (value === lo) {
			return { lower: lo, upper: lo, t: 0 }
		}

		const Y = luminanceFromValue(value)
		const Ylo = this.#planeLuminance.get(lo) ?? luminanceFromValue(lo)
		const Yhi = this.#planeLuminance.get(lo + 1) ?? luminanceFromValue(lo + 1)
		return { lower: lo, upper: lo + 1, t: (Y - Ylo) / (Yhi - Ylo) }
	}

	#planeMaxChroma(hue: number, value: number): number {
		const steps = hueSteps(hue)
		const lower = this.gridMaxChroma(steps.lower, value)
		return steps.t === 0 ? lower : Math.min(lower, this.gridMaxChroma(steps.upper, value))
	}

	#grid(step: number, value: number, chroma: number): Chromaticity {
		if (chroma === 0) {
			return this.#white
		}
		const cell = this.lookup(step, value, chroma)
		if (cell === undefined) {
			throw new OutOfGamutError(`No renotation entry for step ${step}, value ${value}, chroma ${chroma}`)
		}
		return cell
	}

	/** Ovoid interpolation across hue at an even chroma */
	#onEvenChroma(hue: number, value: number, chroma: number): Chromaticity {
		const steps = hueSteps(hue)
		const a = this.#grid(steps.lower, value, chroma)
		if (steps.t === 0 || chroma === 0) {
			return a
		}
		const b = this.#grid(steps.upper, value, chroma)

		const pa = polarAbout(this.#white, a)
		const pb = polarAbout(this.#white, b)
		const rho = lerp(pa.rho, pb.rho, steps.t)
		const phi = pa.phi + steps.t * angleDifference(pa.phi, pb.phi)
		return {
			x: this.#white.x + rho * Math.cos(toRadians(phi)),
			y: this.#white.y + rho * Math.sin(toRadians(phi)),
		}
	}

	/** Radial interpolation between the bracketing even chromas */
	#onPlane(hue: number, value: number, chroma: number): Chromaticity {
		const lo = Math.floor(chroma / RENOTATION_CHROMA_STEP) * RENOTATION_CHROMA_STEP
		if (chroma === lo) {
			return this.#onEvenChroma(hue, value, chroma)
		}
		const t = (chroma - lo) / RENOTATION_CHROMA_STEP
		const a = this.#onEvenChroma(hue, value, lo)
		const b = this.#onEvenChroma(hue, value, lo + RENOTATION_CHROMA_STEP)
		return { x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t) }
	}
}

/**
 * Build a renotation table from `{ entries: [hue, value, chroma, x, y, Y][] }`,
 * with Y in percent, as bundled or as returned by `readRenotationText`.
 */
export function createRenotationTable(data: unknown): RenotationTable {
	return new RenotationTableImpl(readEntries(data))
}

/**
 * Read renotation rows from the published whitespace-separated layout, one
 * `h V C x y Y` row per line with an optional header.
 *
 * Rows off the tabulated grid (values outside the integer planes 1–9, odd or
 * zero chromas) are skipped, so the full extrapolated listing loads as well as
 * the measured one.
 */
export function readRenotationText(text: string): RenotationData {
	const entries: RenotationRow[] = []
	for (const [i, line] of text.split(/\r?\n/).entries()) {
		const fields = line.trim().split(/\s+/)
		if (fields[0] === '' || fields[0].startsWith('#') || fields[0].toLowerCase() === 'h') {
			continue
		}
		const numbers = fields.slice(1).map(Number)
		if (fields.length !== 6 || !numbers.every(Number.isFinite)) {
			throw new Error(`Renotation line ${i + 1} must have six columns: h V C x y Y`)
		}
		const [value, chroma, x, y, Y] = numbers
		const onGrid =
			Number.isInteger(value) &&
			value >= RENOTATION_MIN_VALUE &&
			value <= RENOTATION_MAX_VALUE &&
			chroma > 0 &&
			chroma % RENOTATION_CHROMA_STEP === 0
		if (onGrid) {
			entries.push([fields[0], value, chroma, x, y, Y])
		}
	}
	return { entries }
}

let defaultTable: RenotationTable | undefined

/**
 * The bundled renotation table, loaded on first use and shared thereafter.
 */
export function getRenotationTable(): RenotationTable {
	defaultTable ??= createRenotationTable(renotationData)
	return defaultTable
}

/**
 * Polar coordinates of a chromaticity about a white point, angle in degrees.
 */
export function polarAbout(white: Chromaticity, point: Chromaticity): { rho: number; phi: number } {
	const dx = point.x - white.x
	const dy = point.y - white.y
	return { rho: Math.hypot(dx, dy), phi: toDegrees(Math.atan2(dy, dx)) }
}
