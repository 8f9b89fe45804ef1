/**
 * xyY (Illuminant C) → Munsell inversion.
 *
 * The renotation grid has no closed-form inverse, so inversion is an iterative
 * search behind the `InversionStrategy` interface. Value comes straight from
 * luminance; the strategies only search hue and chroma.
 */

import {
	ACHROMATIC_THRESHOLD,
	DEFAULT_CONVERGENCE_TOLERANCE,
	DEFAULT_MAX_ITERATIONS,
	DEGREES_PER_HUE_UNIT,
	MAX_BRACKETING_STEPS,
	RENOTATION_CHROMA_STEP,
	RENOTATION_HUE_STEP,
	RENOTATION_MAX_VALUE,
	RENOTATION_MIN_VALUE,
	VALUE_SNAP_EPSILON,
} from './constants.ts'
import { InvalidChannelError } from './errors.ts'
import { whiteChromaticity } from './illuminants.ts'
import { colorFromHuePosition, createNeutral } from './munsell.ts'
import { type Chromaticity, polarAbout, type RenotationTable } from './renotation.ts'
import type { MunsellColor, XyY } from './types.ts'
import { angleDifference, clamp, wrapHue } from './util.ts'
import { valueFromLuminance } from './value.ts'

export interface InversionOptions {
	/** Stop once the xy distance to the target falls below this */
	readonly tolerance: number
	/** Outer iteration budget */
	readonly maxIterations: number
}

export interface InversionResult {
	readonly color: MunsellColor
	/** False when the budget ran out; `color` is then the best estimate seen */
	readonly converged: boolean
	readonly iterations: number
	/** xy distance between the target and the renotated result */
	readonly residual: number
}

/**
 * A hue and chroma search at a fixed value. Strategies receive a chromatic
 * target (the neutral case is handled before they run).
 */
export interface InversionStrategy {
	readonly name: string
	search(target: Chromaticity, value: number, table: RenotationTable, options: InversionOptions): HueChromaSearch
}

export interface HueChromaSearch {
	readonly hue: number
	readonly chroma: number
	readonly converged: boolean
	readonly iterations: number
	readonly residual: number
}

const WHITE = whiteChromaticity('C')

function distance(a: Chromaticity, b: Chromaticity): number {
	return Math.hypot(a.x - b.x, a.y - b.y)
}

/**
 * Nearest tabulated chromaticity on the closest value plane.
 */
function nearestGridPoint(
	target: Chromaticity,
	value: number,
	table: RenotationTable,
): { hue: number; chroma: number } {
	const plane = clamp(RENOTATION_MIN_VALUE, Math.round(value), RENOTATION_MAX_VALUE)
	let best = { hue: 0, chroma: 0 }
	let bestDistance = Number.POSITIVE_INFINITY

	for (const entry of table.entriesAtValue(plane)) {
		const d = distance(target, entry)
		if (d < bestDistance) {
			bestDistance = d
			best = { hue: entry.hue, chroma: entry.chroma }
		}
	}

	return best
}

/**
 * Interpolate the abscissa at which `pairs` reach `target`, using the first
 * bracketing interval after sorting, or the two nearest pairs when nothing brackets.
 */
function interpolateAt(pairs: readonly (readonly [number, number])[], target: number): number {
	const sorted = pairs.toSorted((a, b) => a[0] - b[0] || a[1] - b[1])

	const line = (p0: readonly [number, number], p1: readonly [number, number]) =>
		p1[0] === p0[0] ? p0[1] : p0[1] + ((target - p0[0]) * (p1[1] - p0[1])) / (p1[0] - p0[0])

	for (let i = 0; i + 1 < sorted.length; i++) {
		const p0 = sorted[i]
		const p1 = sorted[i + 1]
		if (p0 !== undefined && p1 !== undefined && p0[0] <= target && target <= p1[0]) {
			return line(p0, p1)
		}
	}

	const [p0, p1] = pairs.toSorted((a, b) => Math.abs(a[0] - target) - Math.abs(b[0] - target))
	if (p0 === undefined) {
		throw new Error('Cannot interpolate without samples')
	}
	return p1 === undefined ? p0[1] : line(p0, p1)
}

function brackets(pairs: readonly (readonly [number, number])[], target: number): boolean {
	let min = Number.POSITIVE_INFINITY
	let max = Number.NEGATIVE_INFINITY
	for (const [d] of pairs) {
		min = Math.min(min, d)
		max = Math.max(max, d)
	}
	return min <= target && target <= max
}

// =============================================================================
// Strategies
// =============================================================================

/**
 * Alternating hue and chroma refinement.
 *
 * Each iteration brackets the target's hue angle by stepping the hue position
 * along the angular error, interpolates the zero crossing, then brackets the
 * target's distance from white by scaling chroma and interpolates again.
 */
export const hueChromaRefinement: InversionStrategy = {
	name: 'hueChromaRefinement',

	search(target, value, table, { tolerance, maxIterations }) {
		const goal = polarAbout(WHITE, target)
		const polarAt = (hue: number, chroma: number) => polarAbout(WHITE, table.renotate(hue, value, chroma))

		let { hue, chroma } = nearestGridPoint(target, value, table)
		let best: HueChromaSearch | undefined

		for (let iteration = 1; iteration <= maxIterations; iteration++) {
			chroma = Math.min(chroma, table.maxChroma(hue, value))

			const hueError = angleDifference(polarAt(hue, chroma).phi, goal.phi)
			const huePairs: [number, number][] = [[hueError, hue]]
			for (let j = 1; !brackets(huePairs, 0) && j <= MAX_BRACKETING_STEPS; j++) {
				const trial = hue + (j * hueError) / DEGREES_PER_HUE_UNIT
				const trialChroma = Math.min(chroma, table.maxChroma(wrapHue(trial), value))
				huePairs.push([angleDifference(polarAt(wrapHue(trial), trialChroma).phi, goal.phi), trial])
			}
			hue = wrapHue(interpolateAt(huePairs, 0))

			const limit = table.maxChroma(hue, value)
			chroma = Math.min(chroma, limit)
			if (chroma <= 0) {
				// Chroma scaling cannot leave zero, restart one grid step out
				chroma = Math.min(RENOTATION_CHROMA_STEP, limit)
			}
			const rho = polarAt(hue, chroma).rho
			const chromaPairs: [number, number][] = [[rho, chroma]]
			for (let j = 1; !brackets(chromaPairs, goal.rho) && j <= MAX_BRACKETING_STEPS; j++) {
				const trial = Math.min(limit, (goal.rho / rho) ** j * chroma)
				const trialRho = polarAt(hue, trial).rho
				chromaPairs.push([trialRho, trial])
				if (trial === limit && trialRho < goal.rho) {
					break
				}
			}
			chroma = clamp(0, interpolateAt(chromaPairs, goal.rho), limit)

			const residual = distance(table.renotate(hue, value, chroma), target)
			if (best === undefined || residual < best.residual) {
				best = { hue, chroma, converged: false, iterations: maxIterations, residual }
			}
			if (residual < tolerance) {
				return { hue, chroma, converged: true, iterations: iteration, residual }
			}
		}

		return best ?? { hue, chroma, converged: false, iterations: 0, residual: Number.POSITIVE_INFINITY }
	},
}

/**
 * Pattern search on the hue/chroma lattice, starting one grid step wide and
 * halving the step whenever no neighbour improves on the current estimate.
 */
export const nearestGridRefinement: InversionStrategy = {
	name: 'nearestGridRefinement',

	search(target, value, table, { tolerance, maxIterations }) {
		const evaluate = (hue: number, chroma: number) => {
			const c = clamp(0, chroma, table.maxChroma(hue, value))
			return { hue, chroma: c, residual: distance(table.renotate(hue, value, c), target) }
		}

		const start = nearestGridPoint(target, value, table)
		let current = evaluate(start.hue, start.chroma)
		let hueStep = RENOTATION_HUE_STEP
		let chromaStep = RENOTATION_CHROMA_STEP

		if (current.residual < tolerance) {
			return { ...current, converged: true, iterations: 0 }
		}

		for (let iteration = 1; iteration <= maxIterations; iteration++) {
			const neighbours = [
				evaluate(wrapHue(current.hue + hueStep), current.chroma),
				evaluate(wrapHue(current.hue - hueStep), current.chroma),
				evaluate(current.hue, current.chroma + chromaStep),
				evaluate(current.hue, current.chroma - chromaStep),
			]

			let improved = false
			for (const candidate of neighbours) {
				if (candidate.residual < current.residual) {
					current = candidate
					improved = true
				}
			}
			if (!improved) {
				hueStep /= 2
				chromaStep /= 2
			}

			if (current.residual < tolerance) {
				return { ...current, converged: true, iterations: iteration }
			}
		}

		return { ...current, converged: false, iterations: maxIterations }
	},
}

export const INVERSION_STRATEGIES: readonly InversionStrategy[] = [hueChromaRefinement, nearestGridRefinement]

// =============================================================================
// Inversion
// =============================================================================

function snapValue(value: number): number {
	const rounded = Math.round(value)
	return Math.abs(value - rounded) < VALUE_SNAP_EPSILON ? rounded : value
}

/**
 * Convert an xyY chromaticity under Illuminant C into Munsell.
 * The iteration count is always bounded by `options.maxIterations`.
 */
export function invertXyY(
	target: XyY,
	table: RenotationTable,
	options: InversionOptions = {
		tolerance: DEFAULT_CONVERGENCE_TOLERANCE,
		maxIterations: DEFAULT_MAX_ITERATIONS,
	},
	strategy: InversionStrategy = hueChromaRefinement,
): InversionResult {
	for (const [channel, v] of [
		['x', target.x],
		['y', target.y],
		['Y', target.Y],
	] as const) {
		if (!Number.isFinite(v)) {
			throw new InvalidChannelError(channel, v, 'a finite number')
		}
	}
	if (target.Y < 0) {
		throw new InvalidChannelError('Y', target.Y, 'non-negative')
	}

	const value = snapValue(valueFromLuminance(target.Y))
	if (value === 0 || polarAbout(WHITE, target).rho < ACHROMATIC_THRESHOLD) {
		return { color: createNeutral(value), converged: true, iterations: 0, residual: 0 }
	}

	const result = strategy.search(target, value, table, options)
	return {
		color: colorFromHuePosition(result.hue, value, result.chroma),
		converged: result.converged,
		iterations: result.iterations,
		residual: result.residual,
	}
}
