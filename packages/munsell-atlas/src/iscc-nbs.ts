/**
 * ISCC-NBS colour naming: hue wedge selection followed by point-in-polygon
 * tests in the chroma–value plane.
 */

import { polygonContains, polygonDistance, type Vec2 } from '@munsell-atlas/polytope'
import colorData from '../data/iscc-nbs-colors.json' with { type: 'json' }
import regionData from '../data/iscc-nbs-regions.json' with { type: 'json' }
import { ACHROMATIC_BANDS, HUE_CIRCLE } from './constants.ts'
import { huePosition } from './munsell.ts'
import { formatDescriptor } from './naming.ts'
import { gridHuePosition } from './renotation.ts'
import type { BoundaryPolicy, ChromaticColor, MunsellColor } from './types.ts'

export interface IsccNbsColor {
	/** Category number, 1–267 */
	readonly number: number
	/** Base name, e.g. "purplish pink" */
	readonly name: string
	/** Modifier template, e.g. "vivid {0}" or "{1} gray" */
	readonly formatter: string
	/** Broad shade family, e.g. "pink" */
	readonly shade: string
	/** Full descriptor, e.g. "vivid purplish pink" */
	readonly descriptor: string
}

export interface IsccNbsRegion {
	readonly color: number
	readonly group: number
	/** Hue tokens bounding the wedge range, start then end */
	readonly hues: readonly [string, string]
	/** Unit hue wedges (0–99) the region covers */
	readonly wedges: ReadonlySet<number>
	/** Polygon in (chroma, value) */
	readonly polygon: readonly Vec2[]
}

/**
 * - `contained`: the point lies inside the region's polygon
 * - `nearest`: the point fell in a gap and was assigned to the closest polygon edge
 * - `achromatic`: a neutral colour, named by value band
 */
export type ClassificationMatch = 'contained' | 'nearest' | 'achromatic'

export interface Classification {
	readonly color: IsccNbsColor
	readonly match: ClassificationMatch
}

export interface IsccNbsClassifier {
	readonly colors: readonly IsccNbsColor[]
	readonly regions: readonly IsccNbsRegion[]
	color(number: number): IsccNbsColor | undefined
	/**
	 * Name a Munsell colour. Never fails for a valid colour: gaps between
	 * regions fall back to the nearest region in the same wedge.
	 */
	classify(color: MunsellColor, policy: BoundaryPolicy): Classification
	/** Every category whose region contains the colour, without gap fallback */
	findAllColorsAtPoint(color: MunsellColor, policy: BoundaryPolicy): IsccNbsColor[]
}

/**
 * Unit hue wedge (0–99) holding a hue position under a boundary policy.
 * Wedge `w` spans hue positions `[w, w + 1)` under Method1 and `(w, w + 1]` under Method2.
 */
export function hueWedge(position: number, policy: BoundaryPolicy): number {
	if (policy === 'Method1') {
		return ((Math.floor(position) % HUE_CIRCLE) + HUE_CIRCLE) % HUE_CIRCLE
	}
	if (position === 0) {
		return HUE_CIRCLE - 1
	}
	return (((Math.ceil(position) - 1) % HUE_CIRCLE) + HUE_CIRCLE) % HUE_CIRCLE
}

function wedgesBetween(start: string, end: string): Set<number> {
	const first = Math.round(gridHuePosition(start)) % HUE_CIRCLE
	const last = Math.round(gridHuePosition(end)) % HUE_CIRCLE
	const wedges = new Set<number>()
	let wedge = first
	do {
		wedges.add(wedge)
		wedge = (wedge + 1) % HUE_CIRCLE
	} while (wedge !== last)
	return wedges
}

// =============================================================================
// Loading
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function listOf(data: unknown, key: string): unknown[] {
	if (!isRecord(data)) {
		throw new Error(`ISCC-NBS data must be an object with a ${key} array`)
	}
	const list = data[key]
	if (!Array.isArray(list)) {
		throw new Error(`ISCC-NBS data must be an object with a ${key} array`)
	}
	return list
}

function isVec2(value: unknown): value is Vec2 {
	return (
		Array.isArray(value) &&
		value.length === 2 &&
		typeof value[0] === 'number' &&
		typeof value[1] === 'number'
	)
}

export function readColors(data: unknown): IsccNbsColor[] {
	return listOf(data, 'colors').map((entry, i): IsccNbsColor => {
		if (
			!isRecord(entry) ||
			typeof entry.number !== 'number' ||
			typeof entry.name !== 'string' ||
			typeof entry.formatter !== 'string' ||
			typeof entry.shade !== 'string'
		) {
			throw new Error(`ISCC-NBS colour ${i} must have number, name, formatter and shade`)
		}
		const color: IsccNbsColor = {
			number: entry.number,
			name: entry.name,
			formatter: entry.formatter,
			shade: entry.shade,
			descriptor: formatDescriptor(entry.formatter, entry.name),
		}
		return Object.freeze(color)
	})
}

export function readRegions(data: unknown): IsccNbsRegion[] {
	return listOf(data, 'regions').map((entry, i): IsccNbsRegion => {
		if (
			!isRecord(entry) ||
			typeof entry.color !== 'number' ||
			typeof entry.group !== 'number' ||
			!Array.isArray(entry.hues) ||
			!Array.isArray(entry.points)
		) {
			throw new Error(`ISCC-NBS region ${i} must have color, group, hues and points`)
		}
		const [start, end] = entry.hues
		if (typeof start !== 'string' || typeof end !== 'string') {
			throw new Error(`ISCC-NBS region ${i} must name a start and end hue`)
		}
		const points: unknown[] = entry.points
		const polygon = points.filter(isVec2)
		if (polygon.length !== points.length || polygon.length < 3) {
			throw new Error(`ISCC-NBS region ${i} needs at least three [chroma, value] points`)
		}
		const region: IsccNbsRegion = {
			color: entry.color,
			group: entry.group,
			hues: [start, end],
			wedges: wedgesBetween(start, end),
			polygon,
		}
		return Object.freeze(region)
	})
}

// =============================================================================
// Classifier
// =============================================================================

class IsccNbsClassifierImpl implements IsccNbsClassifier {
	readonly colors: readonly IsccNbsColor[]
	readonly regions: readonly IsccNbsRegion[]
	readonly #byNumber: ReadonlyMap<number, IsccNbsColor>
	readonly #byWedge: ReadonlyMap<number, readonly IsccNbsRegion[]>

	constructor(colors: readonly IsccNbsColor[], regions: readonly IsccNbsRegion[]) {
		this.colors = colors
		this.regions = regions
		this.#byNumber = new Map(colors.map((c): [number, IsccNbsColor] => [c.number, c]))

		for (const region of regions) {
			if (!this.#byNumber.has(region.color)) {
				throw new Error(`ISCC-NBS region references unknown colour ${region.color}`)
			}
		}
		for (const band of ACHROMATIC_BANDS) {
			if (!this.#byNumber.has(band.color)) {
				throw new Error(`ISCC-NBS data is missing achromatic colour ${band.color}`)
			}
		}

		const byWedge = new Map<number, IsccNbsRegion[]>()
		for (let wedge = 0; wedge < HUE_CIRCLE; wedge++) {
			byWedge.set(wedge, regions.filter((r) => r.wedges.has(wedge)))
		}
		this.#byWedge = byWedge
	}

	color(number: number): IsccNbsColor | undefined {
		return this.#byNumber.get(number)
	}

	classify(color: MunsellColor, policy: BoundaryPolicy): Classification {
		if (color.kind === 'neutral') {
			return { color: this.#achromatic(color.value), match: 'achromatic' }
		}

		const point: Vec2 = [color.chroma, color.value]
		const candidates = this.#candidates(color, policy)
		const containing = candidates.find((region) => polygonContains(region.polygon, point))
		if (containing !== undefined) {
			return { color: this.#require(containing.color), match: 'contained' }
		}

		let nearest: IsccNbsRegion | undefined
		let nearestDistance = Number.POSITIVE_INFINITY
		for (const region of candidates.length > 0 ? candidates : this.regions) {
			const d = polygonDistance(region.polygon, point)
			if (d < nearestDistance) {
				nearestDistance = d
				nearest = region
			}
		}
		if (nearest === undefined) {
			throw new Error('ISCC-NBS classifier has no regions')
		}
		return { color: this.#require(nearest.color), match: 'nearest' }
	}

	findAllColorsAtPoint(color: MunsellColor, policy: BoundaryPolicy): IsccNbsColor[] {
		if (color.kind === 'neutral') {
			return [this.#achromatic(color.value)]
		}

		const point: Vec2 = [color.chroma, color.value]
		const numbers = new Set<number>()
		for (const region of this.#candidates(color, policy)) {
			if (polygonContains(region.polygon, point)) {
				numbers.add(region.color)
			}
		}
		return [...numbers].map((n) => this.#require(n))
	}

	#candidates(color: ChromaticColor, policy: BoundaryPolicy): readonly IsccNbsRegion[] {
		return this.#byWedge.get(hueWedge(huePosition(color), policy)) ?? []
	}

	#achromatic(value: number): IsccNbsColor {
		const band = ACHROMATIC_BANDS.find((b) => value <= b.maxValue) ?? ACHROMATIC_BANDS[4]
		return this.#require(band.color)
	}

	#require(number: number): IsccNbsColor {
		const color = this.#byNumber.get(number)
		if (color === undefined) {
			throw new Error(`Unknown ISCC-NBS colour ${number}`)
		}
		return color
	}
}

export function createIsccNbsClassifier(
	colors: readonly IsccNbsColor[],
	regions: readonly IsccNbsRegion[],
): IsccNbsClassifier {
	return new IsccNbsClassifierImpl(colors, regions)
}

let defaultClassifier: IsccNbsClassifier | undefined

/**
 * Classifier over the bundled ISCC-NBS tables, built on first use.
 */
export function getIsccNbsClassifier(): IsccNbsClassifier {
	defaultClassifier ??= createIsccNbsClassifier(readColors(colorData), readRegions(regionData))
	return defaultClassifier
}
