/**
 * Named colour overlays: convex polyhedra in Munsell Cartesian space built from
 * sample clouds by a single inner-hull peel.
 *
 * Overlays may overlap. A point can match none, one or several of them.
 */

import {
	contains,
	createPolyhedron,
	distance,
	innerHull,
	type Polyhedron,
	solidCentroid,
	type Vec3,
} from '@munsell-atlas/polytope'
import overlayData from '../data/overlay-samples.json' with { type: 'json' }
import { toCartesian } from './cartesian.ts'
import { parseMunsell } from './munsell.ts'
import type { MunsellColor } from './types.ts'

export interface Overlay {
	readonly name: string
	readonly polyhedron: Polyhedron
	/** Centroid of the filled polyhedron */
	readonly centroid: Vec3
}

/**
 * Build an overlay from samples: the inner hull of their Cartesian points.
 * Throws `InsufficientDataError` when fewer than four non-coplanar points remain
 * after peeling.
 */
export function buildOverlay(name: string, samples: readonly MunsellColor[]): Overlay {
	const hull = innerHull(samples.map(toCartesian))
	const polyhedron = createPolyhedron(hull.vertices, hull.faces)
	return Object.freeze({ name, polyhedron, centroid: solidCentroid(polyhedron) })
}

export interface PolyhedronIndex {
	readonly names: readonly string[]
	get(name: string): Overlay | undefined
	/** Whether the named overlay contains a point; throws for unknown names */
	contains(name: string, point: Vec3): boolean
	/** Every overlay containing the point */
	matchingOverlays(point: Vec3): Set<string>
	/**
	 * The overlay whose centroid is closest to the point, searching `candidates`
	 * when given or every overlay otherwise.
	 */
	nearestOverlay(point: Vec3, candidates?: Iterable<string>): string | undefined
}

class PolyhedronIndexImpl implements PolyhedronIndex {
	readonly names: readonly string[]
	readonly #overlays: ReadonlyMap<string, Overlay>

	constructor(overlays: Iterable<Overlay>) {
		const byName = new Map<string, Overlay>()
		for (const overlay of overlays) {
			if (byName.has(overlay.name)) {
				throw new Error(`Duplicate overlay name '${overlay.name}'`)
			}
			byName.set(overlay.name, overlay)
		}
		this.#overlays = byName
		this.names = Object.freeze([...byName.keys()])
	}

	get(name: string): Overlay | undefined {
		return this.#overlays.get(name)
	}

	contains(name: string, point: Vec3): boolean {
		const overlay = this.#overlays.get(name)
		if (overlay === undefined) {
			throw new Error(`Unknown overlay '${name}'`)
		}
		return contains(overlay.polyhedron, point)
	}

	matchingOverlays(point: Vec3): Set<string> {
		const matches = new Set<string>()
		for (const overlay of this.#overlays.values()) {
			if (contains(overlay.polyhedron, point)) {
				matches.add(overlay.name)
			}
		}
		return matches
	}

	nearestOverlay(point: Vec3, candidates: Iterable<string> = this.names): string | undefined {
		let nearest: string | undefined
		let nearestDistance = Number.POSITIVE_INFINITY
		for (const name of candidates) {
			const overlay = this.#overlays.get(name)
			if (overlay === undefined) {
				continue
			}
			const d = distance(overlay.centroid, point)
			if (d < nearestDistance) {
				nearestDistance = d
				nearest = name
			}
		}
		return nearest
	}
}

export function createPolyhedronIndex(overlays: Iterable<Overlay>): PolyhedronIndex {
	return new PolyhedronIndexImpl(overlays)
}

/**
 * Read `{ overlays: { [name]: notation[] } }` into parsed samples per overlay.
 */
export function readOverlaySamples(data: unknown): Map<string, MunsellColor[]> {
	if (
		typeof data !== 'object' ||
		data === null ||
		!('overlays' in data) ||
		typeof data.overlays !== 'object' ||
		data.overlays === null
	) {
		throw new Error('Overlay data must be an object with an overlays map')
	}

	const entries: [string, unknown][] = Object.entries(data.overlays)
	const samples = new Map<string, MunsellColor[]>()
	for (const [name, notations] of entries) {
		if (!Array.isArray(notations)) {
			throw new Error(`Overlay '${name}' must list Munsell notations`)
		}
		const colors: MunsellColor[] = []
		const list: unknown[] = notations
		for (const notation of list) {
			if (typeof notation !== 'string') {
				throw new Error(`Overlay '${name}' contains a non-string sample`)
			}
			colors.push(parseMunsell(notation))
		}
		samples.set(name, colors)
	}
	return samples
}

let defaultIndex: PolyhedronIndex | undefined

/**
 * Overlays built from the bundled sample clouds, constructed on first use.
 */
export function getOverlayIndex(): PolyhedronIndex {
	if (defaultIndex === undefined) {
		const overlays = [...readOverlaySamples(overlayData)].map(([name, samples]) => buildOverlay(name, samples))
		defaultIndex = createPolyhedronIndex(overlays)
	}
	return defaultIndex
}
