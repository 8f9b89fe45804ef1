/**
 * Point-in-polyhedron tests for closed convex polyhedra.
 */

import type { Face, Plane, Polyhedron, Vec3 } from './types.ts'
import { centroid, cross, dot, extent, length, scale, subtract } from './vector.ts'

/**
 * Default boundary tolerance; points this close outside a face still count as contained.
 */
export const CONTAINMENT_EPSILON = 1e-9

const planeCache = new WeakMap<Polyhedron, readonly Plane[]>()

function facePlane(vertices: readonly Vec3[], face: Face): Plane {
	const a = vertices[face[0]]
	const n = cross(subtract(vertices[face[1]], a), subtract(vertices[face[2]], a))
	const len = length(n)
	if (len === 0) {
		throw new Error(`Face [${face.join(', ')}] is degenerate`)
	}
	const normal = scale(n, 1 / len)
	return { normal, offset: dot(normal, a) }
}

/**
 * Outward face planes of a polyhedron. Results are cached per polyhedron instance.
 */
export function facePlanes(polyhedron: Polyhedron): readonly Plane[] {
	const cached = planeCache.get(polyhedron)
	if (cached !== undefined) {
		return cached
	}

	const planes = polyhedron.faces.map((face) => facePlane(polyhedron.vertices, face))
	planeCache.set(polyhedron, planes)
	return planes
}

/**
 * Largest signed distance from the point to any face plane.
 * Negative inside, zero on the boundary, positive outside.
 */
export function signedDistance(polyhedron: Polyhedron, point: Vec3): number {
	let result = Number.NEGATIVE_INFINITY
	for (const plane of facePlanes(polyhedron)) {
		result = Math.max(result, dot(plane.normal, point) - plane.offset)
	}
	return result
}

/**
 * Whether the point lies inside the polyhedron or within `epsilon` of its boundary.
 * Convexity is assumed, not re-verified.
 */
export function contains(
	polyhedron: Polyhedron,
	point: Vec3,
	epsilon: number = CONTAINMENT_EPSILON,
): boolean {
	for (const plane of facePlanes(polyhedron)) {
		if (dot(plane.normal, point) - plane.offset > epsilon) {
			return false
		}
	}
	return true
}

function validateClosed(faces: readonly Face[]): void {
	const edges = new Map<string, number>()
	for (const [i, j, k] of faces) {
		for (const [from, to] of [
			[i, j],
			[j, k],
			[k, i],
		] as const) {
			const key = `${from}:${to}`
			edges.set(key, (edges.get(key) ?? 0) + 1)
		}
	}

	for (const [key, count] of edges) {
		const [from, to] = key.split(':')
		if (count !== 1 || edges.get(`${to}:${from}`) !== 1) {
			throw new Error(
				`Polyhedron is not closed: edge ${from}→${to} must appear once in each direction`,
			)
		}
	}
}

/**
 * Check that a vertex/face list describes a closed convex polyhedron with outward normals.
 * Throws a descriptive error on the first violation found.
 */
export function validatePolyhedron(polyhedron: Polyhedron): void {
	const { vertices, faces } = polyhedron
	if (vertices.length < 4 || faces.length < 4) {
		throw new Error(
			`Polyhedron needs at least 4 vertices and 4 faces, received ${vertices.length} and ${faces.length}`,
		)
	}

	for (const face of faces) {
		for (const index of face) {
			if (!Number.isInteger(index) || index < 0 || index >= vertices.length) {
				throw new Error(`Face [${face.join(', ')}] references a missing vertex`)
			}
		}
	}

	validateClosed(faces)

	const tolerance = CONTAINMENT_EPSILON * Math.max(extent(vertices), 1)
	const center = centroid(vertices)
	for (const [index, plane] of facePlanes(polyhedron).entries()) {
		if (dot(plane.normal, center) - plane.offset >= 0) {
			throw new Error(`Face ${index} is oriented inward`)
		}
		for (const v of vertices) {
			if (dot(plane.normal, v) - plane.offset > tolerance) {
				throw new Error(`Polyhedron is not convex: a vertex lies outside face ${index}`)
			}
		}
	}
}

/**
 * Centroid of the solid bounded by the polyhedron, summed over the tetrahedra
 * each face spans with the vertex mean.
 */
export function solidCentroid(polyhedron: Polyhedron): Vec3 {
	const { vertices, faces } = polyhedron
	const apex = centroid(vertices)
	let volume = 0
	let x = 0
	let y = 0
	let z = 0
	for (const [i, j, k] of faces) {
		const a = vertices[i]
		const b = vertices[j]
		const c = vertices[k]
		const v = dot(subtract(a, apex), cross(subtract(b, apex), subtract(c, apex))) / 6
		volume += v
		x += (v * (apex[0] + a[0] + b[0] + c[0])) / 4
		y += (v * (apex[1] + a[1] + b[1] + c[1])) / 4
		z += (v * (apex[2] + a[2] + b[2] + c[2])) / 4
	}
	if (volume <= 0) {
		throw new Error('Cannot compute the solid centroid of a polyhedron without volume')
	}
	return [x / volume, y / volume, z / volume]
}

/**
 * Validate and freeze a polyhedron loaded from precomputed vertex and face lists.
 */
export function createPolyhedron(vertices: readonly Vec3[], faces: readonly Face[]): Polyhedron {
	const polyhedron: Polyhedron = Object.freeze({
		vertices: Object.freeze([...vertices]),
		faces: Object.freeze([...faces]),
	})
	validatePolyhedron(polyhedron)
	return polyhedron
}
