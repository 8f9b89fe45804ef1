/**
 * Incremental 3D convex hull construction and single-layer outlier peeling.
 */

import { InsufficientDataError } from './errors.ts'
import type { Face, Polyhedron, Vec3 } from './types.ts'
import { cross, dot, equals, extent, length, scale, subtract } from './vector.ts'

/**
 * Relative tolerance for visibility and degeneracy tests, scaled by the point cloud extent.
 */
const RELATIVE_EPSILON = 1e-9

function faceDistance(points: readonly Vec3[], face: Face, p: Vec3): number {
	const a = points[face[0]]
	const normal = cross(subtract(points[face[1]], a), subtract(points[face[2]], a))
	return dot(normal, subtract(p, a)) / length(normal)
}

function farthestFrom(points: readonly Vec3[], measure: (p: Vec3) => number): number {
	let best = 0
	let bestDistance = Number.NEGATIVE_INFINITY
	for (const [index, p] of points.entries()) {
		const d = measure(p)
		if (d > bestDistance) {
			bestDistance = d
			best = index
		}
	}
	return best
}

/**
 * Pick four affinely independent points to seed the hull.
 * Throws when the cloud is collinear or coplanar.
 */
function initialSimplex(points: readonly Vec3[], epsilon: number): [number, number, number, number] {
	const origin = points[0]
	const i1 = farthestFrom(points, (p) => length(subtract(p, origin)))
	const axis = subtract(points[i1], origin)
	if (length(axis) <= epsilon) {
		throw new InsufficientDataError('All points coincide; a hull needs volume', points.length)
	}

	const i2 = farthestFrom(points, (p) => length(cross(axis, subtract(p, origin))))
	const normal = cross(axis, subtract(points[i2], origin))
	if (length(normal) / length(axis) <= epsilon) {
		throw new InsufficientDataError('All points are collinear; a hull needs volume', points.length)
	}

	const i3 = farthestFrom(points, (p) => Math.abs(dot(normal, subtract(p, origin))))
	if (Math.abs(dot(normal, subtract(points[i3], origin))) / length(normal) <= epsilon) {
		throw new InsufficientDataError('All points are coplanar; a hull needs volume', points.length)
	}

	return [0, i1, i2, i3]
}

function edgeKey(from: number, to: number, count: number): number {
	return from * count + to
}

/**
 * Triangulated hull faces over indices into `points`. Points that never see a
 * face stay out; points accepted early may remain on faces they end up coplanar with.
 */
function incrementalHull(points: readonly Vec3[], epsilon: number): Face[] {
	const [a, b, c, d] = initialSimplex(points, epsilon)

	let faces: Face[] = [
		[a, b, c],
		[a, c, d],
		[a, d, b],
		[b, d, c],
	]
	if (faceDistance(points, [a, b, c], points[d]) > 0) {
		faces = faces.map(([i, j, k]): Face => [i, k, j])
	}

	const seeds = new Set([a, b, c, d])
	const count = points.length

	for (const [index, p] of points.entries()) {
		if (seeds.has(index)) {
			continue
		}

		const visible = new Set<Face>()
		for (const face of faces) {
			if (faceDistance(points, face, p) > epsilon) {
				visible.add(face)
			}
		}
		if (visible.size === 0) {
			continue
		}

		// Directed edges of the visible region; an edge without its reverse lies on the horizon
		const edges = new Set<number>()
		for (const [i, j, k] of visible) {
			edges.add(edgeKey(i, j, count))
			edges.add(edgeKey(j, k, count))
			edges.add(edgeKey(k, i, count))
		}

		const next: Face[] = faces.filter((face) => !visible.has(face))
		for (const [i, j, k] of visible) {
			for (const [from, to] of [
				[i, j],
				[j, k],
				[k, i],
			] as const) {
				if (!edges.has(edgeKey(to, from, count))) {
					next.push([from, to, index])
				}
			}
		}
		faces = next
	}

	return faces
}

/**
 * Indices of the hull's strictly extreme vertices.
 *
 * A vertex is extreme when every other vertex lies strictly below it along the
 * summed normals of its incident faces. Points inside a face or on an edge have
 * a neighbour at zero height along that direction and are dropped.
 */
function extremeVertices(points: readonly Vec3[], faces: readonly Face[], epsilon: number): number[] {
	const normals = new Map<number, Vec3>()
	for (const face of faces) {
		const a = points[face[0]]
		const n = cross(subtract(points[face[1]], a), subtract(points[face[2]], a))
		const unit = scale(n, 1 / length(n))
		for (const i of face) {
			const sum = normals.get(i) ?? [0, 0, 0]
			normals.set(i, [sum[0] + unit[0], sum[1] + unit[1], sum[2] + unit[2]])
		}
	}

	const used = [...normals.keys()].sort((x, y) => x - y)
	return used.filter((v) => {
		const sum = normals.get(v) ?? [0, 0, 0]
		const size = length(sum)
		if (size <= epsilon) {
			return false
		}
		const direction = scale(sum, 1 / size)
		return used.every((u) => u === v || dot(direction, subtract(points[u], points[v])) < -epsilon)
	})
}

/**
 * Build the convex hull of a point cloud.
 * Requires at least four non-coplanar points, otherwise throws `InsufficientDataError`.
 * Only extreme points become vertices: points on a face or an edge are left out
 * regardless of input order. Returned vertices keep their relative input order;
 * faces point outward.
 */
export function outerHull(points: readonly Vec3[]): Polyhedron {
	if (points.length < 4) {
		throw new InsufficientDataError(
			`A convex hull needs at least 4 points, received ${points.length}`,
			points.length,
		)
	}

	const epsilon = RELATIVE_EPSILON * Math.max(extent(points), 1)
	let faces = incrementalHull(points, epsilon)

	const extreme = extremeVertices(points, faces, epsilon)
	if (extreme.length < new Set(faces.flat()).size) {
		const subset = extreme.map((i) => points[i])
		faces = incrementalHull(subset, epsilon).map(([i, j, k]): Face => [extreme[i], extreme[j], extreme[k]])
	}

	const used = [...new Set(faces.flat())].sort((x, y) => x - y)
	const remap = new Map(used.map((original, compact): [number, number] => [original, compact]))
	const lookup = (i: number): number => {
		const compact = remap.get(i)
		if (compact === undefined) {
			throw new Error(`Hull face references unknown vertex ${i}`)
		}
		return compact
	}

	return {
		vertices: used.map((i) => points[i]),
		faces: faces.map(([i, j, k]): Face => [lookup(i), lookup(j), lookup(k)]),
	}
}

/**
 * Peel one layer of outliers: build the outer hull, drop every input point that
 * equals one of its extreme vertices, and return the hull of what remains.
 * Exactly one peel is performed.
 */
export function innerHull(points: readonly Vec3[]): Polyhedron {
	const outer = outerHull(points)
	const remaining = points.filter((p) => !outer.vertices.some((v) => equals(v, p)))
	return outerHull(remaining)
}
