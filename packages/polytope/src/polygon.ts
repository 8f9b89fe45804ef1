/**
 * Planar polygon membership and distance.
 */

import type { Vec2 } from './types.ts'

// Edges lying on an axis (coordinate 0) are closed, so `[0, max]` holds where a polygon starts at 0
function onZeroEdge(polygon: readonly Vec2[], point: Vec2): boolean {
	for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
		for (const axis of [0, 1] as const) {
			const other = 1 - axis
			if (point[axis] !== 0 || polygon[i][axis] !== 0 || polygon[j][axis] !== 0) {
				continue
			}
			const low = Math.min(polygon[i][other], polygon[j][other])
			const high = Math.max(polygon[i][other], polygon[j][other])
			if ((low < point[other] || (low === 0 && point[other] === 0)) && point[other] <= high) {
				return true
			}
		}
	}
	return false
}

/**
 * Even-odd point-in-polygon test.
 *
 * Boundaries are half-open toward the origin: for an axis-aligned rectangle the
 * point is inside when `min < coordinate <= max` on both axes. Ray casting with
 * `[min, max)` semantics is run on negated coordinates to get that orientation.
 * Edges on an axis are the exception and count as inside, so a polygon reaching
 * chroma or value 0 covers `[0, max]` on that axis.
 */
export function polygonContains(polygon: readonly Vec2[], point: Vec2): boolean {
	if ((point[0] === 0 || point[1] === 0) && onZeroEdge(polygon, point)) {
		return true
	}

	const px = -point[0]
	const py = -point[1]
	let inside = false

	for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
		const xi = -polygon[i][0]
		const yi = -polygon[i][1]
		const xj = -polygon[j][0]
		const yj = -polygon[j][1]

		if (yi > py !== yj > py && px < ((xj - xi) * (py - yi)) / (yj - yi) + xi) {
			inside = !inside
		}
	}

	return inside
}

function segmentDistance(point: Vec2, a: Vec2, b: Vec2): number {
	const dx = b[0] - a[0]
	const dy = b[1] - a[1]
	const lengthSquared = dx * dx + dy * dy
	const t =
		lengthSquared === 0
			? 0
			: Math.max(0, Math.min(1, ((point[0] - a[0]) * dx + (point[1] - a[1]) * dy) / lengthSquared))
	return Math.hypot(point[0] - a[0] - t * dx, point[1] - a[1] - t * dy)
}

/**
 * Shortest distance from the point to any edge (or vertex) of the polygon outline.
 */
export function polygonDistance(polygon: readonly Vec2[], point: Vec2): number {
	let result = Number.POSITIVE_INFINITY
	for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
		result = Math.min(result, segmentDistance(point, polygon[j], polygon[i]))
	}
	return result
}
