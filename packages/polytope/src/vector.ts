import type { Vec3 } from './types.ts'

export function subtract(a: Vec3, b: Vec3): Vec3 {
	return [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
}

export function cross(a: Vec3, b: Vec3): Vec3 {
	return [a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]]
}

export function dot(a: Vec3, b: Vec3): number {
	return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]
}

export function length(a: Vec3): number {
	return Math.sqrt(dot(a, a))
}

export function distance(a: Vec3, b: Vec3): number {
	return length(subtract(a, b))
}

export function scale(a: Vec3, factor: number): Vec3 {
	return [a[0] * factor, a[1] * factor, a[2] * factor]
}

export function equals(a: Vec3, b: Vec3): boolean {
	return a[0] === b[0] && a[1] === b[1] && a[2] === b[2]
}

/**
 * Arithmetic mean of a non-empty point set.
 */
export function centroid(points: readonly Vec3[]): Vec3 {
	if (points.length === 0) {
		throw new Error('Cannot compute the centroid of an empty point set')
	}
	let x = 0
	let y = 0
	let z = 0
	for (const p of points) {
		x += p[0]
		y += p[1]
		z += p[2]
	}
	return [x / points.length, y / points.length, z / points.length]
}

/**
 * Largest axis-aligned extent of a point set, used to scale geometric tolerances.
 */
export function extent(points: readonly Vec3[]): number {
	if (points.length === 0) {
		return 0
	}
	const min = [...points[0]]
	const max = [...points[0]]
	for (const p of points) {
		for (let axis = 0; axis < 3; axis++) {
			min[axis] = Math.min(min[axis], p[axis])
			max[axis] = Math.max(max[axis], p[axis])
		}
	}
	return Math.max(max[0] - min[0], max[1] - min[1], max[2] - min[2])
}
