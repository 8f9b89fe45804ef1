/**
 * A point or direction in 3D space.
 */
export type Vec3 = readonly [number, number, number]

/**
 * A point in a 2D plane.
 */
export type Vec2 = readonly [number, number]

/**
 * Triangle face as three vertex indices, counter-clockwise when viewed from outside.
 */
export type Face = readonly [number, number, number]

/**
 * Closed convex polyhedron with outward-oriented triangular faces.
 */
export interface Polyhedron {
	readonly vertices: readonly Vec3[]
	readonly faces: readonly Face[]
}

/**
 * Face plane in Hessian normal form: `normal · p = offset`, with a unit outward normal.
 */
export interface Plane {
	readonly normal: Vec3
	readonly offset: number
}
