export { InsufficientDataError } from './errors.ts'
export { innerHull, outerHull } from './hull.ts'
export { polygonContains, polygonDistance } from './polygon.ts'
export {
	CONTAINMENT_EPSILON,
	contains,
	createPolyhedron,
	facePlanes,
	signedDistance,
	solidCentroid,
	validatePolyhedron,
} from './polyhedron.ts'
export type { Face, Plane, Polyhedron, Vec2, Vec3 } from './types.ts'
export { centroid, distance } from './vector.ts'
