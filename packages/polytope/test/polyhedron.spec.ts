import { describe, expect, it } from 'vitest'
import {
	contains,
	createPolyhedron,
	type Face,
	facePlanes,
	outerHull,
	signedDistance,
	solidCentroid,
	type Vec3,
} from '../src/index.ts'

const tetraVertices: Vec3[] = [
	[0, 0, 0],
	[1, 0, 0],
	[0, 1, 0],
	[0, 0, 1],
]

// Counter-clockwise seen from outside
const tetraFaces: Face[] = [
	[0, 2, 1],
	[0, 1, 3],
	[0, 3, 2],
	[1, 2, 3],
]

describe('createPolyhedron', () => {
	it('accepts a closed outward-oriented tetrahedron', () => {
		const tetra = createPolyhedron(tetraVertices, tetraFaces)

		expect(tetra.vertices).toHaveLength(4)
		expect(Object.isFrozen(tetra)).toBe(true)
	})

	it('rejects inward faces', () => {
		const flipped = tetraFaces.map(([a, b, c]): Face => [a, c, b])

		expect(() => createPolyhedron(tetraVertices, flipped)).toThrow('oriented inward')
	})

	it('rejects open surfaces', () => {
		expect(() => createPolyhedron(tetraVertices, [...tetraFaces.slice(0, 3), [0, 1, 2]])).toThrow(
			'not closed',
		)
	})

	it('rejects faces that reference missing vertices', () => {
		expect(() => createPolyhedron(tetraVertices, [...tetraFaces.slice(0, 3), [1, 2, 7]])).toThrow(
			'missing vertex',
		)
	})

	it('rejects non-convex vertex sets', () => {
		// A dent: vertex 4 sits inside the tetrahedron but is wired in as a hull vertex
		const vertices: Vec3[] = [...tetraVertices, [0.2, 0.2, 0.2]]
		const faces: Face[] = [
			[0, 2, 1],
			[0, 1, 3],
			[0, 3, 2],
			[1, 2, 4],
			[2, 3, 4],
			[3, 1, 4],
		]

		expect(() => createPolyhedron(vertices, faces)).toThrow()
	})
})

describe('contains', () => {
	const tetra = createPolyhedron(tetraVertices, tetraFaces)

	it('contains interior points', () => {
		expect(contains(tetra, [0.1, 0.1, 0.1])).toBe(true)
	})

	it('contains every vertex', () => {
		for (const v of tetra.vertices) {
			expect(contains(tetra, v)).toBe(true)
		}
	})

	it('treats points within epsilon of a face as contained', () => {
		expect(contains(tetra, [0.25, 0.25, -1e-12])).toBe(true)
		expect(contains(tetra, [0.25, 0.25, -1e-3])).toBe(false)
		expect(contains(tetra, [0.25, 0.25, -1e-3], 1e-2)).toBe(true)
	})

	it('rejects exterior points', () => {
		expect(contains(tetra, [1, 1, 1])).toBe(false)
		expect(contains(tetra, [-0.1, 0.1, 0.1])).toBe(false)
	})
})

describe('signedDistance', () => {
	const tetra = createPolyhedron(tetraVertices, tetraFaces)

	it('is negative inside and positive outside', () => {
		expect(signedDistance(tetra, [0.1, 0.1, 0.1])).toBeCloseTo(-0.1)
		expect(signedDistance(tetra, [0.2, 0.2, -0.5])).toBeCloseTo(0.5)
	})

	it('caches face planes per polyhedron', () => {
		expect(facePlanes(tetra)).toBe(facePlanes(tetra))
		expect(facePlanes(tetra)).toHaveLength(4)
	})
})

describe('solidCentroid', () => {
	it('matches the vertex mean of a tetrahedron', () => {
		const [x, y, z] = solidCentroid(createPolyhedron(tetraVertices, tetraFaces))
		expect(x).toBeCloseTo(0.25, 12)
		expect(y).toBeCloseTo(0.25, 12)
		expect(z).toBeCloseTo(0.25, 12)
	})

	it('weights by volume rather than by vertex', () => {
		// Cube [-1, 1]³ with a pyramid of height 2 on top: volumes 8 and 8/3
		const house: Vec3[] = [[0, 0, 3]]
		for (const x of [-1, 1]) {
			for (const y of [-1, 1]) {
				for (const z of [-1, 1]) {
					house.push([x, y, z])
				}
			}
		}
		const [x, y, z] = solidCentroid(outerHull(house))
		expect(x).toBeCloseTo(0, 12)
		expect(y).toBeCloseTo(0, 12)
		expect(z).toBeCloseTo(0.125, 12)
	})
})
