import { InsufficientDataError } from '@munsell-atlas/polytope'
import { describe, expect, it } from 'vitest'
import { toCartesian } from '../../src/cartesian.ts'
import { colorFromHuePosition, createNeutral, parseMunsell } from '../../src/munsell.ts'
import {
	buildOverlay,
	createPolyhedronIndex,
	getOverlayIndex,
	type Overlay,
	readOverlaySamples,
} from '../../src/overlays.ts'
import type { MunsellColor } from '../../src/types.ts'

const index = getOverlayIndex()

function point(notation: string) {
	return toCartesian(parseMunsell(notation))
}

function overlay(name: string): Overlay {
	const found = index.get(name)
	if (found === undefined) {
		throw new Error(`missing overlay ${name}`)
	}
	return found
}

// =============================================================================
// Bundled overlays
// =============================================================================

describe('getOverlayIndex', () => {
	it('builds all twenty overlays once', () => {
		expect(getOverlayIndex()).toBe(index)
		expect(index.names).toEqual([
			'aqua',
			'beige',
			'coral',
			'fuchsia',
			'gold',
			'lavender',
			'lilac',
			'magenta',
			'mauve',
			'navy',
			'peach',
			'rose',
			'rust',
			'sand',
			'tan',
			'taupe',
			'teal',
			'turquoise',
			'violet',
			'wine',
		])
	})

	it('contains its own solid centroid', () => {
		for (const name of index.names) {
			expect(index.contains(name, overlay(name).centroid)).toBe(true)
		}
	})
})

describe('matchingOverlays', () => {
	it.each([
		['9.3R 3.9/7.4', ['rust']],
		['7.6YR 6.3/3.1', ['beige', 'sand']],
		['8.0P 5.6/4.8', ['lilac', 'mauve']],
		['5.6R 3.9/14.9', []],
		['3.3PB 4.1/6.8', []],
	])('matches %s', (notation, expected) => {
		expect([...index.matchingOverlays(point(notation))].sort()).toEqual(expected)
	})

	it('reports overlapping overlays', () => {
		expect([...index.matchingOverlays(overlay('lilac').centroid)].sort()).toEqual(['lavender', 'lilac', 'mauve'])
		expect([...index.matchingOverlays(overlay('lavender').centroid)].sort()).toEqual(['lavender', 'lilac'])
		expect([...index.matchingOverlays(overlay('sand').centroid)].sort()).toEqual(['beige', 'gold', 'sand'])
		expect([...index.matchingOverlays(overlay('magenta').centroid)]).toEqual(['magenta'])
		expect([...index.matchingOverlays(overlay('navy').centroid)]).toEqual(['navy'])
	})

	it('matches nothing on the neutral axis far from every cloud', () => {
		expect(index.matchingOverlays(toCartesian(createNeutral(9.9))).size).toBe(0)
	})
})

describe('nearestOverlay', () => {
	it('picks the closest centroid among the candidates', () => {
		const p = point('7.6YR 6.3/3.1')
		expect(index.nearestOverlay(p, index.matchingOverlays(p))).toBe('sand')
		expect(index.nearestOverlay(point('8.0P 5.6/4.8'), ['lilac', 'mauve'])).toBe('lilac')
	})

	it('searches every overlay without candidates', () => {
		expect(index.nearestOverlay(point('9.3R 3.9/7.4'))).toBe('rust')
	})

	it('ignores unknown candidates', () => {
		expect(index.nearestOverlay(point('9.3R 3.9/7.4'), ['nothing'])).toBeUndefined()
	})
})

describe('contains', () => {
	it('throws for unknown names', () => {
		expect(() => index.contains('chartreuse', [0, 0, 5])).toThrow("Unknown overlay 'chartreuse'")
	})
})

// =============================================================================
// Construction
// =============================================================================

// Two octagonal rings at chroma 4 around two inner rings at chroma 2
function ringSamples(): MunsellColor[] {
	const samples: MunsellColor[] = []
	for (let k = 0; k < 8; k++) {
		for (const [value, chroma] of [
			[3, 4],
			[7, 4],
			[4, 2],
			[6, 2],
		] as const) {
			samples.push(colorFromHuePosition(k * 12.5, value, chroma))
		}
	}
	return samples
}

describe('buildOverlay', () => {
	it('keeps the inner layer after one peel', () => {
		const ring = buildOverlay('ring', ringSamples())
		expect(ring.polyhedron.vertices).toHaveLength(16)
		expect(ring.centroid[0]).toBeCloseTo(0, 12)
		expect(ring.centroid[1]).toBeCloseTo(0, 12)
		expect(ring.centroid[2]).toBeCloseTo(5, 12)

		const single = createPolyhedronIndex([ring])
		expect(single.contains('ring', [0, 0, 5])).toBe(true)
		expect(single.contains('ring', [1.5, 0, 5])).toBe(true)
		expect(single.contains('ring', [0, 0, 3.5])).toBe(false)
	})

	it('needs four points left after peeling', () => {
		const samples = [
			...[0, 25, 50, 75].flatMap((hue) => [colorFromHuePosition(hue, 3, 4), colorFromHuePosition(hue, 7, 4)]),
			createNeutral(5),
			colorFromHuePosition(0, 5, 1),
		]
		expect(() => buildOverlay('thin', samples)).toThrow(InsufficientDataError)
		expect(() => buildOverlay('thin', samples)).toThrow('A convex hull needs at least 4 points, received 2')
	})
})

describe('createPolyhedronIndex', () => {
	it('rejects duplicate names', () => {
		const ring = buildOverlay('ring', ringSamples())
		expect(() => createPolyhedronIndex([ring, ring])).toThrow("Duplicate overlay name 'ring'")
	})
})

describe('readOverlaySamples', () => {
	it('parses notations per overlay', () => {
		const samples = readOverlaySamples({ overlays: { grey: ['N5/', '5R 5/2'] } })
		expect(samples.get('grey')).toEqual([
			{ kind: 'neutral', value: 5 },
			parseMunsell('5R 5/2'),
		])
	})

	it('rejects malformed data', () => {
		expect(() => readOverlaySamples([])).toThrow('Overlay data must be an object with an overlays map')
		expect(() => readOverlaySamples({ overlays: { grey: 'N5' } })).toThrow(
			"Overlay 'grey' must list Munsell notations",
		)
		expect(() => readOverlaySamples({ overlays: { grey: [5] } })).toThrow(
			"Overlay 'grey' contains a non-string sample",
		)
	})
})
