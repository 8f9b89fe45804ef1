import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { HUE_FAMILIES } from '../../src/constants.ts'
import { InvalidChannelError, ParseError } from '../../src/errors.ts'
import {
	colorFromHuePosition,
	createMunsellColor,
	createNeutral,
	formatMunsell,
	huePosition,
	parseMunsell,
} from '../../src/munsell.ts'
import type { MunsellColor } from '../../src/types.ts'

function position(color: MunsellColor): number {
	return color.kind === 'neutral' ? 0 : huePosition(color)
}

function hueGap(a: number, b: number): number {
	const d = Math.abs(a - b)
	return Math.min(d, 100 - d)
}

// =============================================================================
// Construction
// =============================================================================

describe('createMunsellColor', () => {
	it('normalises hue number 10 to 0 of the next family', () => {
		expect(createMunsellColor('YR', 10, 5, 6)).toEqual({
			kind: 'chromatic',
			family: 'Y',
			hueNumber: 0,
			value: 5,
			chroma: 6,
		})
		expect(createMunsellColor('RP', 10, 5, 6)).toMatchObject({ family: 'R', hueNumber: 0 })
	})

	it('collapses chroma 0 to a neutral', () => {
		expect(createMunsellColor('B', 5, 4, 0)).toEqual({ kind: 'neutral', value: 4 })
	})

	it('rejects components outside their domains', () => {
		expect(() => createMunsellColor('R', 10.5, 5, 6)).toThrow(InvalidChannelError)
		expect(() => createMunsellColor('R', 5, 10.5, 6)).toThrow("Channel 'value' must be a number in [0, 10]")
		expect(() => createMunsellColor('R', 5, 5, -1)).toThrow("Channel 'chroma' must be a non-negative number")
		expect(() => createNeutral(Number.NaN)).toThrow(InvalidChannelError)
	})

	it('returns frozen colours', () => {
		expect(Object.isFrozen(createMunsellColor('G', 5, 5, 4))).toBe(true)
		expect(Object.isFrozen(createNeutral(5))).toBe(true)
	})
})

describe('huePosition', () => {
	it('places 0R at 0 and each family ten units apart', () => {
		expect(huePosition({ kind: 'chromatic', family: 'R', hueNumber: 0, value: 5, chroma: 2 })).toBe(0)
		expect(huePosition({ kind: 'chromatic', family: 'Y', hueNumber: 5, value: 5, chroma: 2 })).toBe(25)
		expect(huePosition({ kind: 'chromatic', family: 'PB', hueNumber: 7.5, value: 5, chroma: 2 })).toBe(77.5)
		expect(huePosition({ kind: 'chromatic', family: 'RP', hueNumber: 9, value: 5, chroma: 2 })).toBe(99)
	})
})

describe('colorFromHuePosition', () => {
	it('wraps positions onto the circle', () => {
		expect(colorFromHuePosition(-2.5, 5, 4)).toMatchObject({ family: 'RP', hueNumber: 7.5 })
		expect(colorFromHuePosition(100, 5, 4)).toMatchObject({ family: 'R', hueNumber: 0 })
		expect(colorFromHuePosition(137.5, 5, 4)).toMatchObject({ family: 'GY', hueNumber: 7.5 })
	})

	it('inverts huePosition', () => {
		fc.assert(
			fc.property(
				fc.double({ min: 0, max: 99.999, noNaN: true }),
				fc.double({ min: 0.1, max: 30, noNaN: true }),
				(hue, chroma) => {
					const color = colorFromHuePosition(hue, 5, chroma)
					expect(color.kind).toBe('chromatic')
					expect(position(color)).toBeCloseTo(hue, 9)
				},
			),
		)
	})
})

// =============================================================================
// Notation
// =============================================================================

describe('parseMunsell', () => {
	it('parses chromatic notation', () => {
		expect(parseMunsell('5R 4/14')).toEqual({
			kind: 'chromatic',
			family: 'R',
			hueNumber: 5,
			value: 4,
			chroma: 14,
		})
		expect(parseMunsell(' 2.5pb 3.25 / 8.5 ')).toEqual({
			kind: 'chromatic',
			family: 'PB',
			hueNumber: 2.5,
			value: 3.25,
			chroma: 8.5,
		})
	})

	it('normalises 10 to the next family', () => {
		expect(parseMunsell('10YR 5/6')).toMatchObject({ family: 'Y', hueNumber: 0 })
	})

	it('parses neutral notation', () => {
		expect(parseMunsell('N 5')).toEqual({ kind: 'neutral', value: 5 })
		expect(parseMunsell('N5/')).toEqual({ kind: 'neutral', value: 5 })
		expect(parseMunsell('n 9.5/0')).toEqual({ kind: 'neutral', value: 9.5 })
	})

	it('treats a zero chroma as neutral', () => {
		expect(parseMunsell('5R 4/0')).toEqual({ kind: 'neutral', value: 4 })
	})

	it('rejects unknown families', () => {
		expect(() => parseMunsell('5PR 4/6')).toThrow(ParseError)
		expect(() => parseMunsell('5PR 4/6')).toThrow("unknown hue family 'PR'")
	})

	it('rejects malformed input', () => {
		for (const input of ['', '5R', '5R 4', 'R 4/6', '5R 4/6/2', 'N', 'N 5/2']) {
			expect(() => parseMunsell(input), input).toThrow(ParseError)
		}
	})

	it('reports the offending input', () => {
		try {
			parseMunsell('hello')
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(ParseError)
			if (error instanceof ParseError) {
				expect(error.code).toBe('ParseError')
				expect(error.input).toBe('hello')
			}
		}
	})

	it('rejects out-of-range components with InvalidChannel', () => {
		expect(() => parseMunsell('5R 11/4')).toThrow(InvalidChannelError)
		expect(() => parseMunsell('12R 5/4')).toThrow(InvalidChannelError)
	})
})

describe('formatMunsell', () => {
	it('writes one decimal per component', () => {
		expect(formatMunsell(parseMunsell('5R 4/14'))).toBe('5.0R 4.0/14.0')
		expect(formatMunsell(createNeutral(5.25))).toBe('N 5.3')
	})

	it('writes a hue rounding to 10.0 as 0.0 of the next family', () => {
		expect(formatMunsell(createMunsellColor('R', 9.96, 5, 6))).toBe('0.0YR 5.0/6.0')
		expect(formatMunsell(createMunsellColor('RP', 9.99, 5, 6))).toBe('0.0R 5.0/6.0')
	})

	it('writes a chroma rounding to zero as neutral', () => {
		expect(formatMunsell(createMunsellColor('G', 5, 5, 0.04))).toBe('N 5.0')
	})

	it('round-trips through parseMunsell within rounding', () => {
		fc.assert(
			fc.property(
				fc.constantFrom(...HUE_FAMILIES),
				fc.double({ min: 0, max: 10, noNaN: true }),
				fc.double({ min: 0, max: 10, noNaN: true }),
				fc.double({ min: 0.1, max: 40, noNaN: true }),
				(family, hueNumber, value, chroma) => {
					const color = createMunsellColor(family, hueNumber, value, chroma)
					const parsed = parseMunsell(formatMunsell(color))
					expect(parsed.kind).toBe('chromatic')
					expect(hueGap(position(parsed), position(color))).toBeLessThanOrEqual(0.0501)
					expect(Math.abs(parsed.value - value)).toBeLessThanOrEqual(0.0501)
					if (parsed.kind === 'chromatic' && color.kind === 'chromatic') {
						expect(Math.abs(parsed.chroma - chroma)).toBeLessThanOrEqual(0.0501)
					}
				},
			),
		)
	})
})
