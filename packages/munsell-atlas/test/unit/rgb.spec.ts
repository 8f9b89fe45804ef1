import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { AtlasError, InvalidChannelError, ParseError } from '../../src/errors.ts'
import { whitePoint } from '../../src/illuminants.ts'
import {
	createRgb,
	isRgbProfileName,
	parseHex,
	profileIlluminant,
	RGB_PROFILE_NAMES,
	rgbFrom8Bit,
	rgbToXyz,
	toHex,
	xyzToRgb,
} from '../../src/rgb.ts'

const channelArb = fc.double({ min: 0, max: 1, noNaN: true })

// =============================================================================
// Construction and hex
// =============================================================================

describe('createRgb', () => {
	it('defaults to sRGB', () => {
		expect(createRgb(0.1, 0.2, 0.3)).toEqual({ r: 0.1, g: 0.2, b: 0.3, profile: 'sRGB' })
	})

	it('rejects channels outside 0–1', () => {
		expect(() => createRgb(1.2, 0, 0)).toThrow("Channel 'r' must be a number in [0, 1], received 1.2")
		expect(() => createRgb(0, Number.NaN, 0)).toThrow(InvalidChannelError)
	})
})

describe('rgbFrom8Bit', () => {
	it('scales to 0–1', () => {
		expect(rgbFrom8Bit(255, 0, 51, 'P3')).toEqual({ r: 1, g: 0, b: 0.2, profile: 'P3' })
	})

	it('rejects non-integer and out-of-range channels', () => {
		expect(() => rgbFrom8Bit(256, 0, 0)).toThrow("Channel 'r' must be an integer in [0, 255], received 256")
		expect(() => rgbFrom8Bit(0, 12.5, 0)).toThrow(InvalidChannelError)
	})
})

describe('parseHex', () => {
	it('parses six-digit hex with or without #', () => {
		expect(parseHex('#BE0032')).toEqual({ r: 190 / 255, g: 0, b: 50 / 255, profile: 'sRGB' })
		expect(parseHex('be0032')).toEqual(parseHex('#BE0032'))
	})

	it('expands three-digit hex', () => {
		expect(parseHex('#f0a')).toEqual({ r: 1, g: 0, b: 170 / 255, profile: 'sRGB' })
	})

	it('rejects malformed hex', () => {
		for (const input of ['', '#12345', '#GGGGGG', '#1234567', 'red']) {
			expect(() => parseHex(input), input).toThrow(ParseError)
		}
		expect(() => parseHex('#12345')).toThrow("Cannot parse '#12345': expected #RGB or #RRGGBB")
	})
})

describe('toHex', () => {
	it('writes uppercase #RRGGBB', () => {
		expect(toHex(parseHex('#be0032'))).toBe('#BE0032')
		expect(toHex(createRgb(1, 0.5, 0))).toBe('#FF8000')
	})
})

describe('isRgbProfileName', () => {
	it('recognises the supported profiles', () => {
		expect(RGB_PROFILE_NAMES.every(isRgbProfileName)).toBe(true)
		expect(isRgbProfileName('srgb')).toBe(false)
	})
})

// =============================================================================
// XYZ
// =============================================================================

describe('rgbToXyz', () => {
	it('maps sRGB white to the D65 white point', () => {
		const xyz = rgbToXyz(createRgb(1, 1, 1))
		const [X, Y, Z] = whitePoint('D65')
		expect(xyz.illuminant).toBe('D65')
		expect(xyz.X).toBeCloseTo(X, 6)
		expect(xyz.Y).toBeCloseTo(Y, 6)
		expect(xyz.Z).toBeCloseTo(Z, 6)
	})

	it('tags ProPhoto with D50', () => {
		const xyz = rgbToXyz(createRgb(1, 1, 1, 'ProPhoto'))
		const [X, Y, Z] = whitePoint('D50')
		expect(profileIlluminant('ProPhoto')).toBe('D50')
		expect(xyz.illuminant).toBe('D50')
		expect(xyz.X).toBeCloseTo(X, 4)
		expect(xyz.Y).toBeCloseTo(Y, 4)
		expect(xyz.Z).toBeCloseTo(Z, 4)
	})

	it('maps black to zero', () => {
		const xyz = rgbToXyz(createRgb(0, 0, 0))
		expect(xyz.X).toBeCloseTo(0, 12)
		expect(xyz.Y).toBeCloseTo(0, 12)
		expect(xyz.Z).toBeCloseTo(0, 12)
	})
})

describe('xyzToRgb', () => {
	it('inverts rgbToXyz inside the gamut', () => {
		fc.assert(
			fc.property(
				channelArb,
				channelArb,
				channelArb,
				fc.constantFrom(...RGB_PROFILE_NAMES),
				(r, g, b, profile) => {
					const { rgb, wasClipped } = xyzToRgb(rgbToXyz(createRgb(r, g, b, profile)), profile)
					expect(wasClipped).toBe(false)
					expect(rgb.profile).toBe(profile)
					expect(rgb.r).toBeCloseTo(r, 6)
					expect(rgb.g).toBeCloseTo(g, 6)
					expect(rgb.b).toBeCloseTo(b, 6)
				},
			),
		)
	})

	it('clips and reports colours outside the gamut', () => {
		// Pure Y needs a negative red primary
		const { rgb, wasClipped } = xyzToRgb({ X: 0, Y: 1, Z: 0, illuminant: 'D65' })
		expect(wasClipped).toBe(true)
		expect(rgb.r).toBe(0)
		for (const channel of [rgb.r, rgb.g, rgb.b]) {
			expect(channel).toBeGreaterThanOrEqual(0)
			expect(channel).toBeLessThanOrEqual(1)
		}
	})

	it('requires XYZ under the profile white', () => {
		const call = () => xyzToRgb({ X: 0.98, Y: 1, Z: 1.18, illuminant: 'C' })
		expect(call).toThrow(AtlasError)
		expect(call).toThrow('sRGB expects XYZ under D65, received C; adapt it first')
	})

	it('rejects non-finite XYZ', () => {
		expect(() => xyzToRgb({ X: Number.POSITIVE_INFINITY, Y: 0, Z: 0, illuminant: 'D65' })).toThrow(
			InvalidChannelError,
		)
	})
})
