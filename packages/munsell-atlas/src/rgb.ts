/**
 * RGB profile ↔ CIE XYZ conversion with gamut-clip reporting.
 */

import _Color from 'colorjs.io'
import { CLIP_EPSILON } from './constants.ts'
import { AtlasError, InvalidChannelError, ParseError } from './errors.ts'
import type { IlluminantName, RgbColor, RgbProfileName, Xyz } from './types.ts'
import { clamp } from './util.ts'

interface RgbProfile {
	/** colorjs.io space id of the gamma-encoded space */
	readonly encoded: string
	/** colorjs.io space id of the linear-light space */
	readonly linear: string
	/** colorjs.io XYZ space sharing the profile's white */
	readonly xyz: string
	readonly illuminant: IlluminantName
}

const PROFILES: Readonly<Record<RgbProfileName, RgbProfile>> = {
	sRGB: { encoded: 'srgb', linear: 'srgb-linear', xyz: 'xyz-d65', illuminant: 'D65' },
	P3: { encoded: 'p3', linear: 'p3-linear', xyz: 'xyz-d65', illuminant: 'D65' },
	AdobeRGB: { encoded: 'a98rgb', linear: 'a98rgb-linear', xyz: 'xyz-d65', illuminant: 'D65' },
	Rec2020: { encoded: 'rec2020', linear: 'rec2020-linear', xyz: 'xyz-d65', illuminant: 'D65' },
	ProPhoto: { encoded: 'prophoto', linear: 'prophoto-linear', xyz: 'xyz-d50', illuminant: 'D50' },
}

export const RGB_PROFILE_NAMES: readonly RgbProfileName[] = ['sRGB', 'P3', 'AdobeRGB', 'Rec2020', 'ProPhoto']

export function isRgbProfileName(name: string): name is RgbProfileName {
	return RGB_PROFILE_NAMES.some((profile) => profile === name)
}

/**
 * Reference white of a profile. XYZ produced by `rgbToXyz` is tagged with it.
 */
export function profileIlluminant(profile: RgbProfileName): IlluminantName {
	return PROFILES[profile].illuminant
}

function readCoords(color: _Color): [number, number, number] {
	const [a, b, c] = color.coords
	return [a ?? 0, b ?? 0, c ?? 0]
}

function checkUnitChannel(channel: string, value: number): void {
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new InvalidChannelError(channel, value, 'a number in [0, 1]')
	}
}

/**
 * Create an RGB colour from gamma-encoded channels in 0–1.
 */
export function createRgb(r: number, g: number, b: number, profile: RgbProfileName = 'sRGB'): RgbColor {
	checkUnitChannel('r', r)
	checkUnitChannel('g', g)
	checkUnitChannel('b', b)
	return { r, g, b, profile }
}

/**
 * Create an RGB colour from 8-bit channels (integers 0–255).
 */
export function rgbFrom8Bit(r: number, g: number, b: number, profile: RgbProfileName = 'sRGB'): RgbColor {
	for (const [channel, value] of [
		['r', r],
		['g', g],
		['b', b],
	] as const) {
		if (!Number.isInteger(value) || value < 0 || value > 255) {
			throw new InvalidChannelError(channel, value, 'an integer in [0, 255]')
		}
	}
	return { r: r / 255, g: g / 255, b: b / 255, profile }
}

const HEX_REGEX = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i

/**
 * Parse `#RGB` or `#RRGGBB` (the `#` is optional).
 */
export function parseHex(input: string, profile: RgbProfileName = 'sRGB'): RgbColor {
	const match = HEX_REGEX.exec(input.trim())
	const digits = match?.[1]
	if (digits === undefined) {
		throw new ParseError(input, 'expected #RGB or #RRGGBB')
	}

	const full =
		digits.length === 3
			? digits
					.split('')
					.map((d) => d + d)
					.join('')
			: digits

	return rgbFrom8Bit(
		Number.parseInt(full.slice(0, 2), 16),
		Number.parseInt(full.slice(2, 4), 16),
		Number.parseInt(full.slice(4, 6), 16),
		profile,
	)
}

/**
 * Format as uppercase `#RRGGBB`, rounding each channel to 8 bits.
 */
export function toHex(rgb: RgbColor): string {
	const byte = (channel: number) =>
		Math.round(clamp(0, channel, 1) * 255)
			.toString(16)
			.padStart(2, '0')
	return `#${byte(rgb.r)}${byte(rgb.g)}${byte(rgb.b)}`.toUpperCase()
}

/**
 * Linearise through the profile's transfer function and apply its primaries matrix.
 * The result is tagged with the profile's reference white.
 */
export function rgbToXyz(rgb: RgbColor): Xyz {
	checkUnitChannel('r', rgb.r)
	checkUnitChannel('g', rgb.g)
	checkUnitChannel('b', rgb.b)

	const profile = PROFILES[rgb.profile]
	const [X, Y, Z] = readCoords(new _Color(profile.encoded, [rgb.r, rgb.g, rgb.b]).to(profile.xyz))
	return { X, Y, Z, illuminant: profile.illuminant }
}

export interface RgbConversion {
	readonly rgb: RgbColor
	/** True when any linear channel fell outside [0, 1] and was clipped */
	readonly wasClipped: boolean
}

/**
 * Convert XYZ into a profile. The XYZ must already be under the profile's white;
 * adapt it first otherwise.
 */
export function xyzToRgb(xyz: Xyz, profileName: RgbProfileName = 'sRGB'): RgbConversion {
	const profile = PROFILES[profileName]
	if (xyz.illuminant !== profile.illuminant) {
		throw new AtlasError(
			'InvalidChannel',
			`${profileName} expects XYZ under ${profile.illuminant}, received ${xyz.illuminant}; adapt it first`,
		)
	}
	for (const [channel, value] of [
		['X', xyz.X],
		['Y', xyz.Y],
		['Z', xyz.Z],
	] as const) {
		if (!Number.isFinite(value)) {
			throw new InvalidChannelError(channel, value, 'a finite number')
		}
	}

	const linear = readCoords(new _Color(profile.xyz, [xyz.X, xyz.Y, xyz.Z]).to(profile.linear))
	const wasClipped = linear.some((c) => c < -CLIP_EPSILON || c > 1 + CLIP_EPSILON)
	const [lr, lg, lb] = linear

	const [r, g, b] = readCoords(
		new _Color(profile.linear, [clamp(0, lr, 1), clamp(0, lg, 1), clamp(0, lb, 1)]).to(
			profile.encoded,
		),
	)

	return {
		rgb: { r: clamp(0, r, 1), g: clamp(0, g, 1), b: clamp(0, b, 1), profile: profileName },
		wasClipped,
	}
}
