/**
 * Munsell colour value objects, notation parsing and formatting.
 */

import { HUE_CIRCLE, HUE_FAMILIES } from './constants.ts'
import { InvalidChannelError, ParseError } from './errors.ts'
import type { ChromaticColor, HueFamily, MunsellColor, NeutralColor } from './types.ts'
import { wrapHue } from './util.ts'

const FAMILY_SPAN = HUE_CIRCLE / HUE_FAMILIES.length

export function isHueFamily(name: string): name is HueFamily {
	return HUE_FAMILIES.some((family) => family === name)
}

function familyIndex(family: HueFamily): number {
	return HUE_FAMILIES.indexOf(family)
}

function familyAt(index: number): HueFamily {
	const family = HUE_FAMILIES[((index % HUE_FAMILIES.length) + HUE_FAMILIES.length) % HUE_FAMILIES.length]
	if (family === undefined) {
		throw new Error(`No hue family at index ${index}`)
	}
	return family
}

function checkValue(value: number): void {
	if (!Number.isFinite(value) || value < 0 || value > 10) {
		throw new InvalidChannelError('value', value, 'a number in [0, 10]')
	}
}

// =============================================================================
// Construction
// =============================================================================

export function createNeutral(value: number): NeutralColor {
	checkValue(value)
	return Object.freeze({ kind: 'neutral', value })
}

/**
 * Create a Munsell colour, normalising hue number 10 to 0 of the next family
 * and collapsing chroma 0 to a neutral.
 */
export function createMunsellColor(
	family: HueFamily,
	hueNumber: number,
	value: number,
	chroma: number,
): MunsellColor {
	if (!Number.isFinite(hueNumber) || hueNumber < 0 || hueNumber > 10) {
		throw new InvalidChannelError('hueNumber', hueNumber, 'a number in [0, 10]')
	}
	checkValue(value)
	if (!Number.isFinite(chroma) || chroma < 0) {
		throw new InvalidChannelError('chroma', chroma, 'a non-negative number')
	}

	if (chroma === 0) {
		return createNeutral(value)
	}

	const color: ChromaticColor =
		hueNumber === 10
			? { kind: 'chromatic', family: familyAt(familyIndex(family) + 1), hueNumber: 0, value, chroma }
			: { kind: 'chromatic', family, hueNumber, value, chroma }

	return Object.freeze(color)
}

/**
 * Position on the 100-unit hue circle: family index × 10 + hue number.
 */
export function huePosition(color: ChromaticColor): number {
	return familyIndex(color.family) * FAMILY_SPAN + color.hueNumber
}

/**
 * Build a colour from a hue circle position (wrapped into [0, 100)).
 */
export function colorFromHuePosition(position: number, value: number, chroma: number): MunsellColor {
	if (!Number.isFinite(position)) {
		throw new InvalidChannelError('hue', position, 'a finite hue position')
	}
	const wrapped = wrapHue(position)
	const index = Math.min(HUE_FAMILIES.length - 1, Math.floor(wrapped / FAMILY_SPAN))
	const hueNumber = Math.max(0, wrapped - index * FAMILY_SPAN)
	return createMunsellColor(familyAt(index), hueNumber, value, chroma)
}

// =============================================================================
// Notation
// =============================================================================

const NUMBER = String.raw`(\d+(?:\.\d*)?|\.\d+)`
const CHROMATIC_REGEX = new RegExp(String.raw`^${NUMBER}\s*([A-Z]{1,2})\s*${NUMBER}\s*/\s*${NUMBER}$`, 'i')
const NEUTRAL_REGEX = new RegExp(String.raw`^N\s*${NUMBER}\s*(?:/\s*(?:0+(?:\.0*)?)?)?$`, 'i')

/**
 * Parse `"{hue}{family} {value}/{chroma}"` or `"N {value}"`.
 *
 * Neutral notation also accepts a trailing slash or a zero chroma (`"N 5/0"`).
 * Hue number 10 is normalised to 0 of the next family.
 */
export function parseMunsell(input: string): MunsellColor {
	const text = input.trim()

	const neutral = NEUTRAL_REGEX.exec(text)
	if (neutral?.[1] !== undefined) {
		return createNeutral(Number(neutral[1]))
	}

	const match = CHROMATIC_REGEX.exec(text)
	if (match === null) {
		throw new ParseError(input, "expected '{hue}{family} {value}/{chroma}' or 'N {value}'")
	}

	const [, hue = '', familyText = '', value = '', chroma = ''] = match
	const family = familyText.toUpperCase()
	if (!isHueFamily(family)) {
		throw new ParseError(input, `unknown hue family '${familyText}' (expected one of ${HUE_FAMILIES.join(', ')})`)
	}

	return createMunsellColor(family, Number(hue), Number(value), Number(chroma))
}

/**
 * Canonical notation with one decimal per component, e.g. `"5.4R 8.0/5.5"` or `"N 5.0"`.
 * A hue number that rounds to 10.0 is written as 0.0 of the next family.
 */
export function formatMunsell(color: MunsellColor): string {
	const value = color.value.toFixed(1)
	if (color.kind === 'neutral') {
		return `N ${value}`
	}

	const chroma = color.chroma.toFixed(1)
	if (Number(chroma) === 0) {
		return `N ${value}`
	}

	let hue = color.hueNumber.toFixed(1)
	let family = color.family
	if (hue === '10.0') {
		hue = '0.0'
		family = familyAt(familyIndex(family) + 1)
	}

	return `${hue}${family} ${value}/${chroma}`
}
