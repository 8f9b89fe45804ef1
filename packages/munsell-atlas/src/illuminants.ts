/**
 * CIE standard illuminant white points (2° observer).
 */

import type { Vec3 } from '@munsell-atlas/polytope'
import type { IlluminantName } from './types.ts'

interface Chromaticity {
	readonly x: number
	readonly y: number
}

// D65 and D50 use the four-digit values colorjs.io builds its RGB spaces from,
// so a profile's white lands exactly on the illuminant after conversion.
const CHROMATICITIES: Readonly<Record<IlluminantName, Chromaticity>> = {
	A: { x: 0.44757, y: 0.40745 },
	B: { x: 0.34842, y: 0.35161 },
	C: { x: 0.31006, y: 0.31616 },
	D50: { x: 0.3457, y: 0.3585 },
	D55: { x: 0.33242, y: 0.34743 },
	D65: { x: 0.3127, y: 0.329 },
	D75: { x: 0.29902, y: 0.31485 },
	E: { x: 1 / 3, y: 1 / 3 },
	F2: { x: 0.37208, y: 0.37529 },
	F7: { x: 0.31292, y: 0.32933 },
	F11: { x: 0.38052, y: 0.37713 },
}

export const ILLUMINANT_NAMES: readonly IlluminantName[] = [
	'A',
	'B',
	'C',
	'D50',
	'D55',
	'D65',
	'D75',
	'E',
	'F2',
	'F7',
	'F11',
]

export function isIlluminantName(name: string): name is IlluminantName {
	return ILLUMINANT_NAMES.some((illuminant) => illuminant === name)
}

/**
 * White point chromaticity of an illuminant.
 */
export function whiteChromaticity(illuminant: IlluminantName): Chromaticity {
	return CHROMATICITIES[illuminant]
}

/**
 * White point XYZ of an illuminant, normalised to Y = 1.
 */
export function whitePoint(illuminant: IlluminantName): Vec3 {
	const { x, y } = CHROMATICITIES[illuminant]
	return [x / y, 1, (1 - x - y) / y]
}
