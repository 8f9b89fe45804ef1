/**
 * Munsell ↔ Cartesian coordinates.
 *
 * The hue circle maps to angle with 100 hue units spanning 360°, so
 * θ = huePosition × 3.6° and 0R lies on the +x axis. Then x = C·cos θ,
 * y = C·sin θ and z = V.
 */

import type { Vec3 } from '@munsell-atlas/polytope'
import { DEGREES_PER_HUE_UNIT, NEUTRAL_CHROMA_EPSILON } from './constants.ts'
import { colorFromHuePosition, createNeutral, huePosition } from './munsell.ts'
import type { MunsellColor } from './types.ts'
import { toDegrees, toRadians } from './util.ts'

export function toCartesian(color: MunsellColor): Vec3 {
	if (color.kind === 'neutral') {
		return [0, 0, color.value]
	}
	const theta = toRadians(huePosition(color) * DEGREES_PER_HUE_UNIT)
	return [color.chroma * Math.cos(theta), color.chroma * Math.sin(theta), color.value]
}

export function fromCartesian([x, y, z]: Vec3): MunsellColor {
	const chroma = Math.hypot(x, y)
	if (chroma < NEUTRAL_CHROMA_EPSILON) {
		return createNeutral(z)
	}
	const hue = toDegrees(Math.atan2(y, x)) / DEGREES_PER_HUE_UNIT
	return colorFromHuePosition(hue, z, chroma)
}
