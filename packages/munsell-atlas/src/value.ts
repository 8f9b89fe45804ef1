/**
 * Munsell value ↔ luminance via the ASTM D1535 polynomial.
 */

import {
	ASTM_D1535_COEFFICIENTS,
	VALUE_NEWTON_MAX_ITERATIONS,
	VALUE_NEWTON_TOLERANCE,
} from './constants.ts'
import { clamp } from './util.ts'

function polynomial(value: number): number {
	let result = 0
	let power = value
	for (const coefficient of ASTM_D1535_COEFFICIENTS) {
		result += coefficient * power
		power *= value
	}
	return result
}

function derivative(value: number): number {
	let result = 0
	let power = 1
	for (const [i, coefficient] of ASTM_D1535_COEFFICIENTS.entries()) {
		result += (i + 1) * coefficient * power
		power *= value
	}
	return result
}

/**
 * Relative luminance (0–1) of a Munsell value. Value 10 maps to 1.
 */
export function luminanceFromValue(value: number): number {
	return polynomial(value) / 100
}

/**
 * Munsell value of a relative luminance (0–1), found by Newton iteration.
 * Results are clamped to [0, 10].
 */
export function valueFromLuminance(luminance: number): number {
	if (luminance <= 0) {
		return 0
	}

	const target = luminance * 100
	let value = 10 * Math.sqrt(luminance)

	for (let i = 0; i < VALUE_NEWTON_MAX_ITERATIONS; i++) {
		const step = (polynomial(value) - target) / derivative(value)
		value -= step
		if (Math.abs(step) < VALUE_NEWTON_TOLERANCE) {
			break
		}
	}

	return clamp(0, value, 10)
}
