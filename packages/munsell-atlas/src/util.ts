import { HUE_CIRCLE } from './constants.ts'

export function clamp(min: number, value: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}

export function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t
}

/**
 * Wrap a hue position into [0, 100).
 */
export function wrapHue(position: number): number {
	const wrapped = ((position % HUE_CIRCLE) + HUE_CIRCLE) % HUE_CIRCLE
	// -1e-17 % 100 + 100 rounds up to exactly 100
	return wrapped === HUE_CIRCLE ? 0 : wrapped
}

/**
 * Signed angular difference `to - from` in degrees, wrapped into [-180, 180).
 */
export function angleDifference(from: number, to: number): number {
	return ((((to - from + 180) % 360) + 360) % 360) - 180
}

export function toRadians(degrees: number): number {
	return (degrees * Math.PI) / 180
}

export function toDegrees(radians: number): number {
	return (radians * 180) / Math.PI
}
