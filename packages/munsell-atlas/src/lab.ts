/**
 * CIE L*a*b* relative to the white of the XYZ's own illuminant.
 */

import { InvalidChannelError } from './errors.ts'
import { whitePoint } from './illuminants.ts'
import type { IlluminantName, Lab, Xyz } from './types.ts'

const EPSILON = 216 / 24389
const KAPPA = 24389 / 27

function f(t: number): number {
	return t > EPSILON ? Math.cbrt(t) : (KAPPA * t + 16) / 116
}

function fInverse(t: number): number {
	const cubed = t ** 3
	return cubed > EPSILON ? cubed : (116 * t - 16) / KAPPA
}

export function xyzToLab(xyz: Xyz): Lab {
	const [Xn, Yn, Zn] = whitePoint(xyz.illuminant)
	const fx = f(xyz.X / Xn)
	const fy = f(xyz.Y / Yn)
	const fz = f(xyz.Z / Zn)

	return {
		L: 116 * fy - 16,
		a: 500 * (fx - fy),
		b: 200 * (fy - fz),
		illuminant: xyz.illuminant,
	}
}

export function labToXyz(lab: Lab): Xyz {
	if (!Number.isFinite(lab.L) || lab.L < 0 || lab.L > 100) {
		throw new InvalidChannelError('L', lab.L, 'a number in [0, 100]')
	}

	const [Xn, Yn, Zn] = whitePoint(lab.illuminant)
	const fy = (lab.L + 16) / 116
	const fx = fy + lab.a / 500
	const fz = fy - lab.b / 200

	return {
		X: fInverse(fx) * Xn,
		Y: fInverse(fy) * Yn,
		Z: fInverse(fz) * Zn,
		illuminant: lab.illuminant,
	}
}

export function createLab(L: number, a: number, b: number, illuminant: IlluminantName = 'D65'): Lab {
	for (const [channel, value] of [
		['L', L],
		['a', a],
		['b', b],
	] as const) {
		if (!Number.isFinite(value)) {
			throw new InvalidChannelError(channel, value, 'a finite number')
		}
	}
	if (L < 0 || L > 100) {
		throw new InvalidChannelError('L', L, 'a number in [0, 100]')
	}
	return { L, a, b, illuminant }
}
