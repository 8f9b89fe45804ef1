/**
 * von Kries-family chromatic adaptation between illuminant white points.
 */

import { inverse, Matrix } from 'ml-matrix'
import { whitePoint } from './illuminants.ts'
import type { AdaptationMethod, IlluminantName, Xyz } from './types.ts'

/**
 * XYZ → cone response matrices. The methods differ only in this matrix.
 */
const CONE_RESPONSE: Readonly<Record<AdaptationMethod, readonly (readonly number[])[]>> = {
	Bradford: [
		[0.8951, 0.2664, -0.1614],
		[-0.7502, 1.7135, 0.0367],
		[0.0389, -0.0685, 1.0296],
	],
	CAT02: [
		[0.7328, 0.4296, -0.1624],
		[-0.7036, 1.6975, 0.0061],
		[0.003, 0.0136, 0.9834],
	],
	// Hunt–Pointer–Estévez
	VonKries: [
		[0.40024, 0.7076, -0.08081],
		[-0.2263, 1.16532, 0.0457],
		[0, 0, 0.91822],
	],
	XYZScaling: [
		[1, 0, 0],
		[0, 1, 0],
		[0, 0, 1],
	],
}

export const ADAPTATION_METHODS: readonly AdaptationMethod[] = [
	'Bradford',
	'CAT02',
	'VonKries',
	'XYZScaling',
]

export function isAdaptationMethod(name: string): name is AdaptationMethod {
	return ADAPTATION_METHODS.some((method) => method === name)
}

const transformCache = new Map<string, Matrix>()

/**
 * Full 3×3 adaptation transform from one white point to another.
 * Results are cached per (source, destination, method).
 */
export function adaptationMatrix(
	from: IlluminantName,
	to: IlluminantName,
	method: AdaptationMethod,
): Matrix {
	const key = `${from}:${to}:${method}`
	const cached = transformCache.get(key)
	if (cached !== undefined) {
		return cached
	}

	const cone = new Matrix(CONE_RESPONSE[method].map((row) => [...row]))
	const source = cone.mmul(Matrix.columnVector([...whitePoint(from)])).getColumn(0)
	const destination = cone.mmul(Matrix.columnVector([...whitePoint(to)])).getColumn(0)
	const gain = Matrix.diag(destination.map((d, i) => d / source[i]))

	const transform = inverse(cone).mmul(gain).mmul(cone)
	transformCache.set(key, transform)
	return transform
}

/**
 * Adapt XYZ from its own illuminant to `to`. Identity when the illuminants match.
 */
export function adapt(xyz: Xyz, to: IlluminantName, method: AdaptationMethod): Xyz {
	if (xyz.illuminant === to) {
		return xyz
	}

	const [X, Y, Z] = adaptationMatrix(xyz.illuminant, to, method)
		.mmul(Matrix.columnVector([xyz.X, xyz.Y, xyz.Z]))
		.getColumn(0)

	return { X, Y, Z, illuminant: to }
}
