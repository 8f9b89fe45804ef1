/**
 * Shared type definitions for munsell-atlas.
 */

import type { HUE_FAMILIES } from './constants.ts'

export type HueFamily = (typeof HUE_FAMILIES)[number]

export type IlluminantName = 'A' | 'B' | 'C' | 'D50' | 'D55' | 'D65' | 'D75' | 'E' | 'F2' | 'F7' | 'F11'

export type AdaptationMethod = 'Bradford' | 'CAT02' | 'VonKries' | 'XYZScaling'

/**
 * How a hue that lands exactly on a wedge boundary is assigned.
 * - `Method1`: include the start, exclude the end, `[start, end)`
 * - `Method2`: exclude the start, include the end, `(start, end]`
 */
export type BoundaryPolicy = 'Method1' | 'Method2'

export type RgbProfileName = 'sRGB' | 'P3' | 'AdobeRGB' | 'Rec2020' | 'ProPhoto'

/**
 * CIE XYZ tristimulus values, Y normalised so the reference white has Y = 1.
 * Only comparable with other XYZ values under the same illuminant.
 */
export interface Xyz {
	readonly X: number
	readonly Y: number
	readonly Z: number
	readonly illuminant: IlluminantName
}

/**
 * Chromaticity plus luminance (Y in 0–1).
 */
export interface XyY {
	readonly x: number
	readonly y: number
	readonly Y: number
}

export interface Lab {
	readonly L: number
	readonly a: number
	readonly b: number
	readonly illuminant: IlluminantName
}

/**
 * Gamma-encoded RGB with channels in 0–1, tagged with its profile.
 */
export interface RgbColor {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly profile: RgbProfileName
}

export interface ChromaticColor {
	readonly kind: 'chromatic'
	readonly family: HueFamily
	/** In [0, 10); 10 is normalised to 0 of the next family */
	readonly hueNumber: number
	readonly value: number
	readonly chroma: number
}

export interface NeutralColor {
	readonly kind: 'neutral'
	readonly value: number
}

/**
 * Immutable Munsell colour. Chroma 0 is always represented as a neutral.
 */
export type MunsellColor = ChromaticColor | NeutralColor
