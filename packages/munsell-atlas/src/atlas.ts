/**
 * Conversion and classification entry point. An atlas binds one resolved
 * configuration to the shared renotation, ISCC-NBS and overlay tables.
 */

import { adapt } from './adaptation.ts'
import { toCartesian } from './cartesian.ts'
import { type AtlasConfig, type AtlasOptions, resolveConfig } from './config.ts'
import { NonConvergenceError } from './errors.ts'
import { whiteChromaticity } from './illuminants.ts'
import { type InversionResult, invertXyY } from './inversion.ts'
import {
	type Classification,
	type ClassificationMatch,
	getIsccNbsClassifier,
	type IsccNbsClassifier,
	type IsccNbsColor,
} from './iscc-nbs.ts'
import { labToXyz, xyzToLab } from './lab.ts'
import { formatMunsell, huePosition } from './munsell.ts'
import { formatDescriptor } from './naming.ts'
import { getOverlayIndex, type PolyhedronIndex } from './overlays.ts'
import { getRenotationTable, type RenotationTable } from './renotation.ts'
import { parseHex, profileIlluminant, type RgbConversion, rgbToXyz, toHex, xyzToRgb } from './rgb.ts'
import type { IlluminantName, Lab, MunsellColor, RgbColor, RgbProfileName, XyY, Xyz } from './types.ts'

export interface HexConversion {
	readonly hex: string
	readonly wasClipped: boolean
}

export interface Description {
	readonly munsell: MunsellColor
	readonly notation: string
	readonly isccNbs: IsccNbsColor
	readonly match: ClassificationMatch
	/** Every overlay containing the colour */
	readonly overlays: ReadonlySet<string>
	/** The containing overlay with the nearest centroid, if any */
	readonly overlay: string | undefined
	/**
	 * The ISCC-NBS descriptor, or under `overlayMode: 'include'` the same modifier
	 * applied to `overlay` when there is one, e.g. "moderate rust".
	 */
	readonly text: string
}

export interface Atlas {
	readonly config: AtlasConfig

	/** Adapt to the configured illuminant and invert */
	xyzToMunsell(xyz: Xyz): InversionResult
	/** Invert a chromaticity already under the configured illuminant */
	xyYToMunsell(xyY: XyY): InversionResult
	rgbToMunsell(rgb: RgbColor): InversionResult
	hexToMunsell(hex: string, profile?: RgbProfileName): InversionResult
	labToMunsell(lab: Lab): InversionResult

	munsellToXyY(color: MunsellColor): XyY
	/** XYZ under the configured illuminant, or adapted to `illuminant` when given */
	munsellToXyz(color: MunsellColor, illuminant?: IlluminantName): Xyz
	munsellToRgb(color: MunsellColor, profile?: RgbProfileName): RgbConversion
	munsellToHex(color: MunsellColor, profile?: RgbProfileName): HexConversion
	munsellToLab(color: MunsellColor, illuminant?: IlluminantName): Lab

	classify(color: MunsellColor): Classification
	findAllColors(color: MunsellColor): IsccNbsColor[]
	matchOverlays(color: MunsellColor): Set<string>
	describe(color: MunsellColor): Description
}

/**
 * Tables an atlas reads. Each defaults to the bundled, lazily loaded one.
 */
export interface AtlasTables {
	readonly renotation?: RenotationTable
	readonly isccNbs?: IsccNbsClassifier
	readonly overlays?: PolyhedronIndex
}

class AtlasImpl implements Atlas {
	readonly config: AtlasConfig
	readonly #tables: AtlasTables

	constructor(config: AtlasConfig, tables: AtlasTables) {
		this.config = config
		this.#tables = tables
	}

	get #renotation(): RenotationTable {
		return this.#tables.renotation ?? getRenotationTable()
	}

	get #isccNbs(): IsccNbsClassifier {
		return this.#tables.isccNbs ?? getIsccNbsClassifier()
	}

	get #overlays(): PolyhedronIndex {
		return this.#tables.overlays ?? getOverlayIndex()
	}

	// =========================================================================
	// To Munsell
	// =========================================================================

	xyzToMunsell(xyz: Xyz): InversionResult {
		const { X, Y, Z } = adapt(xyz, this.config.illuminant, this.config.adaptationMethod)
		const sum = X + Y + Z
		if (sum <= 0) {
			return this.xyYToMunsell({ ...whiteChromaticity('C'), Y: 0 })
		}
		return this.xyYToMunsell({ x: X / sum, y: Y / sum, Y })
	}

	xyYToMunsell(xyY: XyY): InversionResult {
		const { convergenceTolerance, maxIterations, inversionStrategy, requireConvergence } = this.config
		const result = invertXyY(
			xyY,
			this.#renotation,
			{ tolerance: convergenceTolerance, maxIterations },
			inversionStrategy,
		)
		if (requireConvergence && !result.converged) {
			throw new NonConvergenceError(result.color, result.iterations, result.residual)
		}
		return result
	}

	rgbToMunsell(rgb: RgbColor): InversionResult {
		return this.xyzToMunsell(rgbToXyz(rgb))
	}

	hexToMunsell(hex: string, profile: RgbProfileName = 'sRGB'): InversionResult {
		return this.rgbToMunsell(parseHex(hex, profile))
	}

	labToMunsell(lab: Lab): InversionResult {
		return this.xyzToMunsell(labToXyz(lab))
	}

	// =========================================================================
	// From Munsell
	// =========================================================================

	munsellToXyY(color: MunsellColor): XyY {
		if (color.kind === 'neutral') {
			return this.#renotation.renotate(0, color.value, 0)
		}
		return this.#renotation.renotate(huePosition(color), color.value, color.chroma)
	}

	munsellToXyz(color: MunsellColor, illuminant: IlluminantName = this.config.illuminant): Xyz {
		const { x, y, Y } = this.munsellToXyY(color)
		const xyz: Xyz =
			Y === 0
				? { X: 0, Y: 0, Z: 0, illuminant: this.config.illuminant }
				: { X: (x * Y) / y, Y, Z: ((1 - x - y) * Y) / y, illuminant: this.config.illuminant }
		return adapt(xyz, illuminant, this.config.adaptationMethod)
	}

	munsellToRgb(color: MunsellColor, profile: RgbProfileName = 'sRGB'): RgbConversion {
		return xyzToRgb(this.munsellToXyz(color, profileIlluminant(profile)), profile)
	}

	munsellToHex(color: MunsellColor, profile: RgbProfileName = 'sRGB'): HexConversion {
		const { rgb, wasClipped } = this.munsellToRgb(color, profile)
		return { hex: toHex(rgb), wasClipped }
	}

	munsellToLab(color: MunsellColor, illuminant: IlluminantName = this.config.illuminant): Lab {
		return xyzToLab(this.munsellToXyz(color, illuminant))
	}

	// =========================================================================
	// Naming
	// =========================================================================

	classify(color: MunsellColor): Classification {
		return this.#isccNbs.classify(color, this.config.boundaryPolicy)
	}

	findAllColors(color: MunsellColor): IsccNbsColor[] {
		return this.#isccNbs.findAllColorsAtPoint(color, this.config.boundaryPolicy)
	}

	matchOverlays(color: MunsellColor): Set<string> {
		return this.#overlays.matchingOverlays(toCartesian(color))
	}

	describe(color: MunsellColor): Description {
		const { color: isccNbs, match } = this.classify(color)
		const point = toCartesian(color)
		const overlays = this.#overlays.matchingOverlays(point)
		const overlay = overlays.size > 0 ? this.#overlays.nearestOverlay(point, overlays) : undefined

		const text =
			this.config.overlayMode === 'include' && overlay !== undefined
				? formatDescriptor(isccNbs.formatter, overlay)
				: isccNbs.descriptor

		return {
			munsell: color,
			notation: formatMunsell(color),
			isccNbs,
			match,
			overlays,
			overlay,
			text,
		}
	}
}

/**
 * Create an atlas. Options are validated up front; invalid ones throw `ConfigError`.
 *
 * @example
 * ```ts
 * const atlas = createAtlas({ boundaryPolicy: 'Method1' })
 * const { color } = atlas.hexToMunsell('#BE0032')
 * atlas.classify(color).color.descriptor // 'vivid red'
 * ```
 */
export function createAtlas(options: AtlasOptions = {}, tables: AtlasTables = {}): Atlas {
	return new AtlasImpl(resolveConfig(options), tables)
}
