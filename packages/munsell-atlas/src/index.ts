/**
 * munsell-atlas - Munsell conversion with ISCC-NBS and overlay colour naming
 */

export { ADAPTATION_METHODS, adapt, adaptationMatrix, isAdaptationMethod } from './adaptation.ts'
export type { Atlas, AtlasTables, Description, HexConversion } from './atlas.ts'
export { createAtlas } from './atlas.ts'
export { fromCartesian, toCartesian } from './cartesian.ts'
export type { AtlasConfig, AtlasOptions, OverlayMode } from './config.ts'
export { resolveConfig } from './config.ts'
export {
	AtlasError,
	ConfigError,
	type ErrorCode,
	InsufficientDataError,
	InvalidChannelError,
	isAtlasError,
	NonConvergenceError,
	OutOfGamutError,
	ParseError,
} from './errors.ts'
export { ILLUMINANT_NAMES, isIlluminantName, whiteChromaticity, whitePoint } from './illuminants.ts'
export type {
	HueChromaSearch,
	InversionOptions,
	InversionResult,
	InversionStrategy,
} from './inversion.ts'
export {
	hueChromaRefinement,
	INVERSION_STRATEGIES,
	invertXyY,
	nearestGridRefinement,
} from './inversion.ts'
export type {
	Classification,
	ClassificationMatch,
	IsccNbsClassifier,
	IsccNbsColor,
	IsccNbsRegion,
} from './iscc-nbs.ts'
export {
	createIsccNbsClassifier,
	getIsccNbsClassifier,
	hueWedge,
	readColors,
	readRegions,
} from './iscc-nbs.ts'
export { createLab, labToXyz, xyzToLab } from './lab.ts'
export {
	colorFromHuePosition,
	createMunsellColor,
	createNeutral,
	formatMunsell,
	huePosition,
	isHueFamily,
	parseMunsell,
} from './munsell.ts'
export { formatDescriptor, ishForm } from './naming.ts'
export type { Overlay, PolyhedronIndex } from './overlays.ts'
export { buildOverlay, createPolyhedronIndex, getOverlayIndex, readOverlaySamples } from './overlays.ts'
export type {
	Chromaticity,
	RenotationData,
	RenotationEntry,
	RenotationRow,
	RenotationTable,
} from './renotation.ts'
export { createRenotationTable, getRenotationTable, gridHuePosition, readRenotationText } from './renotation.ts'
export type { RgbConversion } from './rgb.ts'
export {
	createRgb,
	isRgbProfileName,
	parseHex,
	profileIlluminant,
	RGB_PROFILE_NAMES,
	rgbFrom8Bit,
	rgbToXyz,
	toHex,
	xyzToRgb,
} from './rgb.ts'
export type {
	AdaptationMethod,
	BoundaryPolicy,
	ChromaticColor,
	HueFamily,
	IlluminantName,
	Lab,
	MunsellColor,
	NeutralColor,
	RgbColor,
	RgbProfileName,
	XyY,
	Xyz,
} from './types.ts'
export { luminanceFromValue, valueFromLuminance } from './value.ts'
