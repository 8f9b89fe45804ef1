/**
 * Shared constants for Munsell renotation, inversion and classification.
 */

// =============================================================================
// Hue Circle
// =============================================================================

/**
 * The ten principal and intermediate hue families in hue-circle order.
 * Hue position = family index × 10 + hue number, so 0R sits at 0 and 10RP wraps to it.
 */
export const HUE_FAMILIES = ['R', 'YR', 'Y', 'GY', 'G', 'BG', 'B', 'PB', 'P', 'RP'] as const

/** Number of hue units around the full circle */
export const HUE_CIRCLE = 100

/** Hue spacing of the renotation grid (40 hues around the circle) */
export const RENOTATION_HUE_STEP = 2.5

/** Renotation grid chroma spacing */
export const RENOTATION_CHROMA_STEP = 2

/** Lowest and highest tabulated value planes */
export const RENOTATION_MIN_VALUE = 1
export const RENOTATION_MAX_VALUE = 9

/**
 * Degrees per hue unit when mapping hue position to a Cartesian angle.
 * One fixed convention: 100 hue units span 360°, so 2.5 units (one grid step) is 9°.
 */
export const DEGREES_PER_HUE_UNIT = 360 / HUE_CIRCLE

// =============================================================================
// Munsell Value
// =============================================================================

/**
 * ASTM D1535 fifth-order polynomial relating Munsell value V to luminance Y (0–100):
 * Y = 1.1914V − 0.22533V² + 0.23352V³ − 0.020484V⁴ + 0.00081939V⁵
 * Coefficients are listed from V¹ upward.
 */
export const ASTM_D1535_COEFFICIENTS = [1.1914, -0.22533, 0.23352, -0.020484, 0.00081939] as const

/** Newton iteration limits when inverting the value polynomial */
export const VALUE_NEWTON_TOLERANCE = 1e-10
export const VALUE_NEWTON_MAX_ITERATIONS = 100

// =============================================================================
// Inversion
// =============================================================================

/** Default chromaticity distance (in xy) at which inversion stops */
export const DEFAULT_CONVERGENCE_TOLERANCE = 1e-7

/** Default outer iteration budget for inversion */
export const DEFAULT_MAX_ITERATIONS = 64

/** Inner bracketing steps allowed per hue or chroma refinement */
export const MAX_BRACKETING_STEPS = 16

/**
 * Chromaticities closer than this to the white point are achromatic.
 */
export const ACHROMATIC_THRESHOLD = 1e-6

/** Cartesian points closer than this to the value axis are neutral */
export const NEUTRAL_CHROMA_EPSILON = 1e-10

/** Hue positions closer than this to a grid hue are treated as on-grid */
export const GRID_HUE_EPSILON = 1e-9

/**
 * Values recovered from luminance this close to an integer snap to it,
 * so grid colours stay on a single value plane.
 */
export const VALUE_SNAP_EPSILON = 1e-9

/** Chroma may exceed the tabulated limit by this much before it is out of gamut */
export const MAX_CHROMA_EPSILON = 1e-12

// =============================================================================
// ISCC-NBS
// =============================================================================

/**
 * Upper value bound (inclusive) and colour number for each achromatic band,
 * darkest first: black, dark gray, medium gray, light gray, white.
 */
export const ACHROMATIC_BANDS = [
	{ maxValue: 2.5, color: 267 },
	{ maxValue: 4.5, color: 266 },
	{ maxValue: 6.5, color: 265 },
	{ maxValue: 8.5, color: 264 },
	{ maxValue: 10, color: 263 },
] as const

// =============================================================================
// RGB
// =============================================================================

/**
 * Linear channels this far outside [0, 1] are reported as clipped.
 * Absorbs floating-point noise on colours that sit exactly on the gamut surface.
 */
export const CLIP_EPSILON = 1e-9
