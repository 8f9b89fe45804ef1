import { isAdaptationMethod } from './adaptation.ts'
import { DEFAULT_CONVERGENCE_TOLERANCE, DEFAULT_MAX_ITERATIONS } from './constants.ts'
import { ConfigError } from './errors.ts'
import { isIlluminantName } from './illuminants.ts'
import { hueChromaRefinement, type InversionStrategy } from './inversion.ts'
import type { AdaptationMethod, BoundaryPolicy, IlluminantName } from './types.ts'

export type OverlayMode = 'include' | 'ignore'

export interface AtlasOptions {
	/**
	 * Viewing illuminant. Input XYZ is adapted to it before the renotation lookup,
	 * and Munsell output is rendered under it. The renotation data is defined under C.
	 * @default 'C'
	 */
	readonly illuminant?: IlluminantName
	/** @default 'Bradford' */
	readonly adaptationMethod?: AdaptationMethod
	/** @default 'Method2' */
	readonly boundaryPolicy?: BoundaryPolicy
	/** xy distance at which inversion stops. @default 1e-7 */
	readonly convergenceTolerance?: number
	/** @default 64 */
	readonly maxIterations?: number
	/** @default hueChromaRefinement */
	readonly inversionStrategy?: InversionStrategy
	/**
	 * Throw `NonConvergenceError` instead of returning an unconverged estimate.
	 * @default false
	 */
	readonly requireConvergence?: boolean
	/**
	 * Whether `describe` names colours by the overlay they fall in.
	 * @default 'include'
	 */
	readonly overlayMode?: OverlayMode
}

export type AtlasConfig = Required<AtlasOptions>

const BOUNDARY_POLICIES: readonly BoundaryPolicy[] = ['Method1', 'Method2']
const OVERLAY_MODES: readonly OverlayMode[] = ['include', 'ignore']

/**
 * Fill defaults and validate. Throws `ConfigError` naming the first invalid option.
 */
export function resolveConfig(options: AtlasOptions = {}): AtlasConfig {
	const config: AtlasConfig = {
		illuminant: options.illuminant ?? 'C',
		adaptationMethod: options.adaptationMethod ?? 'Bradford',
		boundaryPolicy: options.boundaryPolicy ?? 'Method2',
		convergenceTolerance: options.convergenceTolerance ?? DEFAULT_CONVERGENCE_TOLERANCE,
		maxIterations: options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		inversionStrategy: options.inversionStrategy ?? hueChromaRefinement,
		requireConvergence: options.requireConvergence ?? false,
		overlayMode: options.overlayMode ?? 'include',
	}

	if (!isIlluminantName(config.illuminant)) {
		throw new ConfigError(`Unknown illuminant '${config.illuminant}'`)
	}
	if (!isAdaptationMethod(config.adaptationMethod)) {
		throw new ConfigError(`Unknown adaptation method '${config.adaptationMethod}'`)
	}
	if (!BOUNDARY_POLICIES.includes(config.boundaryPolicy)) {
		throw new ConfigError(`Boundary policy must be Method1 or Method2, received '${config.boundaryPolicy}'`)
	}
	if (!OVERLAY_MODES.includes(config.overlayMode)) {
		throw new ConfigError(`Overlay mode must be include or ignore, received '${config.overlayMode}'`)
	}
	if (!Number.isFinite(config.convergenceTolerance) || config.convergenceTolerance <= 0) {
		throw new ConfigError(
			`Convergence tolerance must be a positive number, received ${config.convergenceTolerance}`,
		)
	}
	if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
		throw new ConfigError(`Max iterations must be a positive integer, received ${config.maxIterations}`)
	}

	return Object.freeze(config)
}
