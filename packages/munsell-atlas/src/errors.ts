/**
 * Error taxonomy. Every error raised by the library carries a machine-readable `code`.
 */

import { InsufficientDataError } from '@munsell-atlas/polytope'
import type { MunsellColor } from './types.ts'

export { InsufficientDataError }

export type ErrorCode =
	| 'ParseError'
	| 'OutOfGamut'
	| 'NonConvergence'
	| 'InsufficientData'
	| 'InvalidChannel'
	| 'InvalidConfig'

export class AtlasError extends Error {
	readonly code: ErrorCode

	constructor(code: ErrorCode, message: string) {
		super(message)
		this.name = new.target.name
		this.code = code
	}
}

/**
 * Malformed Munsell notation or colour string.
 */
export class ParseError extends AtlasError {
	readonly input: string

	constructor(input: string, reason: string) {
		super('ParseError', `Cannot parse '${input}': ${reason}`)
		this.input = input
	}
}

/**
 * The requested colour has no counterpart inside the renotation envelope.
 */
export class OutOfGamutError extends AtlasError {
	constructor(message: string) {
		super('OutOfGamut', message)
	}
}

/**
 * The inverse solver ran out of iterations. The best estimate is attached.
 */
export class NonConvergenceError extends AtlasError {
	readonly estimate: MunsellColor
	readonly iterations: number
	readonly residual: number

	constructor(estimate: MunsellColor, iterations: number, residual: number) {
		super(
			'NonConvergence',
			`Munsell inversion did not converge after ${iterations} iterations (residual ${residual.toExponential(2)})`,
		)
		this.estimate = estimate
		this.iterations = iterations
		this.residual = residual
	}
}

/**
 * A colour component lies outside its declared domain.
 */
export class InvalidChannelError extends AtlasError {
	readonly channel: string
	readonly value: number

	constructor(channel: string, value: number, domain: string) {
		super('InvalidChannel', `Channel '${channel}' must be ${domain}, received ${value}`)
		this.channel = channel
		this.value = value
	}
}

export class ConfigError extends AtlasError {
	constructor(message: string) {
		super('InvalidConfig', message)
	}
}

export function isAtlasError(error: unknown): error is AtlasError | InsufficientDataError {
	return error instanceof AtlasError || error instanceof InsufficientDataError
}
