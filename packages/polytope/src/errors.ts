/**
 * Raised when a hull is requested from fewer than four non-coplanar points.
 */
export class InsufficientDataError extends Error {
	readonly code = 'InsufficientData'
	readonly pointCount: number

	constructor(message: string, pointCount: number) {
		super(message)
		this.name = 'InsufficientDataError'
		this.pointCount = pointCount
	}
}
