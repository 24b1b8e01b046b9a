export type ImageErrorCode =
	| 'IO'
	| 'INVALID_MAGIC'
	| 'INVALID_SIGNATURE'
	| 'MALFORMED_HEADER'
	| 'MALFORMED_CHUNK'
	| 'MALFORMED_DATA'
	| 'CRC_MISMATCH'
	| 'TRUNCATED_FILE'
	| 'DECOMPRESSION_FAILED'
	| 'UNSUPPORTED'
	| 'UNKNOWN_FORMAT'
	| 'DIMENSION_MISMATCH'

/**
 * Error raised at the container boundary (file access, malformed data, size mismatch)
 */
export class ImageError extends Error {
	public readonly code: ImageErrorCode
	public readonly details?: Record<string, string | number>

	constructor(
		code: ImageErrorCode,
		message: string,
		details?: Record<string, string | number>,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'ImageError'
		this.code = code
		this.details = details
	}
}

export function isImageError(value: unknown): value is ImageError {
	return value instanceof ImageError
}

/**
 * Throw unless `length` matches the texel count of a `width` x `height` image
 */
export function assertTexelLength(
	width: number,
	height: number,
	length: number,
	valuesPerTexel: number
): void {
	const expected = width * height * valuesPerTexel
	if (length !== expected) {
		throw new ImageError(
			'DIMENSION_MISMATCH',
			`Texel buffer holds ${length} values, expected ${expected} for ${width}x${height}`,
			{ width, height, length, expected }
		)
	}
}
