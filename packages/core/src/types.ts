/**
 * Raw image data in RGBA8 format, as read from or written to a PNG container
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * RGBE8 texels: 4 bytes each (r, g, b mantissas, shared exponent with bias 128)
 *
 * Byte-compatible with {@link ImageData}, the exponent taking the place of alpha.
 */
export type Rgbe8Image = ImageData

/**
 * RGB9E5 texels: one 32-bit word each
 */
export interface Rgb9e5Image {
	readonly width: number
	readonly height: number
	readonly data: Uint32Array // length = width * height
}

/**
 * RGBA16F texels: four half-float bit patterns each
 */
export interface Rgba16fImage {
	readonly width: number
	readonly height: number
	readonly data: Uint16Array // RGBA, length = width * height * 4
}

/**
 * Linear float RGB, three channels per texel
 */
export interface FloatImage {
	readonly width: number
	readonly height: number
	readonly data: Float32Array // RGB, length = width * height * 3
}

/**
 * Container formats understood by the loaders
 */
export type ContainerFormat = 'png' | 'hdr'

/**
 * Codec interface for encoding/decoding a container
 *
 * `O` is the encoder's option object; containers without encoder settings leave it empty.
 */
export interface Codec<T, O = Record<string, never>> {
	readonly format: ContainerFormat
	decode(data: Uint8Array): T
	encode(input: T, options?: O): Uint8Array
}

/**
 * Create empty RGBE8 image
 */
export function createRgbe8Image(width: number, height: number): Rgbe8Image {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Create empty RGB9E5 image
 */
export function createRgb9e5Image(width: number, height: number): Rgb9e5Image {
	return {
		width,
		height,
		data: new Uint32Array(width * height),
	}
}

/**
 * Create empty RGBA16F image
 */
export function createRgba16fImage(width: number, height: number): Rgba16fImage {
	return {
		width,
		height,
		data: new Uint16Array(width * height * 4),
	}
}

/**
 * Create empty float image
 */
export function createFloatImage(width: number, height: number): FloatImage {
	return {
		width,
		height,
		data: new Float32Array(width * height * 3),
	}
}
