import { floatToHalf, halfToFloat } from './half'
import { packRgb9e5, unpackRgb9e5 } from './rgb9e5'
import { packRgbe8 } from './rgbe8'
import type { Rgb9e5, Rgba, Rgba16f, Rgbe8 } from './types'

/** Half-precision 1.0 */
const HALF_ONE = 0x3c00

export function rgba16fFromF32(rgba: Rgba): Rgba16f {
	return {
		r: floatToHalf(rgba[0]),
		g: floatToHalf(rgba[1]),
		b: floatToHalf(rgba[2]),
		a: floatToHalf(rgba[3]),
	}
}

export function rgba16fToF32(texel: Rgba16f): Rgba {
	return [halfToFloat(texel.r), halfToFloat(texel.g), halfToFloat(texel.b), halfToFloat(texel.a)]
}

/**
 * Pack the colour channels into RGB9E5, dropping alpha
 */
export function rgba16fToRgb9e5(texel: Rgba16f): Rgb9e5 {
	return packRgb9e5([halfToFloat(texel.r), halfToFloat(texel.g), halfToFloat(texel.b)])
}

/**
 * Pack the colour channels into RGBE8, dropping alpha
 */
export function rgba16fToRgbe8(texel: Rgba16f): Rgbe8 {
	return packRgbe8([halfToFloat(texel.r), halfToFloat(texel.g), halfToFloat(texel.b)])
}

/**
 * Widen an RGB9E5 word to RGBA16F with opaque alpha
 *
 * Lossless: every RGB9E5 value is a multiple of 2^-24 below 65504 with at most
 * 9 significant bits, all of which half precision represents.
 */
export function rgb9e5ToRgba16f(value: Rgb9e5): Rgba16f {
	const [r, g, b] = unpackRgb9e5(value)
	return {
		r: floatToHalf(r),
		g: floatToHalf(g),
		b: floatToHalf(b),
		a: HALF_ONE,
	}
}

/**
 * Read the RGBA16F texel at `index` from a flat half buffer
 */
export function readRgba16f(data: Uint16Array, index: number): Rgba16f {
	const offset = index * 4
	return { r: data[offset]!, g: data[offset + 1]!, b: data[offset + 2]!, a: data[offset + 3]! }
}

/**
 * Write an RGBA16F texel at `index` into a flat half buffer
 */
export function writeRgba16f(data: Uint16Array, index: number, texel: Rgba16f): void {
	const offset = index * 4
	data[offset] = texel.r
	data[offset + 1] = texel.g
	data[offset + 2] = texel.b
	data[offset + 3] = texel.a
}
