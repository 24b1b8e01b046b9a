import { F32_MIN_POSITIVE, bitsToF32, f32ToBits } from './bits'
import { packRgb9e5 } from './rgb9e5'
import type { Rgb, Rgb9e5, Rgbe8 } from './types'

export const RGBE8_EXPONENT_BIAS = 128

/** Largest RGBE8 value, 255/256 * 2^127 */
export const RGBE8_MAX = 255 * 2 ** 119

function sanitize(value: number): number {
	if (Number.isNaN(value)) return 0
	return Math.fround(Math.min(RGBE8_MAX, value))
}

function toMantissa(channel: number, bias: number): number {
	const scaled = Math.fround(Math.fround(channel / bias) * 256)
	return Math.min(255, Math.max(0, Math.round(scaled)))
}

/**
 * Pack an RGB triple into an RGBE8 texel
 *
 * Slower than {@link packRgb9e5}; meant for asset tooling rather than loading.
 */
export function packRgbe8(rgb: Rgb): Rgbe8 {
	const r = sanitize(rgb[0])
	const g = sanitize(rgb[1])
	const b = sanitize(rgb[2])

	const maxChannel = Math.max(F32_MIN_POSITIVE, r, g, b)
	// Round to 8 bits of precision, then take the next power of two
	const biasBits = (f32ToBits(maxChannel) + 0x00808000) & 0x7f800000
	const bias = bitsToF32(biasBits)

	return {
		r: toMantissa(r, bias),
		g: toMantissa(g, bias),
		b: toMantissa(b, bias),
		e: Math.min(255, Math.max(0, (biasBits >>> 23) + 1)),
	}
}

/**
 * Unpack an RGBE8 texel into an RGB triple
 */
export function unpackRgbe8(texel: Rgbe8): Rgb {
	const scale = Math.fround(2 ** (texel.e - RGBE8_EXPONENT_BIAS))
	return [
		Math.fround((texel.r / 256) * scale),
		Math.fround((texel.g / 256) * scale),
		Math.fround((texel.b / 256) * scale),
	]
}

/**
 * Convert an RGBE8 texel to RGB9E5
 *
 * When the exponent lies in [-15, 15] every RGBE8 value is exactly
 * representable in RGB9E5, so the mantissas are shifted into place directly.
 * The result is the same word {@link packRgb9e5} would produce from the
 * unpacked floats. Outside that range the texel goes through floats, which
 * rounds small values and saturates large ones.
 */
export function repackRgb9e5(texel: Rgbe8): Rgb9e5 {
	const e = texel.e - RGBE8_EXPONENT_BIAS
	if (e > 15 || e < -15) {
		return packRgb9e5(unpackRgbe8(texel))
	}

	const max = Math.max(texel.r, texel.g, texel.b)
	if (max === 0) return 0

	// Exponent of the top set bit of the largest channel, floored at the
	// smallest shared exponent 2^-16. A full 8-bit mantissa gives shift 1.
	const top = Math.max(e + 31 - Math.clz32(max) - 8, -16)
	const shift = e - top
	const e5 = top + 16

	return ((e5 << 27) | (texel.b << shift << 18) | (texel.g << shift << 9) | (texel.r << shift)) >>> 0
}

/**
 * Read the RGBE8 texel at `index` from a flat byte buffer
 */
export function readRgbe8(data: Uint8Array, index: number): Rgbe8 {
	const offset = index * 4
	return { r: data[offset]!, g: data[offset + 1]!, b: data[offset + 2]!, e: data[offset + 3]! }
}

/**
 * Write an RGBE8 texel at `index` into a flat byte buffer
 */
export function writeRgbe8(data: Uint8Array, index: number, texel: Rgbe8): void {
	const offset = index * 4
	data[offset] = texel.r
	data[offset + 1] = texel.g
	data[offset + 2] = texel.b
	data[offset + 3] = texel.e
}
