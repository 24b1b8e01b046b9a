import { bitsToF32, clampF32, f32ToBits } from './bits'
import type { Rgb, Rgb9e5 } from './types'

/** Largest value a 9-bit mantissa holds at the top exponent */
export const RGB9E5_MAX = 0x1ff << 7

/** Smallest shared scale, 1.0 * 2^-16 */
export const RGB9E5_MIN_NORM = 1 / (1 << 16)

export const RGB9E5_EXPONENT_BIAS = 15

/**
 * Clamp and pack an RGB triple into an RGB9E5 word
 *
 * Adding a power of two 2^15 times the largest channel to each channel makes
 * the float adder do the rounding: the 9-bit mantissa lands in the low bits
 * of each sum.
 */
export function packRgb9e5(rgb: Rgb): Rgb9e5 {
	const r = clampF32(rgb[0], 0, RGB9E5_MAX)
	const g = clampF32(rgb[1], 0, RGB9E5_MAX)
	const b = clampF32(rgb[2], 0, RGB9E5_MAX)

	const maxChannel = Math.max(RGB9E5_MIN_NORM, r, g, b)

	// Exponent + 15, rounded at the 9th mantissa bit, mantissa cleared
	const biasBits = (f32ToBits(maxChannel) + 0x07804000) & 0x7f800000
	const bias = bitsToF32(biasBits)

	// Smaller channels lose their low bits to the shared scale
	const R = f32ToBits(Math.fround(r + bias)) & 0x1ff
	const G = f32ToBits(Math.fround(g + bias)) & 0x1ff
	const B = f32ToBits(Math.fround(b + bias)) & 0x1ff

	// Rebias into the top 5 bits; the u32 add wraps
	const E = ((biasBits << 4) + 0x10000000) >>> 0

	return (E | (B << 18) | (G << 9) | R) >>> 0
}

/**
 * Unpack an RGB9E5 word into an RGB triple
 */
export function unpackRgb9e5(value: Rgb9e5): Rgb {
	const scale = Math.fround(2 ** (rgb9e5Exponent(value) - RGB9E5_EXPONENT_BIAS))
	const r = Math.fround((Math.fround((value & 0x1ff) * scale)) / 512)
	const g = Math.fround((Math.fround(((value >>> 9) & 0x1ff) * scale)) / 512)
	const b = Math.fround((Math.fround(((value >>> 18) & 0x1ff) * scale)) / 512)
	return [r, g, b]
}

/**
 * Stored exponent field (0-31)
 */
export function rgb9e5Exponent(value: Rgb9e5): number {
	return value >>> 27
}

/**
 * Assemble an RGB9E5 word from raw fields
 */
export function makeRgb9e5(r: number, g: number, b: number, e: number): Rgb9e5 {
	return (((e & 0x1f) << 27) | ((b & 0x1ff) << 18) | ((g & 0x1ff) << 9) | (r & 0x1ff)) >>> 0
}
