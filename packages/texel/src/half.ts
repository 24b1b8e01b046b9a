/**
 * Half-precision (IEEE-754 binary16) conversion
 */

import { f32ToBits } from './bits'

/** Largest finite half value */
export const HALF_MAX = 65504

/**
 * Round an f32 to the nearest half (ties to even), returning its bit pattern
 */
export function floatToHalf(value: number): number {
	const bits = f32ToBits(value)
	const sign = (bits >>> 16) & 0x8000
	const exponent = (bits >>> 23) & 0xff
	const mantissa = bits & 0x7fffff

	if (exponent === 0xff) {
		// Infinity stays infinity, NaN keeps a quiet bit
		return sign | 0x7c00 | (mantissa === 0 ? 0 : 0x200 | (mantissa >>> 13))
	}

	const halfExponent = exponent - 127 + 15

	if (halfExponent >= 0x1f) {
		return sign | 0x7c00
	}

	if (halfExponent <= 0) {
		// Subnormal half or zero
		if (halfExponent < -10) return sign

		const full = mantissa | 0x800000
		const shift = 14 - halfExponent
		let half = full >>> shift
		const rest = full & ((1 << shift) - 1)
		const halfway = 1 << (shift - 1)
		if (rest > halfway || (rest === halfway && (half & 1) === 1)) half++
		return sign | half
	}

	let half = (halfExponent << 10) | (mantissa >>> 13)
	const rest = mantissa & 0x1fff
	// A carry out of the mantissa bumps the exponent, up to infinity
	if (rest > 0x1000 || (rest === 0x1000 && (half & 1) === 1)) half++
	return sign | half
}

/**
 * Widen a half bit pattern to a float (exact)
 */
export function halfToFloat(h: number): number {
	const sign = (h >> 15) & 1
	const exponent = (h >> 10) & 0x1f
	const mantissa = h & 0x3ff

	if (exponent === 0) {
		if (mantissa === 0) {
			return sign === 0 ? 0 : -0
		}
		// Denormalized
		const f = mantissa / 1024
		return sign === 0 ? f * 2 ** -14 : -f * 2 ** -14
	}

	if (exponent === 31) {
		if (mantissa === 0) {
			return sign === 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY
		}
		return Number.NaN
	}

	const f = 1 + mantissa / 1024
	const result = f * 2 ** (exponent - 15)
	return sign === 0 ? result : -result
}
