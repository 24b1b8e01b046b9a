/**
 * 32-bit float helpers
 *
 * Texel packing relies on single-precision rounding and on reading the IEEE-754
 * fields of a float, so every intermediate value goes through `Math.fround`.
 */

const scratch = new ArrayBuffer(4)
const floatView = new Float32Array(scratch)
const uintView = new Uint32Array(scratch)

/**
 * Reinterpret an f32 as its raw bit pattern
 */
export function f32ToBits(value: number): number {
	floatView[0] = value
	return uintView[0]!
}

/**
 * Reinterpret a raw bit pattern as an f32
 */
export function bitsToF32(bits: number): number {
	uintView[0] = bits >>> 0
	return floatView[0]!
}

/** Smallest positive normal f32 (2^-126) */
export const F32_MIN_POSITIVE = 2 ** -126

/**
 * Clamp to [min, max], treating NaN as 0
 */
export function clampF32(value: number, min: number, max: number): number {
	if (Number.isNaN(value)) return 0
	return Math.fround(Math.min(max, Math.max(min, value)))
}
