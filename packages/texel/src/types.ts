/**
 * Texel value types
 */

/**
 * Linear RGB triple of f32 values (non-negative radiance, may exceed 1)
 */
export type Rgb = readonly [number, number, number]

/**
 * Linear RGBA quadruple of f32 values
 */
export type Rgba = readonly [number, number, number, number]

/**
 * Radiance RGBE8 texel
 *
 * r, g and b are subnormal mantissas, e is the shared exponent (bias 128)
 * taking the place of the alpha channel.
 */
export interface Rgbe8 {
	r: number
	g: number
	b: number
	e: number
}

/**
 * rgb9e5ufloat texel, stored as an unsigned 32-bit word.
 * Fields from LSB to MSB: 9 bits each of R, G, B mantissa, then 5 bits of shared exponent (bias 15).
 */
export type Rgb9e5 = number

/**
 * rgba16float texel; each channel holds a half-precision bit pattern
 */
export interface Rgba16f {
	r: number
	g: number
	b: number
	a: number
}
