/**
 * Shared-exponent texel formats
 *
 * - RGBE8: Radiance texels, storable in .hdr files and RGBA8 PNGs
 * - RGB9E5: GPU rgb9e5ufloat texels
 * - RGBA16F: half-float staging texels
 */

export * from './types'
export { bitsToF32, f32ToBits } from './bits'
export * from './half'
export * from './rgb9e5'
export * from './rgbe8'
export * from './rgba16f'
export * from './image'
