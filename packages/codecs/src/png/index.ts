/**
 * RGBA8 PNG codec
 *
 * Carries RGBE8 texels with the shared exponent in the alpha channel.
 */

export * from './types'
export { decodePng } from './decoder'
export { encodePng } from './encoder'
export { PngCodec } from './codec'
