/**
 * Radiance HDR codec
 *
 * Features:
 * - Decode new-style RLE, old-style RLE and flat scanlines
 * - Texels come back as stored RGBE8 bytes, no tone mapping
 * - Encode with per-channel RLE
 */

export * from './types'
export { decodeHdr, parseHdrHeader, readHdrTexels } from './decoder'
export { encodeHdr } from './encoder'
export { HdrCodec } from './codec'
