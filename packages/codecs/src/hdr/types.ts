/**
 * HDR (Radiance RGBE) format types and constants
 */

// HDR magic bytes
export const HDR_MAGIC = '#?RADIANCE'
export const HDR_MAGIC_ALT = '#?RGBE'

// Pixel format the decoder accepts
export const HDR_FORMAT_32BIT_RLE_RGBE = '32-bit_rle_rgbe'

// New-style RLE is only defined for scanlines in this width range
export const HDR_MIN_RLE_WIDTH = 8
export const HDR_MAX_RLE_WIDTH = 0x7fff

// Largest image the decoder allocates (1 GiB of RGBE8)
export const HDR_MAX_TEXELS = 2 ** 28

/**
 * HDR header information
 */
export interface HdrHeader {
	format: string
	exposure: number
	gamma: number
	width: number
	height: number
	/** Rows are stored bottom to top (`+Y`) */
	flipY: boolean
	/** Columns are stored right to left (`-X`) */
	flipX: boolean
	/** Byte offset of the first scanline */
	dataOffset: number
}

/**
 * Receives one texel at its top-left-origin position
 */
export type HdrTexelVisitor = (x: number, y: number, r: number, g: number, b: number, e: number) => void
