/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	RGB: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

/**
 * PNG chunk types read or written here
 */
export const ChunkType = {
	IHDR: 0x49484452,
	IDAT: 0x49444154,
	IEND: 0x49454e44,
} as const

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/** RGBA8: four bytes per pixel */
export const RGBA8_BYTES_PER_PIXEL = 4

/**
 * IHDR chunk data
 */
export interface IHDRData {
	width: number
	height: number
	bitDepth: number
	colorType: number
	compressionMethod: number
	filterMethod: number
	interlaceMethod: number
}

/**
 * PNG chunk
 */
export interface PngChunk {
	type: number
	data: Uint8Array
}

/**
 * PNG encode options
 */
export interface PngEncodeOptions {
	/** zlib compression level 0-9 (default 9) */
	level?: number
	/** Pick the filter per scanline (default true); false writes filter None throughout */
	adaptiveFilter?: boolean
}

/**
 * Render a chunk type as its four ASCII letters
 */
export function chunkName(type: number): string {
	return String.fromCharCode((type >>> 24) & 0xff, (type >>> 16) & 0xff, (type >>> 8) & 0xff, type & 0xff)
}
