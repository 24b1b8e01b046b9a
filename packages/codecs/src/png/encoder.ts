import { type ImageData, ImageError, assertTexelLength } from '@rgbe-kit/core'
import { zlibSync } from 'fflate'
import { crc32, writeU32BE } from './binary'
import { paethPredictor } from './decoder'
import { ColorType, FilterType, PNG_SIGNATURE, type PngEncodeOptions, RGBA8_BYTES_PER_PIXEL } from './types'

const ZLIB_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const
type ZlibLevel = (typeof ZLIB_LEVELS)[number]

function toZlibLevel(level: number): ZlibLevel {
	const found = ZLIB_LEVELS.find((l) => l === level)
	if (found === undefined) {
		throw new ImageError('UNSUPPORTED', `Invalid PNG compression level: ${level}`, { level })
	}
	return found
}

/**
 * Create a PNG chunk
 */
function createChunk(type: string, data: Uint8Array): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)

	writeU32BE(chunk, 0, data.length)

	chunk[4] = type.charCodeAt(0)
	chunk[5] = type.charCodeAt(1)
	chunk[6] = type.charCodeAt(2)
	chunk[7] = type.charCodeAt(3)

	chunk.set(data, 8)

	// CRC (over type + data)
	const crc = crc32(chunk, 4, data.length + 4)
	writeU32BE(chunk, 8 + data.length, crc)

	return chunk
}

/**
 * Create IHDR chunk
 */
function createIHDR(width: number, height: number): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = ColorType.RGBA
	data[10] = 0 // Compression method
	data[11] = 0 // Filter method
	data[12] = 0 // Interlace method
	return createChunk('IHDR', data)
}

/**
 * Apply filter to scanline and return filtered data with filter byte
 */
function filterScanline(
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number,
	filterType: FilterType
): Uint8Array {
	const len = current.length
	const filtered = new Uint8Array(len + 1)
	filtered[0] = filterType

	switch (filterType) {
		case FilterType.None:
			filtered.set(current, 1)
			break

		case FilterType.Sub:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				filtered[i + 1] = (current[i]! - a) & 0xff
			}
			break

		case FilterType.Up:
			for (let i = 0; i < len; i++) {
				const b = previous ? previous[i]! : 0
				filtered[i + 1] = (current[i]! - b) & 0xff
			}
			break

		case FilterType.Average:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				filtered[i + 1] = (current[i]! - ((a + b) >> 1)) & 0xff
			}
			break

		case FilterType.Paeth:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				const c = i >= bpp && previous ? previous[i - bpp]! : 0
				filtered[i + 1] = (current[i]! - paethPredictor(a, b, c)) & 0xff
			}
			break
	}

	return filtered
}

/**
 * Sum of filtered bytes read as signed values (for filter selection)
 */
function sumAbsolute(data: Uint8Array): number {
	let sum = 0
	for (let i = 1; i < data.length; i++) {
		const v = data[i]!
		sum += v < 128 ? v : 256 - v
	}
	return sum
}

/**
 * Select the filter with the smallest signed-byte sum
 */
function selectFilter(current: Uint8Array, previous: Uint8Array | null, bpp: number): Uint8Array {
	let bestFiltered = filterScanline(current, previous, bpp, FilterType.None)
	let bestSum = sumAbsolute(bestFiltered)

	for (const filterType of [FilterType.Sub, FilterType.Up, FilterType.Average, FilterType.Paeth]) {
		const filtered = filterScanline(current, previous, bpp, filterType)
		const sum = sumAbsolute(filtered)
		if (sum < bestSum) {
			bestSum = sum
			bestFiltered = filtered
		}
	}

	return bestFiltered
}

/**
 * Create IDAT chunk
 */
function createIDAT(image: ImageData, level: ZlibLevel, adaptive: boolean): Uint8Array {
	const { width, height, data } = image
	const bpp = RGBA8_BYTES_PER_PIXEL
	const scanlineBytes = width * bpp

	const filteredData = new Uint8Array((scanlineBytes + 1) * height)
	let prevScanline: Uint8Array | null = null
	let offset = 0

	for (let y = 0; y < height; y++) {
		const scanline = data.subarray(y * scanlineBytes, (y + 1) * scanlineBytes)
		const filtered = adaptive
			? selectFilter(scanline, prevScanline, bpp)
			: filterScanline(scanline, prevScanline, bpp, FilterType.None)
		filteredData.set(filtered, offset)
		offset += filtered.length
		prevScanline = scanline
	}

	return createChunk('IDAT', zlibSync(filteredData, { level }))
}

/**
 * Encode RGBA8 ImageData to PNG
 *
 * Compression defaults to the slowest, smallest setting; this is meant for
 * asset creation.
 */
export function encodePng(image: ImageData, options: PngEncodeOptions = {}): Uint8Array {
	const { width, height } = image
	if (width <= 0 || height <= 0) {
		throw new ImageError('DIMENSION_MISMATCH', 'PNG images need at least one pixel', { width, height })
	}
	assertTexelLength(width, height, image.data.length, RGBA8_BYTES_PER_PIXEL)

	const level = toZlibLevel(options.level ?? 9)
	const chunks = [
		createIHDR(width, height),
		createIDAT(image, level, options.adaptiveFilter ?? true),
		createChunk('IEND', new Uint8Array(0)),
	]

	const totalSize = PNG_SIGNATURE.length + chunks.reduce((sum, c) => sum + c.length, 0)
	const output = new Uint8Array(totalSize)
	output.set(PNG_SIGNATURE, 0)

	let offset = PNG_SIGNATURE.length
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}

	return output
}
