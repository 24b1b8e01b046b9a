import { type ImageData, ImageError } from '@rgbe-kit/core'
import { unzlibSync } from 'fflate'
import { crc32, readU32BE } from './binary'
import {
	ChunkType,
	ColorType,
	type IHDRData,
	PNG_SIGNATURE,
	type PngChunk,
	RGBA8_BYTES_PER_PIXEL,
	chunkName,
} from './types'

/**
 * Parse PNG chunks, verifying each CRC
 */
function parseChunks(data: Uint8Array): PngChunk[] {
	const chunks: PngChunk[] = []
	let offset = PNG_SIGNATURE.length

	while (offset < data.length) {
		if (offset + 12 > data.length) {
			throw new ImageError('TRUNCATED_FILE', 'Truncated PNG chunk header', { offset })
		}
		const length = readU32BE(data, offset)
		const type = readU32BE(data, offset + 4)
		if (offset + 12 + length > data.length) {
			throw new ImageError('TRUNCATED_FILE', `Truncated PNG chunk ${chunkName(type)}`, {
				offset,
				length,
			})
		}
		const chunkData = data.subarray(offset + 8, offset + 8 + length)
		const expectedCrc = readU32BE(data, offset + 8 + length)

		const actualCrc = crc32(data, offset + 4, length + 4)
		if (actualCrc !== expectedCrc) {
			throw new ImageError('CRC_MISMATCH', `CRC mismatch in chunk ${chunkName(type)}`, { offset })
		}

		chunks.push({ type, data: chunkData })
		offset += 12 + length

		if (type === ChunkType.IEND) break
	}

	return chunks
}

/**
 * Parse IHDR chunk
 */
function parseIHDR(data: Uint8Array): IHDRData {
	if (data.length !== 13) {
		throw new ImageError('MALFORMED_CHUNK', 'Invalid IHDR chunk length', { length: data.length })
	}

	return {
		width: readU32BE(data, 0),
		height: readU32BE(data, 4),
		bitDepth: data[8]!,
		colorType: data[9]!,
		compressionMethod: data[10]!,
		filterMethod: data[11]!,
		interlaceMethod: data[12]!,
	}
}

/**
 * Paeth predictor function
 */
export function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)

	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

/**
 * Unfilter a scanline in place
 */
function unfilterScanline(
	filter: number,
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number
): void {
	const len = current.length

	switch (filter) {
		case 0: // None
			break

		case 1: // Sub
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i]! + current[i - bpp]!) & 0xff
			}
			break

		case 2: // Up
			if (previous) {
				for (let i = 0; i < len; i++) {
					current[i] = (current[i]! + previous[i]!) & 0xff
				}
			}
			break

		case 3: // Average
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				current[i] = (current[i]! + ((a + b) >> 1)) & 0xff
			}
			break

		case 4: // Paeth
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				const c = i >= bpp && previous ? previous[i - bpp]! : 0
				current[i] = (current[i]! + paethPredictor(a, b, c)) & 0xff
			}
			break

		default:
			throw new ImageError('MALFORMED_CHUNK', `Unknown filter type: ${filter}`, { filter })
	}
}

function inflateIdat(compressed: Uint8Array): Uint8Array {
	try {
		return unzlibSync(compressed)
	} catch (err) {
		throw new ImageError(
			'DECOMPRESSION_FAILED',
			`PNG image data failed to inflate: ${err instanceof Error ? err.message : String(err)}`,
			undefined,
			{ cause: err }
		)
	}
}

/**
 * Decode an 8-bit RGBA PNG to ImageData
 *
 * Pixel bytes come back exactly as stored; no gamma or colour handling.
 */
export function decodePng(data: Uint8Array): ImageData {
	if (data.length < PNG_SIGNATURE.length) {
		throw new ImageError('INVALID_SIGNATURE', 'Invalid PNG signature')
	}
	for (let i = 0; i < PNG_SIGNATURE.length; i++) {
		if (data[i] !== PNG_SIGNATURE[i]) {
			throw new ImageError('INVALID_SIGNATURE', 'Invalid PNG signature')
		}
	}

	const chunks = parseChunks(data)

	const ihdrChunk = chunks.find((c) => c.type === ChunkType.IHDR)
	if (!ihdrChunk) {
		throw new ImageError('MALFORMED_CHUNK', 'Missing IHDR chunk')
	}
	const ihdr = parseIHDR(ihdrChunk.data)

	if (ihdr.compressionMethod !== 0 || ihdr.filterMethod !== 0) {
		throw new ImageError('MALFORMED_CHUNK', 'Unknown compression or filter method', {
			compression: ihdr.compressionMethod,
			filter: ihdr.filterMethod,
		})
	}
	if (ihdr.colorType !== ColorType.RGBA || ihdr.bitDepth !== 8) {
		throw new ImageError('UNSUPPORTED', 'Only 8-bit RGBA PNG images are supported', {
			colorType: ihdr.colorType,
			bitDepth: ihdr.bitDepth,
		})
	}
	if (ihdr.interlaceMethod !== 0) {
		throw new ImageError('UNSUPPORTED', 'Interlaced PNG images are not supported')
	}
	if (ihdr.width === 0 || ihdr.height === 0) {
		throw new ImageError('MALFORMED_CHUNK', 'Invalid PNG dimensions', {
			width: ihdr.width,
			height: ihdr.height,
		})
	}

	// Concatenate IDAT chunks
	const idatChunks = chunks.filter((c) => c.type === ChunkType.IDAT)
	if (idatChunks.length === 0) {
		throw new ImageError('MALFORMED_CHUNK', 'Missing IDAT chunk')
	}
	const compressedLength = idatChunks.reduce((sum, c) => sum + c.data.length, 0)
	const compressed = new Uint8Array(compressedLength)
	let offset = 0
	for (const chunk of idatChunks) {
		compressed.set(chunk.data, offset)
		offset += chunk.data.length
	}

	const decompressed = inflateIdat(compressed)

	const bpp = RGBA8_BYTES_PER_PIXEL
	const scanlineBytes = ihdr.width * bpp
	const expectedBytes = (scanlineBytes + 1) * ihdr.height // +1 for filter byte

	if (decompressed.length < expectedBytes) {
		throw new ImageError(
			'TRUNCATED_FILE',
			`Decompressed data too short: ${decompressed.length} < ${expectedBytes}`,
			{ actual: decompressed.length, expected: expectedBytes }
		)
	}

	const pixels = new Uint8Array(scanlineBytes * ihdr.height)
	let prevScanline: Uint8Array | null = null

	for (let y = 0; y < ihdr.height; y++) {
		const start = y * (scanlineBytes + 1)
		const filterByte = decompressed[start]!
		const scanline = pixels.subarray(y * scanlineBytes, (y + 1) * scanlineBytes)
		scanline.set(decompressed.subarray(start + 1, start + 1 + scanlineBytes))

		unfilterScanline(filterByte, scanline, prevScanline, bpp)
		prevScanline = scanline
	}

	return {
		width: ihdr.width,
		height: ihdr.height,
		data: pixels,
	}
}
