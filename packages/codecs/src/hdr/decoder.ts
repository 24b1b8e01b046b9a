import { ImageError, type Rgbe8Image, createRgbe8Image } from '@rgbe-kit/core'
import {
	HDR_FORMAT_32BIT_RLE_RGBE,
	HDR_MAGIC,
	HDR_MAGIC_ALT,
	HDR_MAX_RLE_WIDTH,
	HDR_MAX_TEXELS,
	HDR_MIN_RLE_WIDTH,
	type HdrHeader,
	type HdrTexelVisitor,
} from './types'

/**
 * Decode HDR (Radiance RGBE) to RGBE8 texels, bytes kept as stored
 */
export function decodeHdr(data: Uint8Array): Rgbe8Image {
	const header = parseHdrHeader(data)
	const image = createRgbe8Image(header.width, header.height)
	const out = image.data

	walkTexels(data, header, (x, y, r, g, b, e) => {
		const idx = (y * header.width + x) * 4
		out[idx] = r
		out[idx + 1] = g
		out[idx + 2] = b
		out[idx + 3] = e
	})

	return image
}

/**
 * Walk every texel of an HDR file, top-left first, and return the header
 */
export function readHdrTexels(data: Uint8Array, visit: HdrTexelVisitor): HdrHeader {
	const header = parseHdrHeader(data)
	walkTexels(data, header, visit)
	return header
}

function walkTexels(data: Uint8Array, header: HdrHeader, visit: HdrTexelVisitor): void {
	const { width, height, flipX, flipY } = header

	const scanline = new Uint8Array(width * 4)
	let offset = header.dataOffset

	for (let row = 0; row < height; row++) {
		offset = decodeScanline(data, offset, scanline, width)
		const y = flipY ? height - 1 - row : row

		for (let col = 0; col < width; col++) {
			const x = flipX ? width - 1 - col : col
			const i = col * 4
			visit(x, y, scanline[i]!, scanline[i + 1]!, scanline[i + 2]!, scanline[i + 3]!)
		}
	}
}

function startsWithText(data: Uint8Array, text: string): boolean {
	if (data.length < text.length) return false
	for (let i = 0; i < text.length; i++) {
		if (data[i] !== text.charCodeAt(i)) return false
	}
	return true
}

/**
 * Read one header line (without its newline) starting at `pos`
 */
function readLine(data: Uint8Array, pos: number): { line: string; next: number } {
	let end = pos
	while (end < data.length && data[end] !== 0x0a) end++
	if (end >= data.length) {
		throw new ImageError('TRUNCATED_FILE', 'Invalid HDR: header ends before pixel data', { offset: pos })
	}
	let line = ''
	for (let i = pos; i < end; i++) line += String.fromCharCode(data[i]!)
	return { line: line.endsWith('\r') ? line.slice(0, -1) : line, next: end + 1 }
}

/**
 * Parse HDR header up to and including the resolution string
 */
export function parseHdrHeader(data: Uint8Array): HdrHeader {
	const header: HdrHeader = {
		format: HDR_FORMAT_32BIT_RLE_RGBE,
		exposure: 1,
		gamma: 1,
		width: 0,
		height: 0,
		flipY: false,
		flipX: false,
		dataOffset: 0,
	}

	if (!startsWithText(data, HDR_MAGIC) && !startsWithText(data, HDR_MAGIC_ALT)) {
		throw new ImageError('INVALID_MAGIC', 'Invalid HDR: bad magic')
	}
	let cursor = readLine(data, 0)

	// Variables until the blank line
	for (;;) {
		cursor = readLine(data, cursor.next)
		const { line } = cursor
		if (line === '') break

		if (line.startsWith('FORMAT=')) {
			header.format = line.substring(7).trim()
		} else if (line.startsWith('EXPOSURE=')) {
			header.exposure *= Number.parseFloat(line.substring(9))
		} else if (line.startsWith('GAMMA=')) {
			header.gamma = Number.parseFloat(line.substring(6))
		}
	}

	if (header.format !== HDR_FORMAT_32BIT_RLE_RGBE) {
		throw new ImageError('UNSUPPORTED', `Unsupported HDR pixel format: ${header.format}`)
	}

	// Resolution string: "-Y height +X width" and its flipped variants
	cursor = readLine(data, cursor.next)
	const resolution = cursor.line.trim()
	const match = resolution.match(/^([+-])Y\s+(\d+)\s+([+-])X\s+(\d+)$/)
	if (!match) {
		if (/^[+-]X\s+\d+\s+[+-]Y\s+\d+$/.test(resolution)) {
			throw new ImageError('UNSUPPORTED', 'Column-major HDR images are not supported')
		}
		throw new ImageError('MALFORMED_HEADER', `Invalid HDR resolution string: ${resolution}`)
	}

	header.height = Number.parseInt(match[2]!, 10)
	header.width = Number.parseInt(match[4]!, 10)
	header.flipY = match[1] === '+'
	header.flipX = match[3] === '-'
	header.dataOffset = cursor.next

	if (header.width <= 0 || header.height <= 0) {
		throw new ImageError('MALFORMED_HEADER', 'Invalid HDR dimensions', {
			width: header.width,
			height: header.height,
		})
	}

	if (header.width * header.height > HDR_MAX_TEXELS) {
		throw new ImageError('UNSUPPORTED', 'HDR image too large', {
			width: header.width,
			height: header.height,
		})
	}

	// Every scanline takes at least one texel record, plus a run record when
	// wider than one texel
	const minRowBytes = header.width === 1 ? 4 : 8
	const available = data.length - header.dataOffset
	if (header.height * minRowBytes > available) {
		throw new ImageError('TRUNCATED_FILE', 'Invalid HDR: pixel data shorter than the declared size', {
			width: header.width,
			height: header.height,
			available,
		})
	}

	return header
}

function truncated(offset: number): ImageError {
	return new ImageError('TRUNCATED_FILE', 'Invalid HDR: scanline data ends early', { offset })
}

/**
 * Decode a single scanline into `scanline` (RGBE bytes), returning the next offset
 */
function decodeScanline(data: Uint8Array, offset: number, scanline: Uint8Array, width: number): number {
	if (width < HDR_MIN_RLE_WIDTH || width > HDR_MAX_RLE_WIDTH) {
		return decodeFlatScanline(data, offset, scanline, width)
	}
	if (offset + 4 > data.length) throw truncated(offset)

	// New RLE format starts with 0x02 0x02 and the 15-bit scanline width
	if (data[offset] !== 0x02 || data[offset + 1] !== 0x02 || (data[offset + 2]! & 0x80) !== 0) {
		return decodeFlatScanline(data, offset, scanline, width)
	}

	const encodedWidth = (data[offset + 2]! << 8) | data[offset + 3]!
	if (encodedWidth !== width) {
		throw new ImageError('MALFORMED_DATA', 'Invalid HDR: scanline width mismatch', {
			offset,
			width,
			encodedWidth,
		})
	}

	// Each channel is run-length encoded separately
	let pos = offset + 4
	for (let channel = 0; channel < 4; channel++) {
		let x = 0
		while (x < width) {
			if (pos >= data.length) throw truncated(pos)
			const byte = data[pos++]!

			if (byte > 128) {
				const count = byte - 128
				if (x + count > width || pos >= data.length) throw badRun(pos)
				const value = data[pos++]!
				for (let i = 0; i < count; i++) {
					scanline[(x + i) * 4 + channel] = value
				}
				x += count
			} else {
				const count = byte
				if (count === 0 || x + count > width) throw badRun(pos)
				if (pos + count > data.length) throw truncated(pos)
				for (let i = 0; i < count; i++) {
					scanline[(x + i) * 4 + channel] = data[pos++]!
				}
				x += count
			}
		}
	}

	return pos
}

function badRun(offset: number): ImageError {
	return new ImageError('MALFORMED_DATA', 'Invalid HDR: bad scanline run length', { offset })
}

/**
 * Flat RGBE texels, with old-style runs: (1, 1, 1, n) repeats the previous
 * texel n times, consecutive run texels adding 8 more bits to the count
 */
function decodeFlatScanline(data: Uint8Array, offset: number, scanline: Uint8Array, width: number): number {
	let pos = offset
	let x = 0
	let shift = 0

	while (x < width) {
		if (pos + 4 > data.length) throw truncated(pos)
		const r = data[pos]!
		const g = data[pos + 1]!
		const b = data[pos + 2]!
		const e = data[pos + 3]!
		pos += 4

		// A leading (1, 1, 1, n) has nothing to repeat and is read as a texel
		if (r === 1 && g === 1 && b === 1 && x > 0) {
			const count = e * 2 ** shift
			if (x + count > width) throw badRun(pos - 4)
			const prev = (x - 1) * 4
			for (let i = 0; i < count; i++) {
				scanline.copyWithin(x * 4, prev, prev + 4)
				x++
			}
			shift += 8
		} else {
			const i = x * 4
			scanline[i] = r
			scanline[i + 1] = g
			scanline[i + 2] = b
			scanline[i + 3] = e
			x++
			shift = 0
		}
	}

	return pos
}
