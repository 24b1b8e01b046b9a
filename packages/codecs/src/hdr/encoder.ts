import { type Rgbe8Image, assertTexelLength } from '@rgbe-kit/core'
import { HDR_FORMAT_32BIT_RLE_RGBE, HDR_MAGIC, HDR_MAX_RLE_WIDTH, HDR_MIN_RLE_WIDTH } from './types'

// Shortest repeat worth a run record
const MIN_RUN = 4
const MAX_RUN = 127
const MAX_LITERAL = 128

/**
 * Encode RGBE8 texels to HDR (Radiance RGBE)
 *
 * Scanlines narrower than 8 or wider than 0x7fff texels are written flat.
 * Readers take a (1, 1, 1, n) texel past the start of a flat scanline as an
 * old-style run record, so such texels do not survive decoding.
 */
export function encodeHdr(image: Rgbe8Image): Uint8Array {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 4)

	const header = `${[HDR_MAGIC, `FORMAT=${HDR_FORMAT_32BIT_RLE_RGBE}`, '', `-Y ${height} +X ${width}`].join('\n')}\n`
	const headerBytes = new TextEncoder().encode(header)

	// Worst case: header + 4 scanline marker bytes + each channel twice over
	const maxSize = headerBytes.length + height * (4 + width * 4 * 2)
	const output = new Uint8Array(maxSize)
	output.set(headerBytes, 0)
	let pos = headerBytes.length

	const rle = width >= HDR_MIN_RLE_WIDTH && width <= HDR_MAX_RLE_WIDTH
	const rowBytes = width * 4

	for (let y = 0; y < height; y++) {
		const scanline = data.subarray(y * rowBytes, (y + 1) * rowBytes)
		if (rle) {
			pos = encodeScanline(scanline, width, output, pos)
		} else {
			output.set(scanline, pos)
			pos += rowBytes
		}
	}

	return output.slice(0, pos)
}

/**
 * Encode a single scanline with per-channel RLE
 */
function encodeScanline(scanline: Uint8Array, width: number, output: Uint8Array, startPos: number): number {
	let pos = startPos

	output[pos++] = 0x02
	output[pos++] = 0x02
	output[pos++] = (width >> 8) & 0xff
	output[pos++] = width & 0xff

	for (let channel = 0; channel < 4; channel++) {
		const at = (x: number): number => scanline[x * 4 + channel]!
		let cur = 0

		while (cur < width) {
			// Find the next run of at least MIN_RUN equal bytes
			let runStart = cur
			let runLength = 0
			let prevRunLength = 0
			while (runLength < MIN_RUN && runStart < width) {
				runStart += runLength
				prevRunLength = runLength
				runLength = 1
				while (runStart + runLength < width && runLength < MAX_RUN && at(runStart) === at(runStart + runLength)) {
					runLength++
				}
			}

			// A short run right before the long one is still worth a run record
			if (prevRunLength > 1 && prevRunLength === runStart - cur) {
				output[pos++] = 128 + prevRunLength
				output[pos++] = at(cur)
				cur = runStart
			}

			while (cur < runStart) {
				const count = Math.min(MAX_LITERAL, runStart - cur)
				output[pos++] = count
				for (let i = 0; i < count; i++) {
					output[pos++] = at(cur + i)
				}
				cur += count
			}

			if (runLength >= MIN_RUN) {
				output[pos++] = 128 + runLength
				output[pos++] = at(runStart)
				cur += runLength
			}
		}
	}

	return pos
}
