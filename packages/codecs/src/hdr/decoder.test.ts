import { isImageError } from '@rgbe-kit/core'
import { describe, expect, test } from 'vitest'
import { HdrCodec } from './codec'
import { decodeHdr, parseHdrHeader, readHdrTexels } from './decoder'
import { encodeHdr } from './encoder'

function hdrFile(header: string, pixels: number[]): Uint8Array {
	const head = new TextEncoder().encode(header)
	const out = new Uint8Array(head.length + pixels.length)
	out.set(head, 0)
	out.set(pixels, head.length)
	return out
}

const HEADER = '#?RADIANCE\nFORMAT=32-bit_rle_rgbe\n\n'

function codeOf(fn: () => unknown): string | undefined {
	try {
		fn()
	} catch (err) {
		return isImageError(err) ? err.code : 'not an ImageError'
	}
	return undefined
}

// RGBE8 test image: texel i gets mantissas from a short repeating pattern so
// scanlines mix runs and literals
function createTestImage(width: number, height: number) {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) {
		data[i * 4] = i % 5 === 0 ? 200 : 17 * (i % 7)
		data[i * 4 + 1] = Math.floor(i / 6) % 3 === 0 ? 64 : 90
		data[i * 4 + 2] = (i * 31) % 256
		data[i * 4 + 3] = 128 + (Math.floor(i / 10) % 4)
	}
	return { width, height, data }
}

describe('HDR Codec', () => {
	describe('encode', () => {
		test('writes the Radiance header', () => {
			const encoded = HdrCodec.encode(createTestImage(256, 128))
			const text = new TextDecoder().decode(encoded.slice(0, 50))
			expect(text.startsWith('#?RADIANCE\nFORMAT=32-bit_rle_rgbe\n\n-Y 128 +X 256\n')).toBe(true)
		})

		test('starts RLE scanlines with the width marker', () => {
			const encoded = encodeHdr(createTestImage(300, 1))
			const offset = parseHdrHeader(encoded).dataOffset
			expect(Array.from(encoded.subarray(offset, offset + 4))).toEqual([2, 2, 1, 44])
		})

		test('compresses solid colour', () => {
			const image = { width: 64, height: 64, data: new Uint8Array(64 * 64 * 4).fill(128) }
			expect(encodeHdr(image).length).toBeLessThan(64 * 64 * 4 / 10)
		})
	})

	describe('round trip', () => {
		test('reads a (1, 1, 1, n) texel in a flat row as a run', () => {
			// Flat rows cannot tell such a texel from an old-style run record
			const image = { width: 2, height: 1, data: new Uint8Array([5, 6, 7, 128, 1, 1, 1, 1]) }
			expect(Array.from(decodeHdr(encodeHdr(image)).data)).toEqual([5, 6, 7, 128, 5, 6, 7, 128])
		})

		test('returns the stored RGBE8 bytes for RLE and flat widths', () => {
			for (const [width, height] of [
				[16, 4],
				[8, 2],
				[7, 3],
				[1, 1],
				[200, 3],
			] as const) {
				const original = createTestImage(width, height)
				const decoded = decodeHdr(encodeHdr(original))
				expect(decoded.width).toBe(width)
				expect(decoded.height).toBe(height)
				expect(decoded.data).toEqual(original.data)
			}
		})
	})

	describe('decode', () => {
		test('parses header variables', () => {
			const data = hdrFile('#?RGBE\nEXPOSURE=2\nGAMMA=2.2\nFORMAT=32-bit_rle_rgbe\n\n-Y 1 +X 1\n', [1, 2, 3, 4])
			const header = parseHdrHeader(data)
			expect(header.exposure).toBe(2)
			expect(header.gamma).toBe(2.2)
			expect(header.width).toBe(1)
			expect(header.height).toBe(1)
			expect(header.dataOffset).toBe(data.length - 4)
		})

		test('decodes per-channel runs and literals', () => {
			const data = hdrFile(`${HEADER}-Y 1 +X 8\n`, [
				2, 2, 0, 8,
				136, 10, // R: run of 8
				8, 1, 2, 3, 4, 5, 6, 7, 8, // G: 8 literals
				130, 5, 6, 0, 1, 2, 3, 4, 5, // B: run of 2, 6 literals
				136, 128, // E: run of 8
			])
			const decoded = decodeHdr(data)
			expect(Array.from(decoded.data.subarray(0, 8))).toEqual([10, 1, 5, 128, 10, 2, 5, 128])
			expect(Array.from(decoded.data.subarray(28, 32))).toEqual([10, 8, 5, 128])
		})

		test('expands old-style runs', () => {
			const data = hdrFile(`${HEADER}-Y 1 +X 8\n`, [10, 20, 30, 128, 1, 1, 1, 7])
			const decoded = decodeHdr(data)
			for (let x = 0; x < 8; x++) {
				expect(Array.from(decoded.data.subarray(x * 4, x * 4 + 4))).toEqual([10, 20, 30, 128])
			}
		})

		test('widens consecutive old-style run counts by 8 bits', () => {
			const data = hdrFile(`${HEADER}-Y 1 +X 300\n`, [9, 9, 9, 130, 1, 1, 1, 43, 1, 1, 1, 1])
			const decoded = decodeHdr(data)
			expect(Array.from(decoded.data.subarray(299 * 4))).toEqual([9, 9, 9, 130])
		})

		test('reads a leading (1, 1, 1, n) as a texel', () => {
			const decoded = decodeHdr(hdrFile(`${HEADER}-Y 1 +X 1\n`, [1, 1, 1, 100]))
			expect(Array.from(decoded.data)).toEqual([1, 1, 1, 100])
		})

		test('flips bottom-up and right-to-left images', () => {
			const up = decodeHdr(hdrFile(`${HEADER}+Y 2 +X 1\n`, [1, 0, 0, 128, 2, 0, 0, 128]))
			expect(Array.from(up.data)).toEqual([2, 0, 0, 128, 1, 0, 0, 128])

			const left = decodeHdr(hdrFile(`${HEADER}-Y 1 -X 2\n`, [1, 0, 0, 128, 2, 0, 0, 128]))
			expect(Array.from(left.data)).toEqual([2, 0, 0, 128, 1, 0, 0, 128])
		})

		test('visits texels top-left first', () => {
			const seen: string[] = []
			const header = readHdrTexels(hdrFile(`${HEADER}-Y 2 +X 2\n`, [
				1, 0, 0, 128, 2, 0, 0, 128,
				3, 0, 0, 128, 4, 0, 0, 128,
			]), (x, y, r) => {
				seen.push(`${x},${y}:${r}`)
			})
			expect(header.width).toBe(2)
			expect(seen).toEqual(['0,0:1', '1,0:2', '0,1:3', '1,1:4'])
		})
	})

	describe('errors', () => {
		test('rejects bad magic', () => {
			const bad = new TextEncoder().encode('#?INVALID\n-Y 1 +X 1\n')
			expect(() => decodeHdr(bad)).toThrow('Invalid HDR: bad magic')
			expect(codeOf(() => decodeHdr(new Uint8Array([0, 1, 2])))).toBe('INVALID_MAGIC')
		})

		test('rejects XYZE and column-major images', () => {
			const xyze = hdrFile('#?RADIANCE\nFORMAT=32-bit_rle_xyze\n\n-Y 1 +X 1\n', [0, 0, 0, 0])
			expect(codeOf(() => decodeHdr(xyze))).toBe('UNSUPPORTED')
			expect(codeOf(() => decodeHdr(hdrFile(`${HEADER}+X 1 -Y 1\n`, [0, 0, 0, 0])))).toBe('UNSUPPORTED')
		})

		test('rejects a malformed resolution string', () => {
			expect(codeOf(() => decodeHdr(hdrFile(`${HEADER}-Y one +X 1\n`, [])))).toBe('MALFORMED_HEADER')
		})

		test('rejects truncated data', () => {
			expect(codeOf(() => decodeHdr(hdrFile(`${HEADER}-Y 1 +X 2\n`, [1, 2, 3, 4, 5])))).toBe('TRUNCATED_FILE')
			expect(codeOf(() => decodeHdr(new TextEncoder().encode('#?RADIANCE\nFORMAT=32-bit_rle_rgbe')))).toBe(
				'TRUNCATED_FILE'
			)
		})

		test('rejects a scanline width mismatch', () => {
			const data = hdrFile(`${HEADER}-Y 1 +X 8\n`, [2, 2, 0, 9, 0, 0, 0, 0])
			expect(codeOf(() => decodeHdr(data))).toBe('MALFORMED_DATA')
		})

		test('rejects a declared size the data cannot hold before allocating', () => {
			const short = hdrFile(`${HEADER}-Y 1000 +X 1000\n`, [1, 2, 3, 4])
			expect(codeOf(() => decodeHdr(short))).toBe('TRUNCATED_FILE')
			expect(codeOf(() => parseHdrHeader(short))).toBe('TRUNCATED_FILE')

			const huge = hdrFile(`${HEADER}-Y 100000 +X 100000\n`, [1, 2, 3, 4])
			expect(codeOf(() => decodeHdr(huge))).toBe('UNSUPPORTED')
		})
	})
})
