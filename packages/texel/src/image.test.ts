import { isImageError } from '@rgbe-kit/core'
import { describe, expect, test } from 'vitest'
import {
	floatImageToRgb9e5,
	floatImageToRgbe8,
	rgb9e5ImageToFloat,
	rgb9e5ImageToRgba16f,
	rgba16fImageToRgb9e5,
	rgba16fImageToRgbe8,
	rgbe8ImageToFloat,
	rgbe8ImageToRgb9e5,
} from './image'

describe('image conversion', () => {
	const rgbe8 = {
		width: 2,
		height: 1,
		data: new Uint8Array([128, 128, 128, 129, 255, 0, 0, 128]),
	}

	test('repacks RGBE8 images to RGB9E5', () => {
		const out = rgbe8ImageToRgb9e5(rgbe8)
		expect(out.width).toBe(2)
		expect(out.height).toBe(1)
		expect(Array.from(out.data)).toEqual([0x84020100, 0x780001fe])
	})

	test('unpacks RGBE8 images to floats', () => {
		const out = rgbe8ImageToFloat(rgbe8)
		expect(Array.from(out.data)).toEqual([1, 1, 1, 255 / 256, 0, 0])
	})

	test('packs float images both ways', () => {
		const floats = { width: 1, height: 2, data: new Float32Array([1, 1, 1, 0.5, 0.25, 0]) }
		expect(Array.from(floatImageToRgbe8(floats).data)).toEqual([128, 128, 128, 129, 128, 64, 0, 128])
		const packed = floatImageToRgb9e5(floats)
		expect(packed.data[0]).toBe(0x84020100)
		expect(Array.from(rgb9e5ImageToFloat(packed).data)).toEqual([1, 1, 1, 0.5, 0.25, 0])
	})

	test('round-trips RGB9E5 through RGBA16F', () => {
		const packed = rgbe8ImageToRgb9e5(rgbe8)
		const halves = rgb9e5ImageToRgba16f(packed)
		expect(Array.from(halves.data.slice(0, 4))).toEqual([0x3c00, 0x3c00, 0x3c00, 0x3c00])
		expect(Array.from(rgba16fImageToRgb9e5(halves).data)).toEqual(Array.from(packed.data))
		expect(Array.from(rgba16fImageToRgbe8(halves).data.slice(0, 4))).toEqual([128, 128, 128, 129])
	})

	test('rejects buffers that do not match the dimensions', () => {
		const bad = { width: 3, height: 1, data: new Uint8Array(8) }
		try {
			rgbe8ImageToRgb9e5(bad)
			expect.unreachable()
		} catch (err) {
			expect(isImageError(err) && err.code).toBe('DIMENSION_MISMATCH')
		}
	})
})
