import { describe, expect, test } from 'vitest'
import { HALF_MAX, floatToHalf, halfToFloat } from './half'
import { makeRgb9e5, packRgb9e5, unpackRgb9e5 } from './rgb9e5'
import {
	readRgba16f,
	rgb9e5ToRgba16f,
	rgba16fFromF32,
	rgba16fToF32,
	rgba16fToRgb9e5,
	rgba16fToRgbe8,
	writeRgba16f,
} from './rgba16f'

describe('half precision', () => {
	test('converts common values', () => {
		expect(floatToHalf(1)).toBe(0x3c00)
		expect(floatToHalf(0.5)).toBe(0x3800)
		expect(floatToHalf(-2)).toBe(0xc000)
		expect(floatToHalf(HALF_MAX)).toBe(0x7bff)
		expect(halfToFloat(0xc000)).toBe(-2)
		expect(halfToFloat(0x7bff)).toBe(HALF_MAX)
	})

	test('rounds ties to even', () => {
		// 1 + 2^-11 sits halfway between 1 and the next half
		expect(floatToHalf(1 + 2 ** -11)).toBe(0x3c00)
		expect(floatToHalf(1 + 3 * 2 ** -11)).toBe(0x3c02)
	})

	test('overflows to infinity past the largest half', () => {
		expect(floatToHalf(65520)).toBe(0x7c00)
		expect(floatToHalf(Number.POSITIVE_INFINITY)).toBe(0x7c00)
		expect(floatToHalf(Number.NEGATIVE_INFINITY)).toBe(0xfc00)
	})

	test('keeps NaN', () => {
		expect(Number.isNaN(halfToFloat(floatToHalf(Number.NaN)))).toBe(true)
	})

	test('rounds into subnormals', () => {
		expect(floatToHalf(2 ** -24)).toBe(0x0001)
		expect(floatToHalf(2 ** -25)).toBe(0x0000)
		expect(floatToHalf(3 * 2 ** -26)).toBe(0x0001)
		expect(floatToHalf(2 ** -14)).toBe(0x0400)
		expect(halfToFloat(0x0001)).toBe(2 ** -24)
	})
})

describe('RGBA16F', () => {
	test('builds from f32 channels', () => {
		expect(rgba16fFromF32([1, 0.5, 0, 1])).toEqual({ r: 0x3c00, g: 0x3800, b: 0, a: 0x3c00 })
		expect(rgba16fToF32({ r: 0x3c00, g: 0x3800, b: 0, a: 0x3c00 })).toEqual([1, 0.5, 0, 1])
	})

	test('drops alpha when packing', () => {
		const opaque = rgba16fFromF32([1, 1, 1, 1])
		const clear = rgba16fFromF32([1, 1, 1, 0])
		expect(rgba16fToRgb9e5(opaque)).toBe(0x84020100)
		expect(rgba16fToRgb9e5(clear)).toBe(0x84020100)
		expect(rgba16fToRgbe8(clear)).toEqual({ r: 128, g: 128, b: 128, e: 129 })
	})

	test('packs the same word as the float path', () => {
		const texel = rgba16fFromF32([3.25, 0.125, 100, 1])
		expect(rgba16fToRgb9e5(texel)).toBe(packRgb9e5([3.25, 0.125, 100]))
	})

	test('widens RGB9E5 with opaque alpha', () => {
		expect(rgb9e5ToRgba16f(0x84020100)).toEqual({ r: 0x3c00, g: 0x3c00, b: 0x3c00, a: 0x3c00 })
	})

	test('widens RGB9E5 losslessly over the whole exponent range', () => {
		const mantissas = [0, 1, 2, 3, 127, 255, 256, 257, 384, 510, 511]
		for (let e = 0; e < 32; e++) {
			for (const r of mantissas) {
				for (const g of mantissas) {
					const word = makeRgb9e5(r, g, 511 - r, e)
					const [hr, hg, hb, ha] = rgba16fToF32(rgb9e5ToRgba16f(word))
					expect([hr, hg, hb]).toEqual(unpackRgb9e5(word))
					expect(ha).toBe(1)
				}
			}
		}
	})

	test('reads and writes flat half buffers', () => {
		const data = new Uint16Array(8)
		writeRgba16f(data, 1, { r: 1, g: 2, b: 3, a: 4 })
		expect(Array.from(data)).toEqual([0, 0, 0, 0, 1, 2, 3, 4])
		expect(readRgba16f(data, 1)).toEqual({ r: 1, g: 2, b: 3, a: 4 })
	})
})
