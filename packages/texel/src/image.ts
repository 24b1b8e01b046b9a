/**
 * Whole-image texel conversion
 *
 * Texels convert independently, so any range of a buffer can be processed on
 * its own; these helpers simply walk the full buffer in order.
 */

import {
	type FloatImage,
	type Rgb9e5Image,
	type Rgba16fImage,
	type Rgbe8Image,
	assertTexelLength,
	createFloatImage,
	createRgb9e5Image,
	createRgba16fImage,
	createRgbe8Image,
} from '@rgbe-kit/core'
import { packRgb9e5, unpackRgb9e5 } from './rgb9e5'
import { rgb9e5ToRgba16f, readRgba16f, rgba16fToRgb9e5, rgba16fToRgbe8, writeRgba16f } from './rgba16f'
import { packRgbe8, readRgbe8, repackRgb9e5, unpackRgbe8, writeRgbe8 } from './rgbe8'
import type { Rgb } from './types'

function readRgb(data: Float32Array, index: number): Rgb {
	const offset = index * 3
	return [data[offset]!, data[offset + 1]!, data[offset + 2]!]
}

function writeRgb(data: Float32Array, index: number, rgb: Rgb): void {
	const offset = index * 3
	data[offset] = rgb[0]
	data[offset + 1] = rgb[1]
	data[offset + 2] = rgb[2]
}

export function rgbe8ImageToRgb9e5(image: Rgbe8Image): Rgb9e5Image {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 4)

	const output = createRgb9e5Image(width, height)
	for (let i = 0; i < output.data.length; i++) {
		output.data[i] = repackRgb9e5(readRgbe8(data, i))
	}
	return output
}

export function rgbe8ImageToFloat(image: Rgbe8Image): FloatImage {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 4)

	const output = createFloatImage(width, height)
	const count = width * height
	for (let i = 0; i < count; i++) {
		writeRgb(output.data, i, unpackRgbe8(readRgbe8(data, i)))
	}
	return output
}

export function floatImageToRgbe8(image: FloatImage): Rgbe8Image {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 3)

	const output = createRgbe8Image(width, height)
	const count = width * height
	for (let i = 0; i < count; i++) {
		writeRgbe8(output.data, i, packRgbe8(readRgb(data, i)))
	}
	return output
}

export function floatImageToRgb9e5(image: FloatImage): Rgb9e5Image {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 3)

	const output = createRgb9e5Image(width, height)
	for (let i = 0; i < output.data.length; i++) {
		output.data[i] = packRgb9e5(readRgb(data, i))
	}
	return output
}

export function rgb9e5ImageToFloat(image: Rgb9e5Image): FloatImage {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 1)

	const output = createFloatImage(width, height)
	for (let i = 0; i < data.length; i++) {
		writeRgb(output.data, i, unpackRgb9e5(data[i]!))
	}
	return output
}

export function rgb9e5ImageToRgba16f(image: Rgb9e5Image): Rgba16fImage {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 1)

	const output = createRgba16fImage(width, height)
	for (let i = 0; i < data.length; i++) {
		writeRgba16f(output.data, i, rgb9e5ToRgba16f(data[i]!))
	}
	return output
}

export function rgba16fImageToRgb9e5(image: Rgba16fImage): Rgb9e5Image {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 4)

	const output = createRgb9e5Image(width, height)
	for (let i = 0; i < output.data.length; i++) {
		output.data[i] = rgba16fToRgb9e5(readRgba16f(data, i))
	}
	return output
}

export function rgba16fImageToRgbe8(image: Rgba16fImage): Rgbe8Image {
	const { width, height, data } = image
	assertTexelLength(width, height, data.length, 4)

	const output = createRgbe8Image(width, height)
	const count = width * height
	for (let i = 0; i < count; i++) {
		writeRgbe8(output.data, i, rgba16fToRgbe8(readRgba16f(data, i)))
	}
	return output
}
