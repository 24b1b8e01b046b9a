import {
	PngCodec,
	type PngEncodeOptions,
	decodeHdr,
	parseHdrHeader,
	readHdrTexels,
} from '@rgbe-kit/codecs'
import {
	ImageError,
	type Rgb9e5Image,
	type Rgbe8Image,
	createRgb9e5Image,
	detectFormat,
} from '@rgbe-kit/core'
import { rgbe8ImageToRgb9e5, repackRgb9e5 } from '@rgbe-kit/texel'

/**
 * Read a Radiance HDR file as RGBE8 texels
 */
export function decodeRadiance(data: Uint8Array): Rgbe8Image {
	return decodeHdr(data)
}

/**
 * Read a Radiance HDR file straight into RGB9E5 texels, without an
 * intermediate RGBE8 image
 */
export function decodeRadianceAsRgb9e5(data: Uint8Array): Rgb9e5Image {
	const { width, height } = parseHdrHeader(data)
	const image = createRgb9e5Image(width, height)
	const out = image.data

	readHdrTexels(data, (x, y, r, g, b, e) => {
		out[y * width + x] = repackRgb9e5({ r, g, b, e })
	})

	return image
}

/**
 * Read an RGBA8 PNG whose alpha channel holds the RGBE8 exponent
 */
export function decodeRgbe8Png(data: Uint8Array): Rgbe8Image {
	return PngCodec.decode(data)
}

/**
 * Read an RGBE8 PNG and convert it to RGB9E5 texels for GPU upload
 */
export function decodeRgbe8PngAsRgb9e5(data: Uint8Array): Rgb9e5Image {
	return rgbe8ImageToRgb9e5(decodeRgbe8Png(data))
}

/**
 * Write RGBE8 texels as an RGBA8 PNG, exponent in alpha
 *
 * PNG compression is slow at the default level; meant for asset creation.
 */
export function encodeRgbe8Png(image: Rgbe8Image, options?: PngEncodeOptions): Uint8Array {
	return PngCodec.encode(image, options)
}

/**
 * Read RGBE8 texels from either container, chosen by magic bytes
 */
export function decodeRgbe8(data: Uint8Array): Rgbe8Image {
	const format = detectFormat(data)

	switch (format) {
		case 'hdr':
			return decodeRadiance(data)
		case 'png':
			return decodeRgbe8Png(data)
		default:
			throw new ImageError('UNKNOWN_FORMAT', 'Unknown image format')
	}
}
