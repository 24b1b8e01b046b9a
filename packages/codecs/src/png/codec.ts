import type { Codec, ImageData } from '@rgbe-kit/core'
import { decodePng } from './decoder'
import { encodePng } from './encoder'
import type { PngEncodeOptions } from './types'

/**
 * RGBA8 PNG codec
 */
export const PngCodec: Codec<ImageData, PngEncodeOptions> = {
	format: 'png',

	decode(data: Uint8Array): ImageData {
		return decodePng(data)
	},

	encode(image: ImageData, options?: PngEncodeOptions): Uint8Array {
		return encodePng(image, options)
	},
}
