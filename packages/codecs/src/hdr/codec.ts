import type { Codec, Rgbe8Image } from '@rgbe-kit/core'
import { decodeHdr } from './decoder'
import { encodeHdr } from './encoder'

/**
 * HDR (Radiance RGBE) codec
 */
export const HdrCodec: Codec<Rgbe8Image> = {
	format: 'hdr',

	decode(data: Uint8Array): Rgbe8Image {
		return decodeHdr(data)
	},

	encode(image: Rgbe8Image): Uint8Array {
		return encodeHdr(image)
	},
}
