/**
 * Load and save RGBE8 HDR textures
 *
 * Radiance `.hdr` files and RGBA8 PNGs with the shared exponent in alpha,
 * decoded to RGBE8 or straight to RGB9E5.
 */

export * from '@rgbe-kit/core'
export * from '@rgbe-kit/texel'

export {
	decodeRadiance,
	decodeRadianceAsRgb9e5,
	decodeRgbe8,
	decodeRgbe8Png,
	decodeRgbe8PngAsRgb9e5,
	encodeRgbe8Png,
} from './decode'
export type { PngEncodeOptions } from '@rgbe-kit/codecs'
export { loadRadianceFile, loadRgbe8PngFile, loadRgbe8PngFileAsRgb9e5, saveRgbe8PngFile } from './file'
