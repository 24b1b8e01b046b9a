import { readFile, writeFile } from 'node:fs/promises'
import type { PngEncodeOptions } from '@rgbe-kit/codecs'
import { ImageError, type Rgb9e5Image, type Rgbe8Image } from '@rgbe-kit/core'
import { decodeRadiance, decodeRgbe8Png, decodeRgbe8PngAsRgb9e5, encodeRgbe8Png } from './decode'

function ioError(action: string, path: string, cause: unknown): ImageError {
	const reason = cause instanceof Error ? cause.message : String(cause)
	return new ImageError('IO', `Failed to ${action} ${path}: ${reason}`, { path }, { cause })
}

async function readBytes(path: string): Promise<Uint8Array> {
	try {
		return new Uint8Array(await readFile(path))
	} catch (err) {
		throw ioError('read', path, err)
	}
}

/**
 * Load a Radiance HDR file as RGBE8 texels
 */
export async function loadRadianceFile(path: string): Promise<Rgbe8Image> {
	return decodeRadiance(await readBytes(path))
}

/**
 * Load an RGBE8 PNG file
 */
export async function loadRgbe8PngFile(path: string): Promise<Rgbe8Image> {
	return decodeRgbe8Png(await readBytes(path))
}

/**
 * Load an RGBE8 PNG file converted to RGB9E5, ready for a GPU texture
 */
export async function loadRgbe8PngFileAsRgb9e5(path: string): Promise<Rgb9e5Image> {
	return decodeRgbe8PngAsRgb9e5(await readBytes(path))
}

/**
 * Save RGBE8 texels as an RGBA8 PNG file
 */
export async function saveRgbe8PngFile(
	path: string,
	image: Rgbe8Image,
	options?: PngEncodeOptions
): Promise<void> {
	const encoded = encodeRgbe8Png(image, options)
	try {
		await writeFile(path, encoded)
	} catch (err) {
		throw ioError('write', path, err)
	}
}
