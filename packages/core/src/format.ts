import type { ContainerFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ContainerFormat, number[][]> = {
	png: [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
	hdr: [
		[0x23, 0x3f, 0x52, 0x41, 0x44, 0x49, 0x41, 0x4e, 0x43, 0x45], // "#?RADIANCE"
		[0x23, 0x3f, 0x52, 0x47, 0x42, 0x45], // "#?RGBE"
	],
}

/**
 * Check if bytes start with a magic signature
 */
function matchMagic(data: Uint8Array, bytes: number[]): boolean {
	if (data.length < bytes.length) return false

	for (let i = 0; i < bytes.length; i++) {
		if (data[i] !== bytes[i]) return false
	}
	return true
}

/**
 * Detect container format from binary data
 */
export function detectFormat(data: Uint8Array): ContainerFormat | null {
	if (MAGIC_BYTES.png.some((bytes) => matchMagic(data, bytes))) return 'png'
	if (MAGIC_BYTES.hdr.some((bytes) => matchMagic(data, bytes))) return 'hdr'
	return null
}

/**
 * Guess a container format from a file name
 */
export function formatFromPath(path: string): ContainerFormat | null {
	const lower = path.toLowerCase()
	if (lower.endsWith('.png')) return 'png'
	if (lower.endsWith('.hdr') || lower.endsWith('.pic') || lower.endsWith('.rgbe')) return 'hdr'
	return null
}
