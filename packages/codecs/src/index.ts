/**
 * Container codecs for RGBE8 texels: Radiance HDR and RGBA8 PNG
 */

export * from './hdr'
export * from './png'
