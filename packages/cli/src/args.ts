import { existsSync, readdirSync, statSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'

export interface CliOptions {
	// Output
	out?: string
	overwrite?: boolean

	// PNG zlib level, 0-9
	level?: number

	// Flags
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean

	// Commands
	help?: boolean
	version?: boolean
}

export const OUTPUT_SUFFIX = '.rgbe.png'

function parseLevel(value: string): number {
	if (!/^\d$/.test(value)) {
		throw new Error(`Invalid compression level: ${value} (expected 0-9)`)
	}
	return Number.parseInt(value, 10)
}

/**
 * Split argv into input paths/patterns and options
 */
export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if ((arg === '--out' || arg === '-o') && args[i + 1]) {
			options.out = args[++i]
		} else if ((arg === '--level' || arg === '-l') && args[i + 1]) {
			options.level = parseLevel(args[++i]!)
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

export function matchGlob(pattern: string, str: string): boolean {
	const regexPattern = pattern
		.replace(/\./g, '\\.')
		.replace(/\*\*\//g, '<<<GLOBSTAR_DIR>>>')
		.replace(/\*\*/g, '<<<GLOBSTAR>>>')
		.replace(/\*/g, '[^/]*')
		.replace(/\?/g, '[^/]')
		.replace(/<<<GLOBSTAR_DIR>>>/g, '(?:.*/)?')
		.replace(/<<<GLOBSTAR>>>/g, '.*')

	return new RegExp(`^${regexPattern}$`).test(str)
}

/**
 * Resolve a path or glob pattern to the files it names, sorted
 */
export function expandGlob(pattern: string, baseDir = '.'): string[] {
	const results: string[] = []

	if (!pattern.includes('*') && !pattern.includes('?')) {
		const fullPath = resolve(baseDir, pattern)
		if (existsSync(fullPath) && statSync(fullPath).isFile()) {
			return [fullPath]
		}
		return []
	}

	// Split into the literal directory prefix and the glob part
	const parts = pattern.split('/')
	const baseParts: string[] = []
	const patternParts: string[] = []
	let foundGlob = false

	for (const part of parts) {
		if (foundGlob || part.includes('*') || part.includes('?')) {
			foundGlob = true
			patternParts.push(part)
		} else {
			baseParts.push(part)
		}
	}

	const resolvedBase = resolve(baseDir, baseParts.join('/'))
	const filePattern = patternParts.join('/')
	const isRecursive = filePattern.includes('**') || patternParts.length > 1

	function walk(dir: string): void {
		if (!existsSync(dir)) return

		for (const entry of readdirSync(dir, { withFileTypes: true })) {
			const fullPath = join(dir, entry.name)
			const relativePath = fullPath.slice(resolvedBase.length + 1)

			if (entry.isDirectory()) {
				if (isRecursive) walk(fullPath)
			} else if (entry.isFile() && matchGlob(filePattern, relativePath)) {
				results.push(fullPath)
			}
		}
	}

	walk(resolvedBase)
	return results.sort()
}

/**
 * `<dir>/<name>.rgbe.png` for `<dir>/<name>.<ext>`, or under `outDir`
 */
export function outputPathFor(input: string, outDir?: string): string {
	const name = basename(input, extname(input))
	return join(outDir ? resolve(outDir) : dirname(input), `${name}${OUTPUT_SUFFIX}`)
}
