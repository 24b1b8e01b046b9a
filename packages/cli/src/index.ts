#!/usr/bin/env node
/**
 * hdr2rgbe-png - convert Radiance HDR images to RGBE8 PNG
 *
 * The shared exponent goes into the PNG alpha channel.
 */

import { basename } from 'node:path'
import { type CliOptions, parseArgs } from './args'
import { convertFile, planJobs } from './convert'

const VERSION = '0.1.0'

const HELP = `
hdr2rgbe-png - Convert Radiance HDR images to RGBE8 PNG

USAGE:
  hdr2rgbe-png <input.hdr...> [options]
  hdr2rgbe-png "<pattern>" [options]

Each input <name>.hdr is written as <name>.rgbe.png next to it,
with the shared exponent stored in the alpha channel.

OPTIONS:
  -o, --out <dir>       Output directory
  -l, --level <0-9>     PNG compression level (default 9)
  --overwrite           Overwrite existing files
  --dry-run             Show what would be done without doing it
  -v, --verbose         Verbose output
  --quiet               Suppress output
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  hdr2rgbe-png sky.hdr                          # Writes sky.rgbe.png
  hdr2rgbe-png "probes/**/*.hdr" -o textures/   # Recursive batch
  hdr2rgbe-png sky.hdr -l 1 --overwrite         # Fast, replace output
`

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function readArgs(): { inputs: string[]; options: CliOptions } {
	try {
		return parseArgs(process.argv.slice(2))
	} catch (err) {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
		console.error('Run with --help for usage')
		process.exit(1)
	}
}

async function main(): Promise<void> {
	const { inputs, options } = readArgs()

	if (options.help) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`hdr2rgbe-png v${VERSION}`)
		return
	}

	if (inputs.length === 0) {
		console.error('Error: A filename is required')
		console.error(HELP)
		process.exit(1)
	}

	const plan = planJobs(inputs, options)

	for (const pattern of plan.unmatched) {
		console.error(`No files matched: ${pattern}`)
	}
	if (!options.quiet) {
		for (const { path, reason } of plan.skipped) {
			console.log(`Skip: ${path} (${reason})`)
		}
	}

	if (plan.jobs.length === 0) {
		if (plan.unmatched.length > 0) process.exit(1)
		console.log('No files to convert')
		return
	}

	if (options.dryRun) {
		console.log('\nDry run - would convert:\n')
		for (const job of plan.jobs) {
			console.log(`  ${job.input}`)
			console.log(`  → ${job.output}\n`)
		}
		return
	}

	let success = 0
	let failed = plan.unmatched.length

	for (const job of plan.jobs) {
		if (!options.quiet) {
			if (options.verbose) {
				console.log(`Converting: ${job.input}`)
				console.log(`       → ${job.output}`)
			} else {
				console.log(`${basename(job.input)} → ${basename(job.output)}`)
			}
		}

		const result = await convertFile(job, options)

		if (result.success) {
			success++
			if (options.verbose && !options.quiet) {
				console.log(`       Size: ${formatBytes(result.size)}`)
			}
		} else {
			failed++
			console.error(`  Error: ${job.input}: ${result.error}`)
		}
	}

	if (!options.quiet && plan.jobs.length > 1) {
		console.log(`\nDone: ${success} converted, ${failed} failed`)
	}

	if (failed > 0) {
		process.exit(1)
	}
}

main().catch((err) => {
	console.error('Fatal error:', err)
	process.exit(1)
})
