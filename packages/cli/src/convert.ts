import { existsSync } from 'node:fs'
import { mkdir, stat } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { formatFromPath, loadRadianceFile, saveRgbe8PngFile } from '@rgbe-kit/rgbe'
import { type CliOptions, expandGlob, outputPathFor } from './args'

export interface ConvertJob {
	input: string
	output: string
}

export interface JobPlan {
	jobs: ConvertJob[]
	// Outputs left alone, with the reason
	skipped: { path: string; reason: string }[]
	// Inputs that named no file
	unmatched: string[]
}

/**
 * Expand inputs into conversion jobs, skipping outputs that already exist
 * and pattern matches that are not Radiance files
 */
export function planJobs(inputs: string[], options: CliOptions, baseDir = '.'): JobPlan {
	const plan: JobPlan = { jobs: [], skipped: [], unmatched: [] }
	const seen = new Set<string>()
	const planned = new Set<string>()

	for (const pattern of inputs) {
		const files = expandGlob(pattern, baseDir)
		// Named files are taken as Radiance whatever their extension
		const isGlob = pattern.includes('*') || pattern.includes('?')
		if (files.length === 0) {
			plan.unmatched.push(pattern)
			continue
		}

		for (const input of files) {
			if (seen.has(input)) continue
			seen.add(input)

			const output = outputPathFor(input, options.out ? resolve(baseDir, options.out) : undefined)
			if (isGlob && formatFromPath(input) !== 'hdr') {
				plan.skipped.push({ path: input, reason: 'not a Radiance file' })
			} else if (planned.has(output)) {
				plan.skipped.push({ path: input, reason: `output ${output} already written by another input` })
			} else if (existsSync(output) && !options.overwrite) {
				plan.skipped.push({ path: output, reason: 'exists, use --overwrite' })
			} else {
				planned.add(output)
				plan.jobs.push({ input, output })
			}
		}
	}

	return plan
}

/**
 * Convert one Radiance file to an RGBE8 PNG
 */
export async function convertFile(
	job: ConvertJob,
	options: CliOptions
): Promise<{ success: true; size: number } | { success: false; error: string }> {
	try {
		const image = await loadRadianceFile(job.input)
		await mkdir(dirname(job.output), { recursive: true })
		await saveRgbe8PngFile(job.output, image, { level: options.level })
		const { size } = await stat(job.output)
		return { success: true, size }
	} catch (err) {
		return { success: false, error: err instanceof Error ? err.message : String(err) }
	}
}
