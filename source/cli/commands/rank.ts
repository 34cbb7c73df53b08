/**
 * `peer-rank <candidates.json>` - rank a saved batch of search results.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {loadRankingConfig} from '../../lib/config.js';
import {InputError, formatIssues} from '../../lib/errors.js';
import type {Logger} from '../../lib/logger.js';
import {rankCandidatesAsync} from '../../ranking/async.js';
import {createForensicDetector} from '../../ranking/forensics.js';
import {
	createRankingPolicy,
	parsePresetName,
	policyFromPreset,
	PRESET_NAMES,
	type PresetName,
} from '../../ranking/policy.js';
import type {Candidate, RankResult, Target} from '../../ranking/types.js';
import {formatRankTable} from '../format.js';

// ============================================================================
// Input
// ============================================================================

// Peers report unknown values as null; those become absent or zero
const unknownNumber = z
	.number()
	.nullish()
	.transform(value => value ?? undefined);
const unknownString = z
	.string()
	.nullish()
	.transform(value => value ?? undefined);

const candidateSchema = z.object({
	sourceId: z.string(),
	filename: z
		.string()
		.nullish()
		.transform(value => value ?? ''),
	format: unknownString,
	bitrateKbps: z
		.number()
		.nullish()
		.transform(value => value ?? 0),
	lengthSeconds: unknownNumber,
	hasFreeCapacity: z
		.boolean()
		.nullish()
		.transform(value => value ?? false),
	queueDepth: z
		.number()
		.nullish()
		.transform(value => value ?? 0),
	bpm: unknownNumber,
	musicalKey: unknownString,
	sizeBytes: unknownNumber,
});

const candidatesFileSchema = z.array(candidateSchema);

/**
 * Parse the contents of a candidates file. A missing `format` falls back to
 * the filename's extension.
 *
 * @throws InputError on invalid JSON or entries
 */
export function parseCandidates(content: string, source: string): Candidate[] {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new InputError(
			`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	const parsed = candidatesFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw new InputError(
			`${source} has invalid candidates: ${formatIssues(parsed.error.issues).join('; ')}`,
		);
	}

	return parsed.data.map(entry => ({
		...entry,
		format: entry.format ?? path.extname(entry.filename).slice(1),
	}));
}

// ============================================================================
// Options
// ============================================================================

export interface RankCommandFlags {
	title?: string;
	artist?: string;
	length?: number;
	bpm?: number;
	policy?: string;
	block?: string[];
	config?: string;
	json?: boolean;
	explain?: boolean;
}

export interface RankCommandOptions {
	candidatesPath: string;
	target: Target;
	preset?: PresetName;
	blockedSources: string[];
	configPath?: string;
	json: boolean;
	explain: boolean;
}

/**
 * Turn positional input and flags into command options.
 *
 * @throws InputError when required input is missing or a preset is unknown
 */
export function buildRankOptions(
	input: readonly string[],
	flags: RankCommandFlags,
): RankCommandOptions {
	const candidatesPath = input[0];
	if (!candidatesPath) {
		throw new InputError('Missing candidates file. Usage: peer-rank <candidates.json>');
	}

	const title = flags.title?.trim();
	const artist = flags.artist?.trim();
	if (!title || !artist) {
		throw new InputError('Both --title and --artist are required');
	}

	let preset: PresetName | undefined;
	if (flags.policy !== undefined) {
		const parsed = parsePresetName(flags.policy);
		if (!parsed) {
			throw new InputError(
				`Unknown policy "${flags.policy}". Expected one of: ${PRESET_NAMES.join(', ')}`,
			);
		}
		preset = parsed;
	}

	const blockedSources = (flags.block ?? [])
		.flatMap(entry => entry.split(','))
		.map(entry => entry.trim())
		.filter(entry => entry.length > 0);

	return {
		candidatesPath,
		target: {title, artist, lengthSeconds: flags.length, bpm: flags.bpm},
		preset,
		blockedSources,
		configPath: flags.config,
		json: flags.json ?? false,
		explain: flags.explain ?? false,
	};
}

// ============================================================================
// Command
// ============================================================================

export interface RankCommandOutput {
	result: RankResult;
	text: string;
}

export async function runRankCommand(
	options: RankCommandOptions,
	logger?: Logger,
): Promise<RankCommandOutput> {
	const config = await loadRankingConfig(options.configPath);

	const base = options.preset
		? policyFromPreset(options.preset)
		: config.policy;
	const policy = createRankingPolicy({
		...base,
		blockedSources: [...config.policy.blockedSources, ...options.blockedSources],
	});

	const content = await fs.readFile(options.candidatesPath, 'utf-8');
	const candidates = parseCandidates(content, options.candidatesPath);

	logger?.info('RankCommand', 'Ranking candidates', {
		file: options.candidatesPath,
		count: candidates.length,
		priority: policy.priority,
	});

	const result = await rankCandidatesAsync(candidates, options.target, policy, {
		detector: createForensicDetector(config.forensics),
		logger,
	});

	const text = options.json
		? JSON.stringify(result, null, 2)
		: formatRankTable(result, {
				explain: options.explain,
				target: options.target,
				thresholds: config.forensics,
			});

	return {result, text};
}
