/**
 * Config - peer-rank configuration loading and saving.
 *
 * A config file picks a policy preset, overrides any of its thresholds and
 * tunes the forensic detector. Stored at {home}/config.json unless a path
 * is given.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getConfigPath} from './constants.js';
import {ConfigError, PolicyError, formatIssues} from './errors.js';
import {
	DEFAULT_FORENSIC_THRESHOLDS,
	type ForensicThresholds,
} from '../ranking/forensics.js';
import {
	policyFromPreset,
	type PresetName,
	type RankingPolicy,
} from '../ranking/policy.js';

// ============================================================================
// Schema
// ============================================================================

const presetSchema = z.enum(['quality-first', 'dj-ready', 'data-saver']);

// Threshold ranges are enforced by createRankingPolicy
const policySectionSchema = z
	.object({
		preset: presetSchema.optional(),
		enforceDurationMatch: z.boolean().optional(),
		durationToleranceSeconds: z.number().optional(),
		significantBitrateGapKbps: z.number().optional(),
		significantQueueGap: z.number().optional(),
		blockedSources: z.array(z.string()).optional(),
		enforceStrictTitleMatch: z.boolean().optional(),
		fuzzyTokenMatch: z.boolean().optional(),
		enforceFileIntegrity: z.boolean().optional(),
		minBitrateKbps: z.number().optional(),
	})
	.strict();

const forensicsSectionSchema = z
	.object({
		minTrustScore: z.number().min(0).max(100).optional(),
		truncatedLengthRatio: z.number().min(0).max(1).optional(),
		minSizeRatio: z.number().positive().optional(),
		maxSizeRatio: z.number().positive().optional(),
		minLosslessMibPerMinute: z.number().nonnegative().optional(),
	})
	.strict();

const configFileSchema = z
	.object({
		policy: policySectionSchema.optional(),
		forensics: forensicsSectionSchema.optional(),
	})
	.strict();

export type RankingConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Types
// ============================================================================

export interface RankingConfig {
	preset: PresetName;
	policy: RankingPolicy;
	forensics: ForensicThresholds;
}

export const DEFAULT_PRESET: PresetName = 'quality-first';

export function createDefaultConfig(preset: PresetName = DEFAULT_PRESET): RankingConfig {
	return {
		preset,
		policy: policyFromPreset(preset),
		forensics: {...DEFAULT_FORENSIC_THRESHOLDS},
	};
}

/**
 * Resolve a parsed config file into a policy and thresholds.
 *
 * @throws PolicyError when an override is out of range
 */
export function resolveConfig(file: RankingConfigFile): RankingConfig {
	const {preset = DEFAULT_PRESET, ...overrides} = file.policy ?? {};
	const forensics: ForensicThresholds = {
		...DEFAULT_FORENSIC_THRESHOLDS,
		...file.forensics,
	};

	if (forensics.minSizeRatio > forensics.maxSizeRatio) {
		throw new PolicyError([
			'forensics.minSizeRatio must not exceed forensics.maxSizeRatio',
		]);
	}

	return {
		preset,
		policy: policyFromPreset(preset, overrides),
		forensics,
	};
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Load config from disk.
 * Returns the default config if no file exists.
 *
 * A file that exists but cannot be read, parsed or validated throws
 * ConfigError instead of falling back to defaults.
 */
export async function loadRankingConfig(
	configPath: string = getConfigPath(),
): Promise<RankingConfig> {
	try {
		await fs.access(configPath);
	} catch {
		// Not configured yet - expected on first run
		return createDefaultConfig();
	}

	const content = await fs.readFile(configPath, 'utf-8');

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigError(
			configPath,
			parseError instanceof Error ? parseError.message : String(parseError),
		);
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(configPath, formatIssues(parsed.error.issues).join('; '));
	}

	try {
		return resolveConfig(parsed.data);
	} catch (error) {
		if (error instanceof PolicyError) {
			throw new ConfigError(configPath, error.issues.join('; '));
		}
		throw error;
	}
}

/**
 * Save a config file, creating its directory if needed.
 */
export async function saveRankingConfig(
	file: RankingConfigFile,
	configPath: string = getConfigPath(),
): Promise<void> {
	const parsed = configFileSchema.safeParse(file);
	if (!parsed.success) {
		throw new ConfigError(configPath, formatIssues(parsed.error.issues).join('; '));
	}

	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(parsed.data, null, '\t') + '\n');
}
