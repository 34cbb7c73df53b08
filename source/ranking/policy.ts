/**
 * Ranking Policy - one tagged value selecting the priority mode and the
 * numeric thresholds every ranking call reads.
 *
 * Policies are validated when they are built.
 */

import {z} from 'zod';
import {PolicyError, formatIssues} from '../lib/errors.js';

// ============================================================================
// Types
// ============================================================================

export type RankingPriority = 'QualityFirst' | 'DjReady';

export interface RankingPolicy {
	readonly priority: RankingPriority;
	readonly enforceDurationMatch: boolean;
	readonly durationToleranceSeconds: number;
	/** Minimum bitrate delta before bitrate decides a tie */
	readonly significantBitrateGapKbps: number;
	/** Minimum queue-depth delta before queue depth decides a tie */
	readonly significantQueueGap: number;
	readonly blockedSources: ReadonlySet<string>;
	/** Every query token must appear in the filename */
	readonly enforceStrictTitleMatch: boolean;
	/** Ignore joining words (feat, vs, ...) when matching tokens */
	readonly fuzzyTokenMatch: boolean;
	/** Reject blank filenames and zero-byte files */
	readonly enforceFileIntegrity: boolean;
	/** Reject known bitrates below this floor; 0 disables */
	readonly minBitrateKbps: number;
}

export type RankingPolicyInput = Omit<RankingPolicy, 'blockedSources'> & {
	blockedSources?: Iterable<string>;
};

export type RankingPolicyOverrides = Partial<RankingPolicyInput>;

export type PresetName = 'quality-first' | 'dj-ready' | 'data-saver';

export const PRESET_NAMES: readonly PresetName[] = [
	'quality-first',
	'dj-ready',
	'data-saver',
];

// ============================================================================
// Validation
// ============================================================================

const threshold = z.number().int().nonnegative();

const policySchema = z.object({
	priority: z.enum(['QualityFirst', 'DjReady']),
	enforceDurationMatch: z.boolean(),
	durationToleranceSeconds: threshold,
	significantBitrateGapKbps: threshold,
	significantQueueGap: threshold,
	blockedSources: z.array(z.string()),
	enforceStrictTitleMatch: z.boolean(),
	fuzzyTokenMatch: z.boolean(),
	enforceFileIntegrity: z.boolean(),
	minBitrateKbps: threshold,
});

/**
 * Build a validated, frozen policy.
 *
 * @throws PolicyError when a field is missing, negative or not an integer
 */
export function createRankingPolicy(input: RankingPolicyInput): RankingPolicy {
	const parsed = policySchema.safeParse({
		...input,
		blockedSources: [...(input.blockedSources ?? [])],
	});

	if (!parsed.success) {
		throw new PolicyError(formatIssues(parsed.error.issues));
	}

	return Object.freeze({
		...parsed.data,
		blockedSources: new Set(parsed.data.blockedSources),
	});
}

/**
 * Copy a policy's values at the start of a ranking call, so later changes
 * to the caller's objects cannot leak into an in-flight ranking.
 */
export function snapshotPolicy(policy: RankingPolicy): RankingPolicy {
	return Object.freeze({
		priority: policy.priority,
		enforceDurationMatch: policy.enforceDurationMatch,
		durationToleranceSeconds: policy.durationToleranceSeconds,
		significantBitrateGapKbps: policy.significantBitrateGapKbps,
		significantQueueGap: policy.significantQueueGap,
		blockedSources: new Set(policy.blockedSources),
		enforceStrictTitleMatch: policy.enforceStrictTitleMatch,
		fuzzyTokenMatch: policy.fuzzyTokenMatch,
		enforceFileIntegrity: policy.enforceFileIntegrity,
		minBitrateKbps: policy.minBitrateKbps,
	});
}

// ============================================================================
// Presets
// ============================================================================

const BASE_DEFAULTS: RankingPolicyInput = {
	priority: 'QualityFirst',
	enforceDurationMatch: true,
	durationToleranceSeconds: 4,
	significantBitrateGapKbps: 64,
	significantQueueGap: 5,
	blockedSources: [],
	enforceStrictTitleMatch: true,
	fuzzyTokenMatch: true,
	enforceFileIntegrity: true,
	minBitrateKbps: 0,
};

/**
 * Audiophile preset: bitrate and format first, integrity enforced.
 */
export function qualityFirstPolicy(
	overrides: RankingPolicyOverrides = {},
): RankingPolicy {
	return createRankingPolicy({...BASE_DEFAULTS, ...overrides});
}

/**
 * DJ preset: BPM/key metadata first, then quality. The wider duration
 * tolerance admits extended mixes next to radio edits.
 */
export function djReadyPolicy(
	overrides: RankingPolicyOverrides = {},
): RankingPolicy {
	return createRankingPolicy({
		...BASE_DEFAULTS,
		priority: 'DjReady',
		durationToleranceSeconds: 15,
		...overrides,
	});
}

/**
 * Data-saver preset: quality ordering without the file integrity gate.
 */
export function dataSaverPolicy(
	overrides: RankingPolicyOverrides = {},
): RankingPolicy {
	return createRankingPolicy({
		...BASE_DEFAULTS,
		enforceFileIntegrity: false,
		...overrides,
	});
}

export function policyFromPreset(
	preset: PresetName,
	overrides: RankingPolicyOverrides = {},
): RankingPolicy {
	switch (preset) {
		case 'quality-first':
			return qualityFirstPolicy(overrides);
		case 'dj-ready':
			return djReadyPolicy(overrides);
		case 'data-saver':
			return dataSaverPolicy(overrides);
	}
}

export function parsePresetName(value: unknown): PresetName | null {
	return PRESET_NAMES.find(name => name === value) ?? null;
}
