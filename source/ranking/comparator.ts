/**
 * Ordering: tier first, then a deterministic tie-break cascade.
 *
 * Within a tier:
 * 1. free capacity before none
 * 2. higher bitrate, once the gap is significant
 * 3. shallower queue, once the gap is significant
 * 4. shorter filename (fewer remix/bonus tags); blank filenames last
 *
 * "Significant" is applied by bucket: values are compared as
 * floor(value / (gap + 1)). Two values further apart than the gap always
 * land in different buckets, and unlike a pairwise |a - b| > gap test the
 * bucket comparison is transitive, so sorting sees a total preorder.
 */

import {normalizeCandidate, normalizeTarget} from './candidate.js';
import {classify} from './classifier.js';
import {defaultForensicDetector, type ForensicDetector} from './forensics.js';
import {snapshotPolicy, type RankingPolicy} from './policy.js';
import {compareTiers, type Tier} from './tier.js';
import type {Candidate, Target} from './types.js';

export type Comparator<T> = (a: T, b: T) => number;

function compareNumbers(a: number, b: number): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

/**
 * Bucket index of a value for a given significant gap.
 */
export function significanceBucket(value: number, gap: number): number {
	return Math.floor(value / (gap + 1));
}

function filenameLength(filename: string): number {
	return filename.trim().length === 0 ? Number.POSITIVE_INFINITY : filename.length;
}

/**
 * Compare two normalized candidates of the same tier. Negative when `a`
 * should come first.
 */
export function compareWithinTier(
	a: Candidate,
	b: Candidate,
	policy: RankingPolicy,
): number {
	if (a.hasFreeCapacity !== b.hasFreeCapacity) {
		return a.hasFreeCapacity ? -1 : 1;
	}

	const bitrateGap = policy.significantBitrateGapKbps;
	const byBitrate = compareNumbers(
		significanceBucket(b.bitrateKbps, bitrateGap),
		significanceBucket(a.bitrateKbps, bitrateGap),
	);
	if (byBitrate !== 0) return byBitrate;

	const queueGap = policy.significantQueueGap;
	const byQueue = compareNumbers(
		significanceBucket(a.queueDepth, queueGap),
		significanceBucket(b.queueDepth, queueGap),
	);
	if (byQueue !== 0) return byQueue;

	return compareNumbers(filenameLength(a.filename), filenameLength(b.filename));
}

/**
 * A candidate whose tier is already known.
 */
export interface Classified {
	candidate: Candidate;
	tier: Tier;
}

export function compareClassified(
	a: Classified,
	b: Classified,
	policy: RankingPolicy,
): number {
	const byTier = compareTiers(a.tier, b.tier);
	if (byTier !== 0) return byTier;
	return compareWithinTier(a.candidate, b.candidate, policy);
}

/**
 * Standalone comparator over raw candidates: classifies on every call.
 * The engine precomputes tiers instead; use this for ad-hoc sorting.
 */
export function createCandidateComparator(
	target: Target,
	policy: RankingPolicy,
	detector: ForensicDetector = defaultForensicDetector,
): Comparator<Candidate> {
	const snapshot = snapshotPolicy(policy);
	const normalizedTarget = normalizeTarget(target);

	return (a, b) => {
		const left = normalizeCandidate(a);
		const right = normalizeCandidate(b);
		return compareClassified(
			{candidate: left, tier: classify(left, normalizedTarget, snapshot, detector)},
			{candidate: right, tier: classify(right, normalizedTarget, snapshot, detector)},
			snapshot,
		);
	};
}
