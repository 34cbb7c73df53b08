/**
 * Tier classifier - a fixed decision table evaluated once per candidate.
 *
 * DjReady puts musical compatibility (BPM/key) above raw bitrate; a
 * beat-matched 192 kbps file beats a pristine file that cannot be mixed.
 * QualityFirst weighs fidelity and ignores tempo.
 */

import {normalizeCandidate, normalizeTarget} from './candidate.js';
import {defaultForensicDetector} from './forensics.js';
import type {ForensicDetector} from './forensics.js';
import type {RankingPolicy} from './policy.js';
import {exceedsDurationTolerance} from './safety-filter.js';
import {Tier} from './tier.js';
import type {Candidate, Target} from './types.js';

/** Sources this deep in queue with no free slot are vetoed to Bronze */
export const QUEUE_VETO_DEPTH = 500;

/** Maximum BPM difference (exclusive) still counted as a match */
export const BPM_MATCH_TOLERANCE = 3;

const HIGH_QUALITY_KBPS = 320;
const MID_QUALITY_KBPS = 192;

/**
 * Facts the decision table branches on.
 */
export interface QualityFacts {
	isLossless: boolean;
	isHighQuality: boolean;
	isMidQuality: boolean;
	hasBpm: boolean;
	hasKey: boolean;
	bpmMatches: boolean;
}

export function deriveFacts(candidate: Candidate, target: Target): QualityFacts {
	const isLossless = candidate.format === 'flac' || candidate.format === 'wav';
	const bpmMatches =
		target.bpm === undefined ||
		(candidate.bpm !== undefined &&
			Math.abs(target.bpm - candidate.bpm) < BPM_MATCH_TOLERANCE);

	return {
		isLossless,
		isHighQuality: candidate.bitrateKbps >= HIGH_QUALITY_KBPS || isLossless,
		isMidQuality: candidate.bitrateKbps >= MID_QUALITY_KBPS,
		// Peers often tag the tempo into the filename instead of the metadata
		hasBpm:
			candidate.bpm !== undefined || candidate.filename.toLowerCase().includes('bpm'),
		hasKey: candidate.musicalKey !== undefined && candidate.musicalKey.length > 0,
		bpmMatches,
	};
}

/**
 * Run the detector. A detector that throws counts as a flag.
 */
export function runDetector(
	detector: ForensicDetector,
	candidate: Candidate,
	target: Target,
	onError?: (error: unknown) => void,
): boolean {
	try {
		return detector(candidate, target);
	} catch (error) {
		onError?.(error);
		return true;
	}
}

function classifyDjReady(candidate: Candidate, facts: QualityFacts): Tier {
	const hasMusicalMetadata = facts.hasBpm || facts.hasKey;

	if (
		hasMusicalMetadata &&
		facts.bpmMatches &&
		facts.isHighQuality &&
		candidate.hasFreeCapacity
	) {
		return Tier.Diamond;
	}
	if (hasMusicalMetadata && facts.bpmMatches && facts.isMidQuality) return Tier.Gold;
	if (facts.isMidQuality) return Tier.Silver;
	return Tier.Bronze;
}

function classifyQualityFirst(candidate: Candidate, facts: QualityFacts): Tier {
	const perfectFormat = facts.isLossless || candidate.bitrateKbps === HIGH_QUALITY_KBPS;

	if (perfectFormat && candidate.hasFreeCapacity) return Tier.Diamond;
	if (facts.isHighQuality) return Tier.Gold;
	if (facts.isMidQuality) return Tier.Silver;
	return Tier.Bronze;
}

/**
 * Tier for an already-normalized candidate, with the forensic verdict
 * computed by the caller.
 */
export function classifyWithVerdict(
	candidate: Candidate,
	target: Target,
	policy: RankingPolicy,
	flagged: boolean,
): Tier {
	if (flagged) return Tier.Trash;

	if (!candidate.hasFreeCapacity && candidate.queueDepth > QUEUE_VETO_DEPTH) {
		return Tier.Bronze;
	}

	// Unreachable after the safety filter; kept for standalone use
	if (exceedsDurationTolerance(candidate.lengthSeconds, target.lengthSeconds, policy)) {
		return Tier.Bronze;
	}

	const facts = deriveFacts(candidate, target);

	switch (policy.priority) {
		case 'DjReady':
			return classifyDjReady(candidate, facts);
		case 'QualityFirst':
			return classifyQualityFirst(candidate, facts);
	}
}

/**
 * Assign one of the five tiers to a candidate.
 */
export function classify(
	candidate: Candidate,
	target: Target,
	policy: RankingPolicy,
	detector: ForensicDetector = defaultForensicDetector,
): Tier {
	const normalized = normalizeCandidate(candidate);
	const normalizedTarget = normalizeTarget(target);
	const flagged = runDetector(detector, normalized, normalizedTarget);
	return classifyWithVerdict(normalized, normalizedTarget, policy, flagged);
}
