/**
 * Safety filter - the cheap gatekeeper that runs before any tiering.
 *
 * A failing gate excludes the candidate outright. That is a normal outcome,
 * not an error: the engine counts every exclusion and reports its reason.
 */

import type {RankingPolicy} from './policy.js';
import {matchesAllTokens} from './tokenizer.js';
import type {Candidate, SafetyRejectReason} from './types.js';

export type SafetyVerdict =
	| {safe: true}
	| {safe: false; reason: SafetyRejectReason};

const SAFE: SafetyVerdict = {safe: true};

function reject(reason: SafetyRejectReason): SafetyVerdict {
	return {safe: false, reason};
}

/**
 * True when both lengths are known and differ by more than the tolerance.
 * Shared with the classifier, which repeats the check when used standalone.
 */
export function exceedsDurationTolerance(
	candidateLength: number | undefined,
	targetLength: number | undefined,
	policy: RankingPolicy,
): boolean {
	if (!policy.enforceDurationMatch) return false;
	if (candidateLength === undefined || targetLength === undefined) return false;
	return Math.abs(candidateLength - targetLength) > policy.durationToleranceSeconds;
}

/**
 * Run the gates in order; the first failure decides.
 *
 * 1. blocked source
 * 2. duration mismatch
 * 3. file integrity (blank filename, zero bytes)
 * 4. bitrate floor
 * 5. title tokens
 */
export function checkSafety(
	candidate: Candidate,
	queryText: string,
	targetLength: number | undefined,
	policy: RankingPolicy,
): SafetyVerdict {
	if (policy.blockedSources.has(candidate.sourceId)) {
		return reject('blocked-source');
	}

	if (exceedsDurationTolerance(candidate.lengthSeconds, targetLength, policy)) {
		return reject('duration-mismatch');
	}

	if (
		policy.enforceFileIntegrity &&
		(candidate.filename.trim().length === 0 || candidate.sizeBytes === 0)
	) {
		return reject('integrity');
	}

	if (
		policy.minBitrateKbps > 0 &&
		candidate.bitrateKbps > 0 &&
		candidate.bitrateKbps < policy.minBitrateKbps
	) {
		return reject('below-min-bitrate');
	}

	if (
		policy.enforceStrictTitleMatch &&
		!matchesAllTokens(queryText, candidate.filename, policy.fuzzyTokenMatch)
	) {
		return reject('title-mismatch');
	}

	return SAFE;
}

export function isSafe(
	candidate: Candidate,
	queryText: string,
	targetLength: number | undefined,
	policy: RankingPolicy,
): boolean {
	return checkSafety(candidate, queryText, targetLength, policy).safe;
}
