/**
 * Ranking engine - filter, classify, order and annotate one batch.
 *
 * Pure and synchronous: the same batch, target and policy always produce
 * the same ordering and annotations. Per-candidate work (normalization,
 * safety gates, forensic verdict, tier) has no cross-candidate dependency;
 * only the final sort looks at the batch as a whole.
 */

import {createNullLogger, type Logger} from '../lib/logger.js';
import {normalizeCandidate, normalizeTarget, queryTextFor} from './candidate.js';
import {classifyWithVerdict, runDetector} from './classifier.js';
import {compareClassified, type Classified} from './comparator.js';
import {defaultForensicDetector, type ForensicDetector} from './forensics.js';
import {snapshotPolicy, type RankingPolicy} from './policy.js';
import {rankBreakdown, rankScore} from './reporter.js';
import {checkSafety} from './safety-filter.js';
import {Tier} from './tier.js';
import type {
	Candidate,
	RankedCandidate,
	RankResult,
	SafetyRejection,
	Target,
} from './types.js';

const COMPONENT = 'RankingEngine';

// ============================================================================
// Types
// ============================================================================

export interface RankOptions {
	/** Swappable fake/mislabel detector */
	detector?: ForensicDetector;
	logger?: Logger;
}

/**
 * Everything one ranking call reads, captured at entry.
 */
export interface RankContext {
	target: Target;
	queryText: string;
	policy: RankingPolicy;
	detector: ForensicDetector;
	logger: Logger;
}

interface AcceptedEntry extends Classified {
	original: Candidate;
	originalIndex: number;
}

export type Evaluation =
	| {kind: 'rejected'; rejection: SafetyRejection}
	| {kind: 'accepted'; entry: AcceptedEntry};

// ============================================================================
// Steps
// ============================================================================

export function createRankContext(
	target: Target,
	policy: RankingPolicy,
	options: RankOptions = {},
): RankContext {
	const normalizedTarget = normalizeTarget(target);
	return {
		target: normalizedTarget,
		queryText: queryTextFor(normalizedTarget),
		policy: snapshotPolicy(policy),
		detector: options.detector ?? defaultForensicDetector,
		logger: options.logger ?? createNullLogger(),
	};
}

// Batches decoded from peer data can hold null or primitive entries
function isCandidateObject(value: unknown): boolean {
	return typeof value === 'object' && value !== null;
}

/**
 * Gate and classify one candidate. Never throws.
 */
export function evaluateCandidate(
	candidate: Candidate,
	originalIndex: number,
	context: RankContext,
): Evaluation {
	const {target, queryText, policy, detector, logger} = context;
	if (!isCandidateObject(candidate)) {
		return {
			kind: 'rejected',
			rejection: {originalIndex, sourceId: '', filename: '', reason: 'malformed'},
		};
	}

	const normalized = normalizeCandidate(candidate);

	const verdict = checkSafety(normalized, queryText, target.lengthSeconds, policy);
	if (!verdict.safe) {
		return {
			kind: 'rejected',
			rejection: {
				originalIndex,
				sourceId: normalized.sourceId,
				filename: normalized.filename,
				reason: verdict.reason,
			},
		};
	}

	const flagged = runDetector(detector, normalized, target, error => {
		logger.warn(COMPONENT, 'Forensic detector failed, demoting to Trash', {
			originalIndex,
			sourceId: normalized.sourceId,
			error: error instanceof Error ? error.message : String(error),
		});
	});

	return {
		kind: 'accepted',
		entry: {
			original: candidate,
			originalIndex,
			candidate: normalized,
			tier: classifyWithVerdict(normalized, target, policy, flagged),
		},
	};
}

/**
 * Sort the survivors and attach the presentation fields.
 */
export function assembleResult(
	evaluations: readonly Evaluation[],
	context: RankContext,
): RankResult {
	const accepted: AcceptedEntry[] = [];
	const rejections: SafetyRejection[] = [];

	for (const evaluation of evaluations) {
		if (evaluation.kind === 'rejected') rejections.push(evaluation.rejection);
		else accepted.push(evaluation.entry);
	}

	// Array.prototype.sort is stable: full ties keep input order
	accepted.sort((a, b) => compareClassified(a, b, context.policy));

	const ranked: RankedCandidate[] = accepted.map(entry => ({
		...entry.original,
		tier: entry.tier,
		rankScore: rankScore(entry.tier),
		rankBreakdown: rankBreakdown(entry.tier),
		originalIndex: entry.originalIndex,
	}));

	const trashCount = ranked.filter(item => item.tier === Tier.Trash).length;

	context.logger.debug(COMPONENT, 'Ranked batch', {
		priority: context.policy.priority,
		total: evaluations.length,
		ranked: ranked.length,
		rejected: rejections.length,
		trash: trashCount,
	});

	return {
		ranked,
		rejectedCount: rejections.length,
		rejections,
		trashCount,
	};
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Rank a batch of candidates against a target, best first.
 *
 * Candidates rejected by the safety filter are left out of `ranked` and
 * counted in `rejectedCount`; forensic fakes stay in, classified Trash.
 */
export function rankCandidates(
	candidates: readonly Candidate[],
	target: Target,
	policy: RankingPolicy,
	options: RankOptions = {},
): RankResult {
	const context = createRankContext(target, policy, options);
	const evaluations = candidates.map((candidate, index) =>
		evaluateCandidate(candidate, index, context),
	);
	return assembleResult(evaluations, context);
}
