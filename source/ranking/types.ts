/**
 * Ranking types - candidates, targets and the shape of a ranking result.
 */

import type {Tier} from './tier.js';

// ============================================================================
// Inputs
// ============================================================================

/**
 * One search result reported by a peer. Everything here is self-reported
 * and unauthenticated.
 */
export interface Candidate {
	/** Opaque peer/user identifier */
	sourceId: string;
	filename: string;
	/** Lower-cased extension: "mp3", "flac", ... */
	format: string;
	/** 0 = unknown */
	bitrateKbps: number;
	lengthSeconds?: number;
	/** Whether the source can start the transfer now */
	hasFreeCapacity: boolean;
	/** Transfers ahead of this one at the source */
	queueDepth: number;
	bpm?: number;
	musicalKey?: string;
	/** Declared file size, when the peer reports one */
	sizeBytes?: number;
}

/**
 * The track being searched for.
 */
export interface Target {
	title: string;
	artist: string;
	lengthSeconds?: number;
	bpm?: number;
}

// ============================================================================
// Outputs
// ============================================================================

export interface RankedCandidate extends Candidate {
	tier: Tier;
	/** Presentation only, 0-1 */
	rankScore: number;
	/** Presentation only */
	rankBreakdown: string;
	/** Position in the input batch, before filtering and sorting */
	originalIndex: number;
}

export type SafetyRejectReason =
	/** The batch entry is not an object at all */
	| 'malformed'
	| 'blocked-source'
	| 'duration-mismatch'
	| 'integrity'
	| 'below-min-bitrate'
	| 'title-mismatch';

export interface SafetyRejection {
	originalIndex: number;
	sourceId: string;
	filename: string;
	reason: SafetyRejectReason;
}

export interface RankResult {
	/** Survivors, best first */
	ranked: RankedCandidate[];
	/** Candidates excluded by the safety filter */
	rejectedCount: number;
	rejections: SafetyRejection[];
	/** Survivors classified Trash (demoted, still in `ranked`) */
	trashCount: number;
}
