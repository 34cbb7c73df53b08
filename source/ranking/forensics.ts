/**
 * Forensic integrity check.
 *
 * Flags candidates whose declared metadata does not add up: a "320 kbps"
 * file far too small for its length, a FLAC with an MP3-sized payload, a
 * 60-second file posing as a five-minute track. A flag only demotes the
 * candidate to Trash; it is never an exclusion.
 *
 * The detector is a plain function; thresholds come from configuration.
 */

import type {Candidate, Target} from './types.js';

// ============================================================================
// Thresholds
// ============================================================================

export interface ForensicThresholds {
	/** Trust scores below this flag the candidate */
	minTrustScore: number;
	/** Candidate length below this fraction of the target length is truncated */
	truncatedLengthRatio: number;
	/** Lossy payload below this fraction of the bitrate-implied size */
	minSizeRatio: number;
	/** Lossy payload above this multiple of the bitrate-implied size */
	maxSizeRatio: number;
	/** Lossless payloads below this many MiB per minute are upscales */
	minLosslessMibPerMinute: number;
}

export const DEFAULT_FORENSIC_THRESHOLDS: Readonly<ForensicThresholds> =
	Object.freeze({
		minTrustScore: 40,
		truncatedLengthRatio: 0.5,
		minSizeRatio: 0.75,
		maxSizeRatio: 1.25,
		minLosslessMibPerMinute: 2.5,
	});

export const LOSSLESS_FORMATS: ReadonlySet<string> = new Set([
	'flac',
	'wav',
	'aiff',
	'alac',
]);

const COMMON_LOSSY_FORMATS: ReadonlySet<string> = new Set(['mp3', 'm4a', 'aac']);
const SUSPICIOUS_FORMATS: ReadonlySet<string> = new Set(['wma', 'wmv']);

const BASE_TRUST = 50;
const MIB = 1024 * 1024;

// ============================================================================
// Detector
// ============================================================================

/**
 * Returns true when the candidate looks fake or mislabeled.
 */
export type ForensicDetector = (candidate: Candidate, target: Target) => boolean;

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

/**
 * Size the declared bitrate implies for the declared length, in bytes.
 */
export function expectedSizeBytes(
	bitrateKbps: number,
	lengthSeconds: number,
): number {
	return ((bitrateKbps * 1000) / 8) * lengthSeconds;
}

function isTruncated(
	candidate: Candidate,
	target: Target,
	thresholds: ForensicThresholds,
): boolean {
	if (candidate.lengthSeconds === undefined || target.lengthSeconds === undefined) {
		return false;
	}
	return (
		candidate.lengthSeconds < target.lengthSeconds * thresholds.truncatedLengthRatio
	);
}

/**
 * Trust score, 0-100. 50 is neutral.
 */
export function calculateTrustScore(
	candidate: Candidate,
	target: Target,
	thresholds: ForensicThresholds = DEFAULT_FORENSIC_THRESHOLDS,
): number {
	let score = BASE_TRUST;
	const {bitrateKbps, format, lengthSeconds, sizeBytes} = candidate;
	const lossless = LOSSLESS_FORMATS.has(format);

	if (bitrateKbps >= 320) score += 10;
	else if (bitrateKbps > 0 && bitrateKbps < 128) score -= 10;

	if (lossless) score += 20;
	else if (COMMON_LOSSY_FORMATS.has(format)) score += 5;
	else if (SUSPICIOUS_FORMATS.has(format)) score -= 10;

	if (sizeBytes !== undefined && lengthSeconds !== undefined) {
		if (lossless) {
			const mibPerMinute = sizeBytes / MIB / (lengthSeconds / 60);
			if (mibPerMinute < thresholds.minLosslessMibPerMinute) score -= 50;
		} else if (bitrateKbps > 0) {
			const expected = expectedSizeBytes(bitrateKbps, lengthSeconds);
			if (sizeBytes < expected * thresholds.minSizeRatio) score -= 50;
			else if (sizeBytes > expected * thresholds.maxSizeRatio) score -= 10;
			else score += 10;
		}
	}

	if (isTruncated(candidate, target, thresholds)) score -= 50;

	return clamp(score, 0, 100);
}

export function isFake(
	candidate: Candidate,
	target: Target,
	thresholds: ForensicThresholds = DEFAULT_FORENSIC_THRESHOLDS,
): boolean {
	return calculateTrustScore(candidate, target, thresholds) < thresholds.minTrustScore;
}

/**
 * Build a detector bound to a set of thresholds.
 */
export function createForensicDetector(
	thresholds: Partial<ForensicThresholds> = {},
): ForensicDetector {
	const resolved: ForensicThresholds = {...DEFAULT_FORENSIC_THRESHOLDS, ...thresholds};
	return (candidate, target) => isFake(candidate, target, resolved);
}

export const defaultForensicDetector: ForensicDetector = createForensicDetector();

// ============================================================================
// Assessment
// ============================================================================

/**
 * Short human-readable notes about a candidate's integrity, for display.
 */
export function assessForensics(
	candidate: Candidate,
	target: Target,
	thresholds: ForensicThresholds = DEFAULT_FORENSIC_THRESHOLDS,
): string[] {
	const notes: string[] = [];
	const {bitrateKbps, lengthSeconds, sizeBytes} = candidate;
	const lossless = LOSSLESS_FORMATS.has(candidate.format);

	if (
		!lossless &&
		bitrateKbps > 0 &&
		lengthSeconds !== undefined &&
		sizeBytes !== undefined
	) {
		const expected = expectedSizeBytes(bitrateKbps, lengthSeconds);
		if (sizeBytes < expected * thresholds.minSizeRatio) {
			notes.push(`SIZE MISMATCH: too small for ${bitrateKbps} kbps`);
		} else if (sizeBytes > expected * 0.9 && sizeBytes < expected * 1.1) {
			notes.push('VERIFIED: size matches bitrate');
		}
	}

	if (isTruncated(candidate, target, thresholds)) {
		notes.push(
			`TRUNCATED: ${lengthSeconds ?? 0}s against an expected ${target.lengthSeconds ?? 0}s`,
		);
	}
	if (lossless) notes.push('LOSSLESS: high fidelity format');
	if (candidate.hasFreeCapacity) notes.push('INSTANT: slot available now');

	return notes;
}
