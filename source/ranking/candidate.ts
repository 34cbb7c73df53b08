/**
 * Candidate normalization.
 *
 * Peers report whatever they like. Before any rule runs, every candidate is
 * coerced into the shape the decision tables expect: unknown or nonsensical
 * numbers become "unknown" (0 or absent) instead of raising.
 */

import type {Candidate, Target} from './types.js';

function nonNegativeInt(value: unknown): number {
	if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
		return 0;
	}
	return Math.trunc(value);
}

function positiveOrAbsent(value: unknown): number | undefined {
	if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
		return undefined;
	}
	return value;
}

function text(value: unknown): string {
	return typeof value === 'string' ? value : '';
}

/**
 * Lower-case a format/extension and drop a leading dot: ".FLAC" -> "flac".
 */
export function normalizeFormat(format: unknown): string {
	return text(format).trim().toLowerCase().replace(/^\./, '');
}

/**
 * Return a cleaned copy of a candidate. Never throws.
 */
export function normalizeCandidate(candidate: Candidate): Candidate {
	const lengthSeconds = positiveOrAbsent(candidate.lengthSeconds);
	const sizeBytes =
		typeof candidate.sizeBytes === 'number' &&
		Number.isFinite(candidate.sizeBytes) &&
		candidate.sizeBytes >= 0
			? Math.trunc(candidate.sizeBytes)
			: undefined;
	const musicalKey = text(candidate.musicalKey).trim();

	return {
		sourceId: text(candidate.sourceId),
		filename: text(candidate.filename),
		format: normalizeFormat(candidate.format),
		bitrateKbps: nonNegativeInt(candidate.bitrateKbps),
		lengthSeconds:
			lengthSeconds === undefined ? undefined : Math.round(lengthSeconds),
		hasFreeCapacity: candidate.hasFreeCapacity === true,
		queueDepth: nonNegativeInt(candidate.queueDepth),
		bpm: positiveOrAbsent(candidate.bpm),
		musicalKey: musicalKey.length > 0 ? musicalKey : undefined,
		sizeBytes,
	};
}

export function normalizeTarget(target: Target): Target {
	const lengthSeconds = positiveOrAbsent(target.lengthSeconds);
	return {
		title: text(target.title),
		artist: text(target.artist),
		lengthSeconds:
			lengthSeconds === undefined ? undefined : Math.round(lengthSeconds),
		bpm: positiveOrAbsent(target.bpm),
	};
}

/**
 * The free-text query a target stands for: "<artist> <title>".
 */
export function queryTextFor(target: Target): string {
	return `${text(target.artist)} ${text(target.title)}`.trim();
}
