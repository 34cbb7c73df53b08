/**
 * Test helpers for ranking tests.
 */

import type {Candidate, Target} from '../types.js';

export const TARGET: Target = {
	artist: 'Night Drive',
	title: 'Coastline',
	lengthSeconds: 300,
	bpm: 120,
};

export const TARGET_WITHOUT_BPM: Target = {
	artist: 'Night Drive',
	title: 'Coastline',
	lengthSeconds: 300,
};

/**
 * A plain, honest 320 kbps MP3 of the target with a free slot.
 */
export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
	return {
		sourceId: 'peer-1',
		filename: 'Night Drive - Coastline.mp3',
		format: 'mp3',
		bitrateKbps: 320,
		lengthSeconds: 300,
		hasFreeCapacity: true,
		queueDepth: 0,
		...overrides,
	};
}

/**
 * Deterministic PRNG (mulberry32) so property tests are reproducible.
 */
export function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function pick<T>(random: () => number, values: readonly T[]): T {
	const index = Math.floor(random() * values.length);
	for (const [position, value] of values.entries()) {
		if (position === index) return value;
	}
	throw new Error('pick() called with an empty list');
}

const FILENAMES = [
	'Night Drive - Coastline.mp3',
	'Night Drive - Coastline (Extended Mix).mp3',
	'Night Drive - Coastline 124bpm.mp3',
	'01 Night Drive - Coastline [WEB].flac',
	'night_drive-coastline.wav',
	'',
];

/**
 * A batch of varied candidates covering every tier and tie-break step.
 */
export function randomBatch(seed: number, size: number): Candidate[] {
	const random = createRandom(seed);
	const batch: Candidate[] = [];

	for (let index = 0; index < size; index++) {
		const lengthSeconds = pick(random, [undefined, 60, 150, 296, 300, 304, 330]);
		const bitrateKbps = pick(random, [0, 96, 128, 192, 256, 300, 320, 1411]);
		batch.push({
			sourceId: `peer-${index}`,
			filename: pick(random, FILENAMES),
			format: pick(random, ['mp3', 'flac', 'wav', 'm4a', 'wma', 'ogg']),
			bitrateKbps,
			lengthSeconds,
			hasFreeCapacity: random() < 0.5,
			queueDepth: pick(random, [0, 1, 4, 5, 6, 12, 40, 501, 900]),
			bpm: pick(random, [undefined, 118, 120, 121.5, 123, 140]),
			musicalKey: pick(random, [undefined, '8A', '']),
			sizeBytes: pick(random, [undefined, 2_000_000, 12_000_000, 40_000_000]),
		});
	}

	return batch;
}
