/**
 * Event-loop friendly ranking.
 *
 * Same result as rankCandidates. The per-candidate map step runs in chunks
 * that yield to the event loop in between; an AbortSignal is checked between
 * chunks. The final sort is one synchronous step.
 */

import {setImmediate as yieldToEventLoop} from 'node:timers/promises';
import pLimit from 'p-limit';
import {throwIfAborted} from '../lib/abort.js';
import {
	assembleResult,
	createRankContext,
	evaluateCandidate,
	type Evaluation,
	type RankOptions,
} from './engine.js';
import type {RankingPolicy} from './policy.js';
import type {Candidate, RankResult, Target} from './types.js';

export const DEFAULT_CHUNK_SIZE = 256;
export const DEFAULT_CONCURRENCY = 4;

export interface AsyncRankOptions extends RankOptions {
	signal?: AbortSignal;
	/** Candidates evaluated per chunk (default: 256) */
	chunkSize?: number;
	/** Chunks in flight at once (default: 4) */
	concurrency?: number;
}

function splitIntoChunks<T>(
	items: readonly T[],
	size: number,
): Array<{start: number; items: T[]}> {
	const chunks: Array<{start: number; items: T[]}> = [];
	for (let start = 0; start < items.length; start += size) {
		chunks.push({start, items: items.slice(start, start + size)});
	}
	return chunks;
}

/**
 * Rank a batch without blocking the event loop for its whole duration.
 *
 * @throws AbortError when `signal` aborts before the result is assembled
 */
export async function rankCandidatesAsync(
	candidates: readonly Candidate[],
	target: Target,
	policy: RankingPolicy,
	options: AsyncRankOptions = {},
): Promise<RankResult> {
	const {
		signal,
		chunkSize = DEFAULT_CHUNK_SIZE,
		concurrency = DEFAULT_CONCURRENCY,
	} = options;

	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw new Error('chunkSize must be an integer >= 1');
	}
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new Error('concurrency must be an integer >= 1');
	}

	throwIfAborted(signal, 'Ranking cancelled');

	// Snapshot the batch and policy before the first suspension point
	const context = createRankContext(target, policy, options);
	const chunks = splitIntoChunks([...candidates], chunkSize);
	const limit = pLimit(concurrency);

	let evaluations: Evaluation[];
	try {
		const chunkResults = await Promise.all(
			chunks.map(chunk =>
				limit(async () => {
					await yieldToEventLoop();
					throwIfAborted(signal, 'Ranking cancelled');
					return chunk.items.map((candidate, offset) =>
						evaluateCandidate(candidate, chunk.start + offset, context),
					);
				}),
			),
		);
		evaluations = chunkResults.flat();
	} catch (error) {
		limit.clearQueue();
		throw error;
	}

	throwIfAborted(signal, 'Ranking cancelled');
	return assembleResult(evaluations, context);
}
