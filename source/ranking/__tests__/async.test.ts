import {describe, it, expect, vi} from 'vitest';
import {isAbortError} from '../../lib/abort.js';
import {rankCandidatesAsync} from '../async.js';
import {rankCandidates} from '../engine.js';
import {djReadyPolicy, qualityFirstPolicy} from '../policy.js';
import type {Candidate} from '../types.js';
import {TARGET, makeCandidate, randomBatch} from './helpers.js';

describe('rankCandidatesAsync', () => {
	it('produces the same result as the synchronous engine', async () => {
		const batch = randomBatch(5, 100);
		const policy = djReadyPolicy({durationToleranceSeconds: 40});

		const result = await rankCandidatesAsync(batch, TARGET, policy, {
			chunkSize: 7,
			concurrency: 3,
		});

		expect(result).toEqual(rankCandidates(batch, TARGET, policy));
	});

	it('uses the defaults for small batches', async () => {
		const batch = [makeCandidate({sourceId: 'b', bitrateKbps: 192}), makeCandidate()];
		const result = await rankCandidatesAsync(batch, TARGET, qualityFirstPolicy());

		expect(result.ranked.map(c => [c.sourceId, c.originalIndex])).toEqual([
			['peer-1', 1],
			['b', 0],
		]);
	});

	it('rejects null entries like the synchronous engine', async () => {
		const batch: Candidate[] = JSON.parse(JSON.stringify([makeCandidate(), null]));
		const result = await rankCandidatesAsync(batch, TARGET, qualityFirstPolicy(), {
			chunkSize: 1,
		});

		expect(result.ranked.map(c => c.sourceId)).toEqual(['peer-1']);
		expect(result.rejections).toEqual([
			{originalIndex: 1, sourceId: '', filename: '', reason: 'malformed'},
		]);
	});

	it('resolves an empty batch', async () => {
		const result = await rankCandidatesAsync([], TARGET, qualityFirstPolicy());
		expect(result.ranked).toEqual([]);
		expect(result.rejectedCount).toBe(0);
	});

	it('rejects before starting when the signal is already aborted', async () => {
		const detector = vi.fn(() => false);
		const promise = rankCandidatesAsync([makeCandidate()], TARGET, qualityFirstPolicy(), {
			signal: AbortSignal.abort('deadline'),
			detector,
		});

		await expect(promise).rejects.toThrow('Ranking cancelled: deadline');
		expect(detector).not.toHaveBeenCalled();
	});

	it('stops between chunks when the signal aborts mid-run', async () => {
		const controller = new AbortController();
		const detector = vi.fn(() => {
			controller.abort('stop');
			return false;
		});
		const batch = ['a', 'b', 'c', 'd'].map(sourceId => makeCandidate({sourceId}));

		let caught: unknown;
		try {
			await rankCandidatesAsync(batch, TARGET, qualityFirstPolicy(), {
				signal: controller.signal,
				detector,
				chunkSize: 1,
				concurrency: 1,
			});
		} catch (error) {
			caught = error;
		}

		expect(isAbortError(caught)).toBe(true);
		expect(caught).toBeInstanceOf(Error);
		if (caught instanceof Error) {
			expect(caught.message).toBe('Ranking cancelled: stop');
		}
		expect(detector).toHaveBeenCalledTimes(1);
	});

	it('validates chunkSize and concurrency', async () => {
		const policy = qualityFirstPolicy();
		await expect(rankCandidatesAsync([], TARGET, policy, {chunkSize: 0})).rejects.toThrow(
			'chunkSize must be an integer >= 1',
		);
		await expect(
			rankCandidatesAsync([], TARGET, policy, {concurrency: 1.5}),
		).rejects.toThrow('concurrency must be an integer >= 1');
	});

	it('logs one summary per call', async () => {
		const debug = vi.fn();
		const logger = {debug, info: vi.fn(), warn: vi.fn(), error: vi.fn()};
		await rankCandidatesAsync(randomBatch(2, 10), TARGET, qualityFirstPolicy(), {
			logger,
			chunkSize: 3,
		});

		expect(debug).toHaveBeenCalledTimes(1);
		expect(debug.mock.calls[0]?.[1]).toBe('Ranked batch');
	});
});
