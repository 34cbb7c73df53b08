import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
	buildRankOptions,
	parseCandidates,
	runRankCommand,
	type RankCommandOptions,
} from '../commands/rank.js';
import {InputError} from '../../lib/errors.js';
import type {Logger} from '../../lib/logger.js';
import type {RankResult} from '../../ranking/types.js';

describe('buildRankOptions', () => {
	it('builds a target from the flags', () => {
		const options = buildRankOptions(['results.json'], {
			title: ' Coastline ',
			artist: 'Night Drive',
			length: 312,
			policy: 'dj-ready',
			block: ['a, b', 'c', ' '],
		});

		expect(options).toEqual({
			candidatesPath: 'results.json',
			target: {title: 'Coastline', artist: 'Night Drive', lengthSeconds: 312, bpm: undefined},
			preset: 'dj-ready',
			blockedSources: ['a', 'b', 'c'],
			configPath: undefined,
			json: false,
			explain: false,
		});
	});

	it('requires a candidates file', () => {
		expect(() => buildRankOptions([], {title: 'T', artist: 'A'})).toThrow(
			'Missing candidates file. Usage: peer-rank <candidates.json>',
		);
	});

	it('requires both title and artist', () => {
		expect(() => buildRankOptions(['r.json'], {title: 'T', artist: '  '})).toThrow(
			'Both --title and --artist are required',
		);
	});

	it('rejects an unknown policy name', () => {
		expect(() =>
			buildRankOptions(['r.json'], {title: 'T', artist: 'A', policy: 'balanced'}),
		).toThrow(
			'Unknown policy "balanced". Expected one of: quality-first, dj-ready, data-saver',
		);
	});
});

describe('parseCandidates', () => {
	it('fills defaults and falls back to the extension for the format', () => {
		const candidates = parseCandidates(
			JSON.stringify([{sourceId: 'p', filename: 'Track.FLAC', bitrateKbps: 900}]),
			'cands.json',
		);

		expect(candidates).toEqual([
			{
				sourceId: 'p',
				filename: 'Track.FLAC',
				format: 'FLAC',
				bitrateKbps: 900,
				hasFreeCapacity: false,
				queueDepth: 0,
			},
		]);
	});

	it('reads null fields as unknown without losing other entries', () => {
		const candidates = parseCandidates(
			JSON.stringify([
				{sourceId: 'known', filename: 'Track.mp3', lengthSeconds: 300},
				{
					sourceId: 'sparse',
					filename: null,
					format: null,
					bitrateKbps: null,
					lengthSeconds: null,
					hasFreeCapacity: null,
					queueDepth: null,
					bpm: null,
					musicalKey: null,
					sizeBytes: null,
				},
			]),
			'cands.json',
		);

		expect(candidates).toHaveLength(2);
		expect(candidates[0]?.lengthSeconds).toBe(300);
		expect(candidates[1]).toEqual({
			sourceId: 'sparse',
			filename: '',
			format: '',
			bitrateKbps: 0,
			hasFreeCapacity: false,
			queueDepth: 0,
		});
		expect(candidates[1]?.lengthSeconds).toBeUndefined();
		expect(candidates[1]?.bpm).toBeUndefined();
	});

	it('keeps an explicit format', () => {
		const [candidate] = parseCandidates(
			JSON.stringify([{sourceId: 'p', filename: 'track', format: 'mp3'}]),
			'cands.json',
		);
		expect(candidate?.format).toBe('mp3');
	});

	it('reports invalid JSON', () => {
		expect(() => parseCandidates('[', 'cands.json')).toThrow(
			/^cands\.json is not valid JSON: /,
		);
	});

	it('reports invalid entries with their path', () => {
		expect(() => parseCandidates('[{"filename": "x"}]', 'cands.json')).toThrow(
			new InputError('cands.json has invalid candidates: 0.sourceId: Required'),
		);
	});
});

describe('runRankCommand', () => {
	let tempDir: string | null = null;

	beforeEach(async () => {
		tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'peer-rank-cli-test-'));
	});

	afterEach(async () => {
		if (tempDir) {
			await fs.rm(tempDir, {recursive: true, force: true});
			tempDir = null;
		}
	});

	async function writeCandidates(entries: unknown[]): Promise<string> {
		const filePath = path.join(tempDir ?? '', 'candidates.json');
		await fs.writeFile(filePath, JSON.stringify(entries));
		return filePath;
	}

	function optionsFor(
		candidatesPath: string,
		overrides: Partial<RankCommandOptions> = {},
	): RankCommandOptions {
		return {
			candidatesPath,
			target: {artist: 'Night Drive', title: 'Coastline', lengthSeconds: 300},
			blockedSources: [],
			configPath: path.join(tempDir ?? '', 'missing-config.json'),
			json: true,
			explain: false,
			...overrides,
		};
	}

	const ENTRIES = [
		{
			sourceId: 'queued',
			filename: 'Night Drive - Coastline.mp3',
			bitrateKbps: 320,
			lengthSeconds: 300,
			queueDepth: 3,
		},
		{
			sourceId: 'free',
			filename: 'Night Drive - Coastline.mp3',
			bitrateKbps: 320,
			lengthSeconds: 301,
			hasFreeCapacity: true,
		},
		{
			sourceId: 'spam',
			filename: 'Night Drive - Coastline.mp3',
			bitrateKbps: 320,
			lengthSeconds: 300,
			hasFreeCapacity: true,
		},
	];

	it('ranks a candidates file and prints JSON', async () => {
		const filePath = await writeCandidates(ENTRIES);
		const {result, text} = await runRankCommand(
			optionsFor(filePath, {blockedSources: ['spam']}),
		);

		expect(result.ranked.map(c => [c.sourceId, c.tier])).toEqual([
			['free', 1],
			['queued', 2],
		]);
		expect(result.rejections).toEqual([
			{
				originalIndex: 2,
				sourceId: 'spam',
				filename: 'Night Drive - Coastline.mp3',
				reason: 'blocked-source',
			},
		]);

		const printed: RankResult = JSON.parse(text);
		expect(printed.ranked.map(c => c.sourceId)).toEqual(['free', 'queued']);
		expect(printed.rejectedCount).toBe(1);
	});

	it('merges blocked sources from the config file and the flags', async () => {
		const filePath = await writeCandidates(ENTRIES);
		const configPath = path.join(tempDir ?? '', 'config.json');
		await fs.writeFile(
			configPath,
			JSON.stringify({policy: {preset: 'quality-first', blockedSources: ['queued']}}),
		);

		const {result} = await runRankCommand(
			optionsFor(filePath, {configPath, blockedSources: ['spam']}),
		);

		expect(result.ranked.map(c => c.sourceId)).toEqual(['free']);
		expect(result.rejections.map(r => r.sourceId)).toEqual(['queued', 'spam']);
	});

	it('prints a table ending in the summary', async () => {
		const filePath = await writeCandidates(ENTRIES);
		const {text} = await runRankCommand(optionsFor(filePath, {json: false}));

		const lines = text.split('\n');
		expect(lines.at(-1)).toBe(
			'3 ranked, 0 rejected by safety filter, 0 flagged as possible fakes',
		);
	});

	it('logs the run', async () => {
		const filePath = await writeCandidates(ENTRIES);
		const logger: Logger = {
			debug: vi.fn(),
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
		};

		await runRankCommand(optionsFor(filePath, {preset: 'dj-ready'}), logger);

		expect(logger.info).toHaveBeenCalledWith('RankCommand', 'Ranking candidates', {
			file: filePath,
			count: 3,
			priority: 'DjReady',
		});
	});

	it('fails for a missing candidates file', async () => {
		const missing = path.join(tempDir ?? '', 'nope.json');
		await expect(runRankCommand(optionsFor(missing))).rejects.toThrow(/ENOENT/);
	});
});
