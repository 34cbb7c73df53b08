/**
 * Terminal rendering of a ranking result.
 */

import chalk, {type ChalkInstance} from 'chalk';
import {assessForensics, DEFAULT_FORENSIC_THRESHOLDS} from '../ranking/forensics.js';
import type {ForensicThresholds} from '../ranking/forensics.js';
import {normalizeCandidate, normalizeTarget} from '../ranking/candidate.js';
import {Tier, tierName} from '../ranking/tier.js';
import type {RankResult, Target} from '../ranking/types.js';

export interface FormatOptions {
	/** Add the tier rationale and forensic notes under each row */
	explain?: boolean;
	target?: Target;
	thresholds?: ForensicThresholds;
	/** Override for tests; defaults to the auto-detected chalk instance */
	painter?: ChalkInstance;
}

const COLUMNS = {
	rank: 4,
	tier: 8,
	score: 6,
	bitrate: 8,
	queue: 6,
	source: 14,
} as const;

function paintTier(painter: ChalkInstance, tier: Tier, text: string): string {
	switch (tier) {
		case Tier.Diamond:
			return painter.cyan(text);
		case Tier.Gold:
			return painter.yellow(text);
		case Tier.Silver:
			return painter.white(text);
		case Tier.Bronze:
			return painter.hex('#CD7F32')(text);
		case Tier.Trash:
			return painter.red(text);
	}
}

export function formatHeader(): string {
	return [
		'#'.padEnd(COLUMNS.rank),
		'Tier'.padEnd(COLUMNS.tier),
		'Score'.padEnd(COLUMNS.score),
		'Bitrate'.padEnd(COLUMNS.bitrate),
		'Queue'.padEnd(COLUMNS.queue),
		'Source'.padEnd(COLUMNS.source),
		'Filename',
	].join('');
}

export function formatSummary(result: RankResult): string {
	return (
		`${result.ranked.length} ranked, ` +
		`${result.rejectedCount} rejected by safety filter, ` +
		`${result.trashCount} flagged as possible fakes`
	);
}

/**
 * Render the ranked table followed by a one-line summary.
 */
export function formatRankTable(
	result: RankResult,
	options: FormatOptions = {},
): string {
	const painter = options.painter ?? chalk;
	const lines: string[] = [painter.bold(formatHeader())];

	result.ranked.forEach((item, index) => {
		const bitrate = item.bitrateKbps > 0 ? `${item.bitrateKbps}k` : '?';
		const row = [
			String(index + 1).padEnd(COLUMNS.rank),
			paintTier(painter, item.tier, tierName(item.tier).padEnd(COLUMNS.tier)),
			item.rankScore.toFixed(2).padEnd(COLUMNS.score),
			bitrate.padEnd(COLUMNS.bitrate),
			String(item.queueDepth).padEnd(COLUMNS.queue),
			item.sourceId.padEnd(COLUMNS.source),
			item.filename,
		].join('');
		lines.push(row);

		if (options.explain) {
			lines.push(painter.dim(`    ${item.rankBreakdown}`));
			if (options.target) {
				const notes = assessForensics(
					normalizeCandidate(item),
					normalizeTarget(options.target),
					options.thresholds ?? DEFAULT_FORENSIC_THRESHOLDS,
				);
				if (notes.length > 0) {
					lines.push(painter.dim(`    ${notes.join(' | ')}`));
				}
			}
		}
	});

	lines.push('');
	lines.push(formatSummary(result));

	return lines.join('\n');
}
