/**
 * Rank reporter - score and rationale for display.
 *
 * Presentation only. Ordering is decided by the comparator alone; these
 * numbers must never feed back into it.
 */

import {Tier} from './tier.js';

const SCORES: Record<Tier, number> = {
	[Tier.Diamond]: 1.0,
	[Tier.Gold]: 0.85,
	[Tier.Silver]: 0.6,
	[Tier.Bronze]: 0.4,
	[Tier.Trash]: 0.1,
};

const BREAKDOWNS: Record<Tier, string> = {
	[Tier.Diamond]: 'Diamond tier: perfect match, high quality, available now',
	[Tier.Gold]: 'Gold tier: great quality, good availability',
	[Tier.Silver]: 'Silver tier: acceptable match',
	[Tier.Bronze]: 'Bronze tier: low quality or availability',
	[Tier.Trash]: 'Trash tier: Forensic Mismatch (possible fake)',
};

export function rankScore(tier: Tier): number {
	return SCORES[tier];
}

export function rankBreakdown(tier: Tier): string {
	return BREAKDOWNS[tier];
}
