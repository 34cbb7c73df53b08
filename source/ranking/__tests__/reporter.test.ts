import {describe, it, expect} from 'vitest';
import {rankBreakdown, rankScore} from '../reporter.js';
import {TIER_NAMES, Tier, compareTiers, tierName} from '../tier.js';

describe('tiers', () => {
	it('orders Diamond first and Trash last', () => {
		const shuffled = [Tier.Bronze, Tier.Diamond, Tier.Trash, Tier.Silver, Tier.Gold];
		expect(shuffled.sort(compareTiers).map(tierName)).toEqual([
			'Diamond',
			'Gold',
			'Silver',
			'Bronze',
			'Trash',
		]);
	});

	it('names every tier', () => {
		expect(Object.values(TIER_NAMES)).toHaveLength(5);
	});
});

describe('rankScore', () => {
	it('maps tiers to fixed display scores', () => {
		expect(rankScore(Tier.Diamond)).toBe(1);
		expect(rankScore(Tier.Gold)).toBe(0.85);
		expect(rankScore(Tier.Silver)).toBe(0.6);
		expect(rankScore(Tier.Bronze)).toBe(0.4);
		expect(rankScore(Tier.Trash)).toBe(0.1);
	});
});

describe('rankBreakdown', () => {
	it('explains each tier', () => {
		expect(rankBreakdown(Tier.Gold)).toBe('Gold tier: great quality, good availability');
		expect(rankBreakdown(Tier.Silver)).toBe('Silver tier: acceptable match');
		expect(rankBreakdown(Tier.Bronze)).toBe('Bronze tier: low quality or availability');
		expect(rankBreakdown(Tier.Trash)).toBe(
			'Trash tier: Forensic Mismatch (possible fake)',
		);
	});
});
