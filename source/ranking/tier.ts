/**
 * Quality tiers. Lower is better: every Diamond sorts before every Gold,
 * and so on down to Trash.
 */
export const Tier = {
	Diamond: 1,
	Gold: 2,
	Silver: 3,
	Bronze: 4,
	Trash: 5,
} as const;

export type Tier = (typeof Tier)[keyof typeof Tier];

export type TierName = keyof typeof Tier;

export const TIER_NAMES: Record<Tier, TierName> = {
	1: 'Diamond',
	2: 'Gold',
	3: 'Silver',
	4: 'Bronze',
	5: 'Trash',
};

/**
 * Ascending tier order: negative when `a` is the better tier.
 */
export function compareTiers(a: Tier, b: Tier): number {
	return a - b;
}

export function tierName(tier: Tier): TierName {
	return TIER_NAMES[tier];
}
