/**
 * Ranking module exports.
 */

export {Tier, TIER_NAMES, compareTiers, tierName} from './tier.js';
export type {TierName} from './tier.js';

export type {
	Candidate,
	Target,
	RankedCandidate,
	RankResult,
	SafetyRejection,
	SafetyRejectReason,
} from './types.js';

export {
	normalizeCandidate,
	normalizeFormat,
	normalizeTarget,
	queryTextFor,
} from './candidate.js';

export {tokenize, matchesAllTokens} from './tokenizer.js';

export {
	createRankingPolicy,
	snapshotPolicy,
	qualityFirstPolicy,
	djReadyPolicy,
	dataSaverPolicy,
	policyFromPreset,
	parsePresetName,
	PRESET_NAMES,
} from './policy.js';
export type {
	RankingPolicy,
	RankingPolicyInput,
	RankingPolicyOverrides,
	RankingPriority,
	PresetName,
} from './policy.js';

export {checkSafety, isSafe, exceedsDurationTolerance} from './safety-filter.js';
export type {SafetyVerdict} from './safety-filter.js';

export {
	DEFAULT_FORENSIC_THRESHOLDS,
	LOSSLESS_FORMATS,
	assessForensics,
	calculateTrustScore,
	createForensicDetector,
	defaultForensicDetector,
	expectedSizeBytes,
	isFake,
} from './forensics.js';
export type {ForensicDetector, ForensicThresholds} from './forensics.js';

export {
	BPM_MATCH_TOLERANCE,
	QUEUE_VETO_DEPTH,
	classify,
	classifyWithVerdict,
	deriveFacts,
} from './classifier.js';
export type {QualityFacts} from './classifier.js';

export {
	compareWithinTier,
	compareClassified,
	createCandidateComparator,
	significanceBucket,
} from './comparator.js';
export type {Classified, Comparator} from './comparator.js';

export {rankScore, rankBreakdown} from './reporter.js';

export {rankCandidates, createRankContext, evaluateCandidate, assembleResult} from './engine.js';
export type {RankOptions, RankContext, Evaluation} from './engine.js';

export {rankCandidatesAsync, DEFAULT_CHUNK_SIZE, DEFAULT_CONCURRENCY} from './async.js';
export type {AsyncRankOptions} from './async.js';

export {PeerRankError, PolicyError, ConfigError} from '../lib/errors.js';
export {createLogger, createNullLogger} from '../lib/logger.js';
export type {Logger} from '../lib/logger.js';
export {loadRankingConfig, saveRankingConfig, resolveConfig} from '../lib/config.js';
export type {RankingConfig, RankingConfigFile} from '../lib/config.js';
