/**
 * Error types raised outside the per-candidate evaluation path.
 *
 * Ranking itself never throws for a bad candidate; these cover the places
 * where failing fast is the contract: building a policy and loading config.
 */

export const ErrorCodes = {
	INVALID_POLICY: 'INVALID_POLICY',
	INVALID_CONFIG: 'INVALID_CONFIG',
	INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class PeerRankError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
	) {
		super(message);
		this.name = 'PeerRankError';
	}
}

/**
 * Raised when a ranking policy fails validation.
 */
export class PolicyError extends PeerRankError {
	constructor(public readonly issues: string[]) {
		super(ErrorCodes.INVALID_POLICY, `Invalid ranking policy: ${issues.join('; ')}`);
		this.name = 'PolicyError';
	}
}

/**
 * Raised when a config file exists but cannot be read, parsed or validated.
 */
export class ConfigError extends PeerRankError {
	constructor(
		public readonly configPath: string,
		detail: string,
	) {
		super(ErrorCodes.INVALID_CONFIG, `Invalid config at ${configPath}: ${detail}`);
		this.name = 'ConfigError';
	}
}

/**
 * Raised by the CLI when the candidates file is malformed.
 */
export class InputError extends PeerRankError {
	constructor(message: string) {
		super(ErrorCodes.INVALID_INPUT, message);
		this.name = 'InputError';
	}
}

/**
 * Format zod-style issues as `path: message` strings.
 */
export function formatIssues(
	issues: ReadonlyArray<{path: ReadonlyArray<PropertyKey>; message: string}>,
): string[] {
	return issues.map(issue => {
		const where = issue.path.map(String).join('.');
		return where ? `${where}: ${issue.message}` : issue.message;
	});
}
