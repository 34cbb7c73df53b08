/**
 * Query tokenizer for the title admission gate.
 *
 * Decides whether a filename plausibly names the requested track: every
 * token of the query must appear among the filename's tokens. Binary, not a
 * score. Short words ("a", "the") are kept: "Artist - Title A" must not
 * admit "Artist - Title B".
 */

const DELIMITERS = /[\s\-_,.()[\]]+/;
const JOINING_WORDS = /\b(feat|ft|featuring|vs|with|prod)\b/gi;

/** A trailing dot this close to the end marks a file extension. */
const EXTENSION_WINDOW = 6;

function stripExtension(text: string): string {
	const lastDot = text.lastIndexOf('.');
	if (lastDot > 0 && text.length - lastDot < EXTENSION_WINDOW) {
		return text.slice(0, lastDot);
	}
	return text;
}

/**
 * Split text into lowercase tokens.
 *
 * @param fuzzy - Also drop joining words (feat, ft, vs, with, prod, ...)
 */
export function tokenize(text: string, fuzzy: boolean): string[] {
	if (text.trim().length === 0) return [];

	let normalized = stripExtension(text.toLowerCase());

	if (fuzzy) {
		normalized = normalized.replace(JOINING_WORDS, ' ');
	}

	return normalized.split(DELIMITERS).filter(token => token.length > 0);
}

/**
 * True when every query token is present in the candidate text.
 * An empty query matches anything; an empty candidate matches nothing else.
 */
export function matchesAllTokens(
	query: string,
	candidateText: string,
	fuzzy = true,
): boolean {
	const queryTokens = tokenize(query, fuzzy);
	if (queryTokens.length === 0) return true;

	const candidateTokens = new Set(tokenize(candidateText, fuzzy));
	return queryTokens.every(token => candidateTokens.has(token));
}
