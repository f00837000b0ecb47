import fs from 'node:fs';
import path from 'node:path';
import { WordListError } from './errors';
import { WORD_LENGTH } from './letters';

/** Loaded, validated word lists. Words are stored lowercase. */
export interface WordList {
	/** Daily solutions, indexed by day offset. */
	readonly solutions: readonly string[];
	/** True for any solution or extra valid guess, case-insensitive. */
	isAllowed(word: string): boolean;
}

// From dist/ or src/ we need to go up to the server package root
export const DEFAULT_SOLUTIONS_FILE = path.join(__dirname, '..', 'data', 'solutions.txt');
export const DEFAULT_GUESSES_FILE = path.join(__dirname, '..', 'data', 'guesses.txt');

const WORD_PATTERN = new RegExp(`^[a-z]{${WORD_LENGTH}}$`);

function normalize(words: readonly string[], source: string): string[] {
	const result: string[] = [];
	words.forEach((raw, i) => {
		const w = raw.trim().toLowerCase();
		if (w === '') return;
		if (!WORD_PATTERN.test(w)) {
			throw new WordListError(`${source}: entry ${i + 1} is not a ${WORD_LENGTH}-letter word: "${raw.trim()}"`);
		}
		result.push(w);
	});
	return result;
}

export function createWordList(solutions: readonly string[], guesses: readonly string[] = []): WordList {
	const sol = Object.freeze(normalize(solutions, 'solutions'));
	if (sol.length === 0) throw new WordListError('solutions: list is empty');
	const allowed = new Set([...sol, ...normalize(guesses, 'guesses')]);
	return {
		solutions: sol,
		isAllowed: (word) => allowed.has(word.trim().toLowerCase()),
	};
}

function readLines(filePath: string): string[] {
	try {
		return fs.readFileSync(filePath, 'utf-8').split('\n');
	} catch (err) {
		throw new WordListError(`Cannot read word list ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
	}
}

export function loadWordList(
	solutionsFile: string = DEFAULT_SOLUTIONS_FILE,
	guessesFile: string = DEFAULT_GUESSES_FILE
): WordList {
	return createWordList(readLines(solutionsFile), readLines(guessesFile));
}
