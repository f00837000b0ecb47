export const WORD_LENGTH = 5;
export const MAX_GUESSES = 6;

export type LetterState = 'unknown' | 'absent' | 'present' | 'correct';

/** Wire codes used in the stored statuses string. `unknown` is never stored. */
export type StatusCode = '0' | '1' | '2';

const RANK: Record<LetterState, number> = {
	unknown: 0,
	absent: 1,
	present: 2,
	correct: 3,
};

/** Ordering for the keyboard: correct > present > absent > unknown. */
export function compareStates(a: LetterState, b: LetterState): number {
	return RANK[a] - RANK[b];
}

export function maxState(a: LetterState, b: LetterState): LetterState {
	return compareStates(a, b) >= 0 ? a : b;
}

export function toStatusCode(state: LetterState): StatusCode {
	switch (state) {
		case 'correct':
			return '2';
		case 'present':
			return '1';
		case 'absent':
			return '0';
		case 'unknown':
			throw new RangeError('An unevaluated cell has no status code');
	}
}

export function fromStatusCode(code: string): LetterState | null {
	switch (code) {
		case '0':
			return 'absent';
		case '1':
			return 'present';
		case '2':
			return 'correct';
		default:
			return null;
	}
}

export const ALPHABET: readonly string[] = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'.split('');

export function isLetter(ch: string): boolean {
	return /^[A-Za-z]$/.test(ch);
}
