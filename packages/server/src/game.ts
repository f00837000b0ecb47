import { IncompleteRowError, InvalidPhaseError, UnknownWordError } from './errors';
import {
	ALPHABET,
	MAX_GUESSES,
	WORD_LENGTH,
	isLetter,
	maxState,
	type LetterState,
} from './letters';
import type { WordList } from './words';

export type Phase = 'filling' | 'won' | 'lost';

export interface Cell {
	letter: string;
	state: LetterState;
}

/** One submitted attempt: uppercase letters and their evaluation. */
export interface SubmittedRow {
	letters: string;
	states: LetterState[];
}

export interface SubmitOutcome {
	/** 0-based row that was scored. */
	row: number;
	states: LetterState[];
	won: boolean;
	phase: Phase;
	/** Submitted rows so far, including this one. */
	attempts: number;
}

export type Keyboard = Record<string, LetterState>;

const CELL_COUNT = WORD_LENGTH * MAX_GUESSES;

/**
 * Score a guess against the solution.
 * Exact matches are credited first so a scarce letter goes to the
 * right-position copy before any present-elsewhere copy.
 */
export function scoreGuess(solution: string, guess: string): LetterState[] {
	const target = solution.toUpperCase();
	const word = guess.toUpperCase();
	if (target.length !== word.length) {
		throw new RangeError(`Cannot score a ${word.length}-letter guess against a ${target.length}-letter solution`);
	}
	const result: LetterState[] = new Array<LetterState>(word.length).fill('absent');
	const remaining: Record<string, number> = {};
	for (const c of target) remaining[c] = (remaining[c] ?? 0) + 1;

	for (let i = 0; i < word.length; i++) {
		if (word[i] === target[i]) {
			result[i] = 'correct';
			remaining[word[i]]--;
		}
	}
	for (let i = 0; i < word.length; i++) {
		if (result[i] === 'correct') continue;
		const c = word[i];
		if ((remaining[c] ?? 0) > 0) {
			result[i] = 'present';
			remaining[c]--;
		}
	}
	return result;
}

export function emptyKeyboard(): Keyboard {
	const keyboard: Keyboard = {};
	for (const letter of ALPHABET) keyboard[letter] = 'unknown';
	return keyboard;
}

/**
 * One day's puzzle: a 6×5 grid with a cursor, the keyboard and the phase.
 * Knows nothing about storage; the caller persists what `submit` returns.
 */
export class GuessEngine {
	readonly solution: string;
	private readonly words: WordList;
	private readonly cells: Cell[];
	private readonly keys: Keyboard = emptyKeyboard();
	private position = 0;
	private state: Phase = 'filling';

	constructor(solution: string, words: WordList) {
		this.solution = solution.toUpperCase();
		this.words = words;
		this.cells = Array.from({ length: CELL_COUNT }, () => ({ letter: '', state: 'unknown' }));
	}

	get phase(): Phase {
		return this.state;
	}

	get isComplete(): boolean {
		return this.state !== 'filling';
	}

	get cursor(): number {
		return this.position;
	}

	get currentRow(): number {
		return Math.floor(this.position / WORD_LENGTH);
	}

	/** Copy of the grid, one array of cells per row. */
	get rows(): Cell[][] {
		const rows: Cell[][] = [];
		for (let r = 0; r < MAX_GUESSES; r++) {
			rows.push(this.cells.slice(r * WORD_LENGTH, (r + 1) * WORD_LENGTH).map((c) => ({ ...c })));
		}
		return rows;
	}

	/** Rows that have been scored, in submission order. */
	get submittedRows(): SubmittedRow[] {
		return this.rows
			.filter((row) => row.every((c) => c.state !== 'unknown'))
			.map((row) => ({
				letters: row.map((c) => c.letter).join(''),
				states: row.map((c) => c.state),
			}));
	}

	get attempts(): number {
		return this.submittedRows.length;
	}

	get keyboard(): Keyboard {
		return { ...this.keys };
	}

	inputLetter(ch: string): void {
		if (this.isComplete || !isLetter(ch)) return;
		if (this.cells[this.position].letter) {
			// The last letter of the row is filled
			if (this.position % WORD_LENGTH === WORD_LENGTH - 1) return;
			this.position++;
		}
		this.cells[this.position].letter = ch.toUpperCase();
	}

	backspace(): void {
		if (this.isComplete) return;
		if (!this.cells[this.position].letter) {
			if (this.position % WORD_LENGTH === 0) return;
			this.position--;
		}
		this.cells[this.position].letter = '';
	}

	submit(): SubmitOutcome {
		if (this.isComplete) throw new InvalidPhaseError('The puzzle is already finished');
		const row = this.currentRow;
		const start = row * WORD_LENGTH;
		const current = this.cells.slice(start, start + WORD_LENGTH);
		if (current.some((c) => !c.letter)) throw new IncompleteRowError();
		const word = current.map((c) => c.letter).join('');
		if (!this.words.isAllowed(word)) throw new UnknownWordError(word);

		const states = scoreGuess(this.solution, word);
		current.forEach((cell, i) => {
			cell.state = states[i];
			this.keys[cell.letter] = maxState(this.keys[cell.letter], states[i]);
		});

		const won = states.every((s) => s === 'correct');
		if (won) {
			this.state = 'won';
		} else if (this.position < CELL_COUNT - 1) {
			this.position++;
		} else {
			this.state = 'lost';
		}
		return { row, states, won, phase: this.state, attempts: row + 1 };
	}

	/**
	 * Rebuild the grid from stored rows without re-scoring them.
	 * `result` null leaves the puzzle open at the row after the last stored one.
	 */
	restore(rows: readonly SubmittedRow[], result: boolean | null): void {
		if (rows.length > MAX_GUESSES) throw new RangeError(`Cannot restore ${rows.length} rows`);
		rows.forEach((row, r) => {
			if (row.letters.length !== WORD_LENGTH || row.states.length !== WORD_LENGTH) {
				throw new RangeError(`Row ${r + 1} is not ${WORD_LENGTH} cells wide`);
			}
			if (![...row.letters].every(isLetter)) throw new RangeError(`Row ${r + 1} holds a non-letter`);
		});
		rows.forEach((row, r) => {
			for (let i = 0; i < WORD_LENGTH; i++) {
				const letter = row.letters[i].toUpperCase();
				this.cells[r * WORD_LENGTH + i] = { letter, state: row.states[i] };
				this.keys[letter] = maxState(this.keys[letter], row.states[i]);
			}
		});
		const filled = rows.length * WORD_LENGTH;
		// Without a stored result, a solved last row still means the day was won
		const won = result ?? (rows.length > 0 && rows[rows.length - 1].states.every((s) => s === 'correct'));
		if (result === null && !won && rows.length < MAX_GUESSES) {
			this.state = 'filling';
			this.position = filled;
		} else {
			this.state = won ? 'won' : 'lost';
			this.position = Math.max(filled - 1, 0);
		}
	}
}
