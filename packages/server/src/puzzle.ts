import { OutOfRangeError, PersistenceError } from './errors';
import type { SubmittedRow } from './game';
import { MAX_GUESSES, WORD_LENGTH, fromStatusCode, isLetter, type LetterState } from './letters';
import type { DayRecord } from './progress';
import type { WordList } from './words';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type ResumeDecision =
	| { kind: 'fresh' }
	| { kind: 'replay'; rows: SubmittedRow[]; result: boolean | null };

/** Midnight UTC of the local calendar date, so DST shifts never change a day count. */
function calendarDay(date: Date): number {
	return Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * Whole calendar days from `epoch` to `now`, time of day ignored.
 * With `solutionCount` the index is also checked against the solution list.
 */
export function dayIndex(now: Date, epoch: Date, solutionCount?: number): number {
	const index = Math.round((calendarDay(now) - calendarDay(epoch)) / MS_PER_DAY);
	if (index < 0) throw new OutOfRangeError(index, `Day index ${index} is before the first puzzle`);
	if (solutionCount !== undefined && index > solutionCount - 1) {
		throw new OutOfRangeError(index, `Day index ${index} is past the last of ${solutionCount} puzzles`);
	}
	return index;
}

export function solutionFor(words: WordList, index: number): string {
	const word = words.solutions[index];
	if (!Number.isInteger(index) || word === undefined) throw new OutOfRangeError(index);
	return word.toUpperCase();
}

function parseRows(letters: string, statuses: string): SubmittedRow[] {
	if (letters.length !== statuses.length || letters.length % WORD_LENGTH !== 0) {
		throw new PersistenceError('Stored guesses and statuses do not line up');
	}
	if (letters.length / WORD_LENGTH > MAX_GUESSES) {
		throw new PersistenceError(`Stored guesses exceed ${MAX_GUESSES} rows`);
	}
	for (const ch of letters) {
		if (!isLetter(ch)) throw new PersistenceError(`Stored guesses contain "${ch}"`);
	}
	const rows: SubmittedRow[] = [];
	for (let start = 0; start < letters.length; start += WORD_LENGTH) {
		const states: LetterState[] = [];
		for (const code of statuses.slice(start, start + WORD_LENGTH)) {
			const state = fromStatusCode(code);
			if (state === null) throw new PersistenceError(`Unknown stored status "${code}"`);
			states.push(state);
		}
		rows.push({ letters: letters.slice(start, start + WORD_LENGTH).toUpperCase(), states });
	}
	return rows;
}

/**
 * A record from an earlier day is stale; one from today is restored verbatim
 * so a finished day cannot be played again. A record from a later day means
 * the clock went backwards and no puzzle can be trusted.
 */
export function resumeState(index: number, record: DayRecord): ResumeDecision {
	if (record.last_played < index) return { kind: 'fresh' };
	if (record.last_played > index) {
		throw new OutOfRangeError(index, `Day index ${index} is before the last played day ${record.last_played}`);
	}
	const [letters, statuses] = record.last_guesses;
	return { kind: 'replay', rows: parseRows(letters, statuses), result: record.last_result };
}

export function nextDayIndex(index: number): number {
	return index + 1;
}

/** Local midnight at which puzzle `index + 1` starts. */
export function nextPuzzleAt(epoch: Date, index: number): Date {
	return new Date(epoch.getFullYear(), epoch.getMonth(), epoch.getDate() + nextDayIndex(index));
}

/** `HH:MM:SS` until `target`, or null once it has passed. */
export function timeUntil(target: Date, now: Date = new Date()): string | null {
	let seconds = Math.floor((target.getTime() - now.getTime()) / 1000);
	if (seconds <= 0) return null;
	const digits: string[] = [];
	for (const unit of [3600, 60, 1]) {
		digits.push(String(Math.floor(seconds / unit)).padStart(2, '0'));
		seconds %= unit;
	}
	return digits.join(':');
}
