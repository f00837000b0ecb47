import { describe, it, expect, afterEach, vi } from 'vitest';

import { InvalidPhaseError, OutOfRangeError, PersistenceError } from '../src/errors';
import { MemoryRecordStore, type DayRecord } from '../src/progress';
import { DailySession } from '../src/session';
import { createWordList } from '../src/words';

const words = createWordList(['crane', 'allow', 'sheep'], ['llama', 'adieu', 'stone', 'hello', 'world']);
const epoch = new Date(2026, 9, 1);
// Day 1 -> ALLOW
const now = new Date(2026, 9, 2, 9, 30);

class FailingStore extends MemoryRecordStore {
	save(_record: DayRecord): void {
		throw new PersistenceError('disk full');
	}
}

function start(store: MemoryRecordStore): DailySession {
	return DailySession.start({ words, store, epoch, puzzleName: 'Wordle', now });
}

function play(session: DailySession, guesses: string[]) {
	return guesses.map((guess) => {
		for (const ch of guess) session.inputLetter(ch);
		return session.submit();
	});
}

describe('DailySession', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('selects the puzzle for the current day', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const session = start(new MemoryRecordStore());
		expect(session.dayIndex).toBe(1);
		expect(session.nextDayIndex).toBe(2);
		expect(session.engine.solution).toBe('ALLOW');
		expect(session.engine.phase).toBe('filling');
		expect(session.message).toBe('');
	});

	it('ignores the grid of an earlier day but keeps its stats', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const store = new MemoryRecordStore({
			last_played: 0,
			last_guesses: ['CRANE', '22222'],
			last_result: true,
			played: 5,
			stats: [1, 2, 1, 0, 0, 0],
		});
		const session = start(store);
		expect(session.engine.attempts).toBe(0);
		expect(session.engine.phase).toBe('filling');
		expect(session.stats()).toEqual({
			played: 5,
			wins: 4,
			winPercentage: 80,
			distribution: [1, 2, 1, 0, 0, 0],
			lastWinAttempts: null,
		});
	});

	it('saves the record once when the puzzle is won', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const store = new MemoryRecordStore();
		const session = start(store);
		const [first, second] = play(session, ['crane', 'allow']);

		expect(first).toMatchObject({ won: false, phase: 'filling', saved: true });
		expect(second).toMatchObject({ won: true, phase: 'won', attempts: 2, saved: true });
		expect(store.saves).toBe(1);
		expect(store.load()).toEqual({
			last_played: 1,
			last_guesses: ['CRANEALLOW', '0010022222'],
			last_result: true,
			played: 1,
			stats: [0, 1, 0, 0, 0, 0],
		});
		expect(session.message).toBe('You Win!');
		expect(session.shareText()).toBe('Wordle 1 2/6\n\n⬛⬛🟨⬛⬛\n🟩🟩🟩🟩🟩');
	});

	it('restores a finished day without counting it again', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const store = new MemoryRecordStore();
		play(start(store), ['crane', 'allow']);

		const again = start(store);
		expect(again.engine.phase).toBe('won');
		expect(again.engine.submittedRows).toEqual([
			{ letters: 'CRANE', states: ['absent', 'absent', 'present', 'absent', 'absent'] },
			{ letters: 'ALLOW', states: ['correct', 'correct', 'correct', 'correct', 'correct'] },
		]);
		expect(again.stats().played).toBe(1);
		expect(again.stats().lastWinAttempts).toBe(2);
		expect(again.message).toBe('You Win!');
		expect(() => again.submit()).toThrow(InvalidPhaseError);
		expect(store.saves).toBe(1);
	});

	it('records a loss after six misses', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const store = new MemoryRecordStore();
		const session = start(store);
		const outcomes = play(session, ['crane', 'llama', 'adieu', 'stone', 'hello', 'world']);

		expect(outcomes[5]).toMatchObject({ won: false, phase: 'lost', attempts: 6, saved: true });
		expect(store.load()).toMatchObject({ played: 1, last_result: false, stats: [0, 0, 0, 0, 0, 0] });
		expect(session.message).toBe('You Lose! The answer is: ALLOW');
		expect(session.shareText().split('\n')[0]).toBe('Wordle 1 x/6');
		expect(session.shareText().split('\n')).toHaveLength(8);
	});

	it('refuses to share an unfinished puzzle', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const session = start(new MemoryRecordStore());
		expect(() => session.shareText()).toThrow(InvalidPhaseError);
	});

	it('reports a failed save and keeps the finished game', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const session = start(new FailingStore());
		const [, last] = play(session, ['crane', 'allow']);

		expect(last).toMatchObject({ won: true, phase: 'won', saved: false });
		expect(error).toHaveBeenCalledTimes(1);
		expect(session.engine.phase).toBe('won');
		expect(session.stats().played).toBe(1);
		expect(session.shareText()).toBe('Wordle 1 2/6\n\n⬛⬛🟨⬛⬛\n🟩🟩🟩🟩🟩');
	});

	it('counts a stored day of six rows that was never counted', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const store = new MemoryRecordStore({
			last_played: 1,
			last_guesses: ['CRANE'.repeat(6), '00100'.repeat(6)],
			last_result: null,
			played: 2,
			stats: [0, 1, 0, 0, 0, 0],
		});
		const session = start(store);

		expect(session.engine.phase).toBe('lost');
		expect(session.message).toBe('You Lose! The answer is: ALLOW');
		expect(session.stats().played).toBe(3);
		expect(store.load()).toMatchObject({ last_played: 1, last_result: false, played: 3, stats: [0, 1, 0, 0, 0, 0] });
		expect(store.saves).toBe(1);

		expect(start(store).stats().played).toBe(3);
		expect(store.saves).toBe(1);
	});

	it('starts today fresh when the stored guesses are malformed', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const store = new MemoryRecordStore({
			last_played: 1,
			last_guesses: ['CRANE', '001'],
			last_result: null,
			played: 4,
			stats: [1, 1, 0, 0, 0, 0],
		});
		const session = start(store);

		expect(session.engine.phase).toBe('filling');
		expect(session.engine.attempts).toBe(0);
		expect(session.stats()).toMatchObject({ played: 4, wins: 2 });
		expect(warn).toHaveBeenCalledTimes(1);

		const [, won] = play(session, ['crane', 'allow']);
		expect(won).toMatchObject({ won: true, saved: true });
		expect(store.load()).toMatchObject({ played: 5, stats: [1, 2, 0, 0, 0, 0] });
	});

	it('starts today fresh when a stored guess holds a non-letter', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		const session = start(new MemoryRecordStore({ last_played: 1, last_guesses: ['CR4N!', '00000'], last_result: false }));
		expect(session.engine.phase).toBe('filling');
		expect(Object.keys(session.engine.keyboard)).toHaveLength(26);
	});

	it('refuses to start when the stored day is ahead of the clock', () => {
		expect(() => start(new MemoryRecordStore({ last_played: 2 }))).toThrow(OutOfRangeError);
	});

	it('refuses to start before the first puzzle or after the last', () => {
		const store = new MemoryRecordStore();
		expect(() => DailySession.start({ words, store, epoch, puzzleName: 'Wordle', now: new Date(2026, 8, 30) })).toThrow(
			OutOfRangeError
		);
		expect(() => DailySession.start({ words, store, epoch, puzzleName: 'Wordle', now: new Date(2026, 9, 4) })).toThrow(
			OutOfRangeError
		);
	});

	it('hides the solution until the puzzle is over', () => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		const session = start(new MemoryRecordStore());
		const playing = session.snapshot(now);
		expect('solution' in playing).toBe(false);
		expect('nextPuzzleIn' in playing).toBe(false);

		play(session, ['crane', 'allow']);
		const done = session.snapshot(new Date(2026, 9, 2, 23, 0, 0));
		expect(done.solution).toBe('ALLOW');
		expect(done.nextPuzzleIn).toBe('01:00:00');
		expect(done.attempts).toBe(2);
		expect(done.keyboard.A).toBe('correct');
		expect(done.rows[1].map((c) => c.letter).join('')).toBe('ALLOW');
	});
});
