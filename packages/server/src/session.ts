import { InvalidPhaseError, PersistenceError } from './errors';
import { GuessEngine, type Cell, type Keyboard, type Phase, type SubmitOutcome } from './game';
import {
	dayIndex,
	nextDayIndex,
	nextPuzzleAt,
	resumeState,
	solutionFor,
	timeUntil,
	type ResumeDecision,
} from './puzzle';
import { recordOutcome, summarize, type DayRecord, type RecordStore, type StatsSummary } from './progress';
import { shareText } from './share';
import type { WordList } from './words';

export interface SessionOptions {
	words: WordList;
	store: RecordStore;
	epoch: Date;
	puzzleName: string;
	now?: Date;
}

export interface SessionSubmitOutcome extends SubmitOutcome {
	/** False when the puzzle finished but the record could not be written. */
	saved: boolean;
}

export interface PuzzleSnapshot {
	dayIndex: number;
	phase: Phase;
	cursor: number;
	rows: Cell[][];
	keyboard: Keyboard;
	attempts: number;
	message: string;
	solution?: string;
	nextPuzzleIn?: string | null;
}

/**
 * Today's puzzle for one player: selects the word, replays a stored day,
 * and saves the record the first time the puzzle finishes.
 */
export class DailySession {
	readonly dayIndex: number;
	readonly puzzleName: string;
	readonly engine: GuessEngine;
	private readonly epoch: Date;
	private readonly store: RecordStore;
	private record: DayRecord;
	private result: boolean | null = null;

	private constructor(options: SessionOptions, index: number, record: DayRecord) {
		this.dayIndex = index;
		this.puzzleName = options.puzzleName;
		this.epoch = options.epoch;
		this.store = options.store;
		this.record = record;
		this.engine = new GuessEngine(solutionFor(options.words, index), options.words);
	}

	static start(options: SessionOptions): DailySession {
		const index = dayIndex(options.now ?? new Date(), options.epoch, options.words.solutions.length);
		const record = options.store.load();
		let decision: ResumeDecision;
		try {
			decision = resumeState(index, record);
		} catch (err) {
			if (!(err instanceof PersistenceError)) throw err;
			console.warn(`[server] Discarding stored guesses for puzzle ${index}:`, err.message);
			decision = { kind: 'fresh' };
		}
		if (decision.kind === 'fresh') {
			const session = new DailySession(options, index, { ...record, last_result: null });
			console.log(`[server] Puzzle ${index} ready`);
			return session;
		}
		const session = new DailySession(options, index, record);
		session.engine.restore(decision.rows, decision.result);
		console.log(`[server] Puzzle ${index} restored with ${decision.rows.length} guess(es)`);
		if (decision.result !== null) {
			session.result = decision.result;
		} else if (session.engine.isComplete) {
			// Six rows were stored but the day was never counted
			session.finish(session.engine.phase === 'won');
		}
		return session;
	}

	get isComplete(): boolean {
		return this.engine.isComplete;
	}

	get nextDayIndex(): number {
		return nextDayIndex(this.dayIndex);
	}

	/** Countdown to the next puzzle; only meaningful once today's is done. */
	nextPuzzleIn(now: Date = new Date()): string | null {
		return timeUntil(nextPuzzleAt(this.epoch, this.dayIndex), now);
	}

	inputLetter(ch: string): void {
		this.engine.inputLetter(ch);
	}

	backspace(): void {
		this.engine.backspace();
	}

	submit(): SessionSubmitOutcome {
		const outcome = this.engine.submit();
		if (outcome.phase === 'filling') return { ...outcome, saved: true };

		return { ...outcome, saved: this.finish(outcome.won) };
	}

	/** Count the finished day and write it out. Returns false when the write failed. */
	private finish(won: boolean): boolean {
		this.result = won;
		this.record = recordOutcome(this.record, this.dayIndex, won, this.engine.submittedRows);
		try {
			this.store.save(this.record);
		} catch (err) {
			if (!(err instanceof PersistenceError)) throw err;
			console.error('[server]', err.message, err.cause);
			return false;
		}
		return true;
	}

	get message(): string {
		if (this.result === true) return 'You Win!';
		if (this.result === false) return `You Lose! The answer is: ${this.engine.solution}`;
		return '';
	}

	shareText(): string {
		if (this.result === null) throw new InvalidPhaseError('Finish the puzzle before sharing it');
		return shareText(this.puzzleName, this.dayIndex, this.engine.submittedRows, this.result);
	}

	stats(): StatsSummary {
		return summarize(this.record);
	}

	snapshot(now: Date = new Date()): PuzzleSnapshot {
		const snapshot: PuzzleSnapshot = {
			dayIndex: this.dayIndex,
			phase: this.engine.phase,
			cursor: this.engine.cursor,
			rows: this.engine.rows,
			keyboard: this.engine.keyboard,
			attempts: this.engine.attempts,
			message: this.message,
		};
		if (this.isComplete) {
			snapshot.solution = this.engine.solution;
			snapshot.nextPuzzleIn = this.nextPuzzleIn(now);
		}
		return snapshot;
	}
}
