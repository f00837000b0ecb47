export { createApp } from './app';
export { loadConfig, parseEpoch, type Config } from './config';
export * from './errors';
export {
	GuessEngine,
	emptyKeyboard,
	scoreGuess,
	type Cell,
	type Keyboard,
	type Phase,
	type SubmitOutcome,
	type SubmittedRow,
} from './game';
export { ALPHABET, MAX_GUESSES, WORD_LENGTH, compareStates, maxState, type LetterState } from './letters';
export {
	FileRecordStore,
	MemoryRecordStore,
	freshRecord,
	recordOutcome,
	summarize,
	type DayRecord,
	type RecordStore,
	type StatsSummary,
} from './progress';
export {
	dayIndex,
	nextDayIndex,
	nextPuzzleAt,
	resumeState,
	solutionFor,
	timeUntil,
	type ResumeDecision,
} from './puzzle';
export { DailySession, type PuzzleSnapshot, type SessionOptions, type SessionSubmitOutcome } from './session';
export { shareText } from './share';
export { createWordList, loadWordList, type WordList } from './words';
