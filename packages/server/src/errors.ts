/** Base for every failure the game reports. `code` and `status` travel to the HTTP layer as-is. */
export class GameError extends Error {
	readonly code: string;
	readonly status: number;

	constructor(message: string, code: string, status: number) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.status = status;
	}
}

// Submit-time validation. The grid is left untouched.

export class IncompleteRowError extends GameError {
	constructor() {
		super('Not enough letters', 'INCOMPLETE_ROW', 400);
	}
}

export class UnknownWordError extends GameError {
	readonly word: string;

	constructor(word: string) {
		super('Not in word list', 'UNKNOWN_WORD', 400);
		this.word = word;
	}
}

export class InvalidPhaseError extends GameError {
	constructor(message = 'Invalid action for current phase') {
		super(message, 'INVALID_PHASE', 409);
	}
}

// Fatal at session start.

export class OutOfRangeError extends GameError {
	readonly index: number;

	constructor(index: number, message = `Day index ${index} has no puzzle`) {
		super(message, 'OUT_OF_RANGE', 500);
		this.index = index;
	}
}

export class WordListError extends GameError {
	constructor(message: string) {
		super(message, 'WORD_LIST', 500);
	}
}

export class ConfigError extends GameError {
	constructor(message: string) {
		super(message, 'CONFIG', 500);
	}
}

export class PersistenceError extends GameError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'PERSISTENCE', 500);
		if (options?.cause !== undefined) this.cause = options.cause;
	}
}

export function isGameError(err: unknown): err is GameError {
	return err instanceof GameError;
}
