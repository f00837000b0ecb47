import fs from 'node:fs';
import { z } from 'zod';
import { PersistenceError } from './errors';
import type { SubmittedRow } from './game';
import { MAX_GUESSES, WORD_LENGTH, toStatusCode } from './letters';

const statsSchema = z.array(z.number().int().nonnegative()).length(MAX_GUESSES);

/** Letters and `0/1/2` statuses of the stored day, one character per cell. */
const lastGuessesSchema = z.tuple([z.string(), z.string()]).superRefine(([letters, statuses], ctx) => {
	if (letters.length !== statuses.length || letters.length % WORD_LENGTH !== 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Stored guesses and statuses do not line up' });
	} else if (letters.length > WORD_LENGTH * MAX_GUESSES) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Stored guesses exceed ${MAX_GUESSES} rows` });
	}
	if (!/^[A-Za-z]*$/.test(letters)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Stored guesses contain a non-letter' });
	}
	if (!/^[012]*$/.test(statuses)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Stored statuses contain an unknown code' });
	}
});

/**
 * Stored per installation. Older files only carry `played` and `stats`;
 * the remaining fields default to "nothing played yet".
 */
export const dayRecordSchema = z.object({
	last_played: z.number().int().default(-1),
	last_guesses: lastGuessesSchema.default(['', '']),
	last_result: z.boolean().nullable().default(null),
	played: z.number().int().nonnegative(),
	stats: statsSchema,
});

export type DayRecord = z.infer<typeof dayRecordSchema>;

export function freshRecord(): DayRecord {
	return {
		last_played: -1,
		last_guesses: ['', ''],
		last_result: null,
		played: 0,
		stats: new Array<number>(MAX_GUESSES).fill(0),
	};
}

/** Count a finished day. Pure: the caller decides whether and where to save. */
export function recordOutcome(record: DayRecord, index: number, won: boolean, rows: readonly SubmittedRow[]): DayRecord {
	const stats = [...record.stats];
	if (won) stats[rows.length - 1] += 1;
	return {
		last_played: index,
		last_guesses: [
			rows.map((r) => r.letters.toUpperCase()).join(''),
			rows.map((r) => r.states.map(toStatusCode).join('')).join(''),
		],
		last_result: won,
		played: record.played + 1,
		stats,
	};
}

export interface StatsSummary {
	played: number;
	wins: number;
	winPercentage: number;
	distribution: number[];
	/** Attempts used on the stored day when it was a win. */
	lastWinAttempts: number | null;
}

export function summarize(record: DayRecord): StatsSummary {
	const wins = record.stats.reduce((sum, n) => sum + n, 0);
	const lastWinAttempts = record.last_result === true ? record.last_guesses[0].length / WORD_LENGTH : null;
	return {
		played: record.played,
		wins,
		winPercentage: record.played ? Math.round((wins / record.played) * 1000) / 10 : 0,
		distribution: [...record.stats],
		lastWinAttempts,
	};
}

export interface RecordStore {
	load(): DayRecord;
	save(record: DayRecord): void;
}

/** JSON file store. Saves write a temp file, then rename it over the record. */
export class FileRecordStore implements RecordStore {
	constructor(readonly filePath: string) {}

	load(): DayRecord {
		if (!fs.existsSync(this.filePath)) return freshRecord();
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
		} catch (err) {
			console.warn('[server] Could not read', this.filePath, '- starting with empty stats:', err instanceof Error ? err.message : err);
			return freshRecord();
		}
		const parsed = dayRecordSchema.safeParse(raw);
		if (!parsed.success) {
			console.warn('[server] Ignoring invalid stats file', this.filePath, '-', parsed.error.issues[0]?.message);
			return freshRecord();
		}
		return parsed.data;
	}

	save(record: DayRecord): void {
		const tmpPath = `${this.filePath}.tmp`;
		try {
			fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2));
			fs.renameSync(tmpPath, this.filePath);
		} catch (err) {
			fs.rmSync(tmpPath, { force: true });
			throw new PersistenceError(`Could not save stats to ${this.filePath}`, { cause: err });
		}
	}
}

/** In-process store for tests and ephemeral runs. */
export class MemoryRecordStore implements RecordStore {
	private record: DayRecord;
	saves = 0;

	constructor(initial: Partial<DayRecord> = {}) {
		this.record = { ...freshRecord(), ...initial };
	}

	load(): DayRecord {
		return { ...this.record, stats: [...this.record.stats] };
	}

	save(record: DayRecord): void {
		this.record = { ...record, stats: [...record.stats] };
		this.saves++;
	}
}
