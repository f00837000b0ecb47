import path from 'node:path';
import { ConfigError } from './errors';
import { DEFAULT_GUESSES_FILE, DEFAULT_SOLUTIONS_FILE } from './words';

export interface Config {
	port: number;
	/** Local date of puzzle 0. */
	epoch: Date;
	puzzleName: string;
	solutionsFile: string;
	guessesFile: string;
	/** Empty keeps the record in memory only. */
	statsFile: string;
}

export const DEFAULT_EPOCH = '2026-10-01';

export function parseEpoch(value: string): Date {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
	if (!match) throw new ConfigError(`PUZZLE_EPOCH must be YYYY-MM-DD, got "${value}"`);
	const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
	const date = new Date(year, month - 1, day);
	if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
		throw new ConfigError(`PUZZLE_EPOCH is not a calendar date: "${value}"`);
	}
	return date;
}

function parsePort(value: string | undefined): number {
	if (value === undefined || value === '') return 3001;
	const port = Number(value);
	if (!Number.isInteger(port) || port < 0 || port > 65535) throw new ConfigError(`PORT is not a valid port: "${value}"`);
	return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return {
		port: parsePort(env.PORT),
		epoch: parseEpoch(env.PUZZLE_EPOCH || DEFAULT_EPOCH),
		puzzleName: env.PUZZLE_NAME || 'Wordle',
		solutionsFile: env.SOLUTIONS_FILE ? path.resolve(env.SOLUTIONS_FILE) : DEFAULT_SOLUTIONS_FILE,
		guessesFile: env.GUESSES_FILE ? path.resolve(env.GUESSES_FILE) : DEFAULT_GUESSES_FILE,
		statsFile: env.STATS_FILE === undefined ? path.resolve('.stats.json') : env.STATS_FILE && path.resolve(env.STATS_FILE),
	};
}
