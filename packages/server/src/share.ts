import type { SubmittedRow } from './game';
import { MAX_GUESSES, type LetterState } from './letters';

const BLOCKS: Record<Exclude<LetterState, 'unknown'>, string> = {
	absent: '⬛',
	present: '🟨',
	correct: '🟩',
};

function block(state: LetterState): string {
	if (state === 'unknown') throw new RangeError('Cannot share an unevaluated cell');
	return BLOCKS[state];
}

/** Share text for a finished puzzle, e.g. "Wordle 12 3/6" followed by one block row per guess. */
export function shareText(name: string, index: number, rows: readonly SubmittedRow[], won: boolean): string {
	const trials = won ? String(rows.length) : 'x';
	const lines = [`${name} ${index} ${trials}/${MAX_GUESSES}`, ''];
	for (const row of rows) lines.push(row.states.map(block).join(''));
	return lines.join('\n');
}
