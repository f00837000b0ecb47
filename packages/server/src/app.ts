import express, {
	type Application,
	type NextFunction,
	type Request,
	type Response,
} from 'express';
import { z } from 'zod';
import { isGameError } from './errors';
import type { DailySession } from './session';

const letterBody = z.object({ letter: z.string() });

/** 4xx status that express.json() attaches to the bodies it rejects, if any. */
function clientErrorStatus(err: unknown): number | null {
	if (typeof err !== 'object' || err === null || !('status' in err)) return null;
	const { status } = err;
	return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/** HTTP surface over a single player's session. */
export function createApp(session: DailySession, clock: () => Date = () => new Date()): Application {
	const app: Application = express();
	app.use(express.json());

	app.get('/api/puzzle', (_req: Request, res: Response) => {
		res.json(session.snapshot(clock()));
	});

	app.post('/api/puzzle/letter', (req: Request, res: Response) => {
		const parsed = letterBody.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json({ error: 'Body must be { "letter": string }', code: 'INVALID_REQUEST' });
			return;
		}
		session.inputLetter(parsed.data.letter);
		res.json(session.snapshot(clock()));
	});

	app.post('/api/puzzle/backspace', (_req: Request, res: Response) => {
		session.backspace();
		res.json(session.snapshot(clock()));
	});

	// Validation errors fall through to the error handler and leave the grid as it was
	app.post('/api/puzzle/submit', (_req: Request, res: Response) => {
		const outcome = session.submit();
		res.json({ outcome, puzzle: session.snapshot(clock()) });
	});

	app.get('/api/puzzle/share', (_req: Request, res: Response) => {
		res.json({ text: session.shareText() });
	});

	app.get('/api/stats', (_req: Request, res: Response) => {
		res.json(session.stats());
	});

	app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
		if (isGameError(err)) {
			res.status(err.status).json({ error: err.message, code: err.code });
			return;
		}
		const status = clientErrorStatus(err);
		if (status !== null) {
			const message = status === 413 ? 'Request body too large' : status === 400 ? 'Malformed JSON body' : 'Unreadable request body';
			res.status(status).json({ error: message, code: 'INVALID_REQUEST' });
			return;
		}
		console.error('[server] Unhandled error:', err);
		res.status(500).json({ error: 'Internal error', code: 'INTERNAL' });
	});

	return app;
}
