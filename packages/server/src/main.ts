import path from 'node:path';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { FileRecordStore, MemoryRecordStore } from './progress';
import { DailySession } from './session';
import { loadWordList } from './words';

// .env lives in the server package root. From dist/ we go up 1 level.
const envPath = path.join(__dirname, '..', '.env');
const loaded = dotenv.config({ path: envPath });
if (loaded.error) {
	console.warn('[server] .env not found at', envPath, '- using process env. Copy example.env to .env to configure.');
}

const config = loadConfig();
const words = loadWordList(config.solutionsFile, config.guessesFile);
const store = config.statsFile ? new FileRecordStore(config.statsFile) : new MemoryRecordStore();
if (!config.statsFile) console.warn('[server] STATS_FILE is empty - results will not be saved');

const session = DailySession.start({
	words,
	store,
	epoch: config.epoch,
	puzzleName: config.puzzleName,
});

const app = createApp(session);
app.listen(config.port, () => {
	console.log(`[server] ${config.puzzleName} ${session.dayIndex} is listening on port ${config.port}`);
});
