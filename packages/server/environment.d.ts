declare global {
	namespace NodeJS {
		interface ProcessEnv {
			PORT?: string;
			PUZZLE_EPOCH?: string;
			PUZZLE_NAME?: string;
			SOLUTIONS_FILE?: string;
			GUESSES_FILE?: string;
			STATS_FILE?: string;
		}
	}
}

export type {};
