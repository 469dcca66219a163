#!/usr/bin/env node

import { main } from './program.js';

main().catch((err) => {
	console.error('Fatal error:', err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
