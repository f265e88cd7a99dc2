#!/usr/bin/env tsx
/**
 * CLI entry point and command router.
 */

import { isBrokenPipe } from '@gridprint/core';
import { defineCommand, runCommand, showUsage } from 'citty';

import { crosstab } from './commands/crosstab';
import { formats } from './commands/formats';
import { print } from './commands/print';
import { styles } from './commands/styles';
import { error } from './logger';

const main = defineCommand({
	meta: { name: 'gridprint', version: '0.1.0', description: 'Render query results as psql-style tables' },
	subCommands: { print, crosstab, styles, formats },
});

async function run() {
	const rawArgs = process.argv.slice(2);

	if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
		await showUsage(main);
		return;
	}

	await runCommand(main, { rawArgs });
}

// a closed stdout (e.g. piped to head) is not an error
process.stdout.on('error', (err) => {
	if (!isBrokenPipe(err)) {
		error(`Error: ${err.message}`);
	}
	process.exit(isBrokenPipe(err) ? 0 : 1);
});

run().catch((err) => {
	error(`Error: ${err instanceof Error ? err.message : err}`);
	process.exit(1);
});
