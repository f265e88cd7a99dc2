/**
 * print - Render a CSV file or a SQLite query.
 */

import type { Writable } from 'node:stream';

import { encoderFromMap, type OptionsMap, type ResultSet } from '@gridprint/core';
import { defineCommand } from 'citty';

import { buildOptions, inputArgs, openInput, outputArgs } from '../args';

/** Render every result set with the encoder the options select. */
export async function render(resultSet: ResultSet, opts: OptionsMap, out: Writable = process.stdout): Promise<void> {
	await encoderFromMap(resultSet, opts).encodeAll(out);
}

export const print = defineCommand({
	meta: { name: 'print', description: 'Render a CSV file or SQLite query result' },
	args: {
		...inputArgs,
		...outputArgs,
	},
	async run({ args }) {
		const opts = buildOptions(args);
		const input = openInput(args.input, args.query);
		try {
			await render(input.resultSet, opts);
		} finally {
			input.close();
		}
	},
});
