/**
 * styles - Show every line style on a small sample.
 */

import type { Writable } from 'node:stream';

import { LINE_STYLES, MemoryResultSet, TableEncoder } from '@gridprint/core';
import { defineCommand } from 'citty';

const SAMPLE = {
	columns: ['id', 'name', 'note'],
	rows: [
		[1, 'plain', null],
		[2, 'two\nlines', 'wrapped'],
	],
};

export async function renderStyles(out: Writable, border = 2): Promise<void> {
	for (const [name, lineStyle] of Object.entries(LINE_STYLES)) {
		const encoder = new TableEncoder(new MemoryResultSet(SAMPLE), {
			border,
			lineStyle,
			title: name,
			summary: new Map(),
			newline: '\n',
		});
		await encoder.encodeAll(out);
	}
}

export const styles = defineCommand({
	meta: { name: 'styles', description: 'Show the available line styles' },
	args: {
		border: { type: 'string', description: 'Border style: 0, 1 or 2', default: '2' },
	},
	async run({ args }) {
		await renderStyles(process.stdout, Number.parseInt(args.border, 10) || 0);
	},
});
