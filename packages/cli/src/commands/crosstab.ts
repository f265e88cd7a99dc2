/**
 * crosstab - Render a result pivoted on two of its columns.
 */

import { newCrosstabView } from '@gridprint/core';
import { defineCommand } from 'citty';

import { buildOptions, inputArgs, openInput, outputArgs } from '../args';
import { render } from './print';

export const crosstab = defineCommand({
	meta: { name: 'crosstab', description: 'Pivot a three-column result into a grid' },
	args: {
		...inputArgs,
		...outputArgs,
		vertical: { type: 'string', description: 'Column whose values become rows (default: first)' },
		horizontal: { type: 'string', description: 'Column whose values become columns (default: second)' },
		data: { type: 'string', description: 'Column shown in the cells (default: the remaining one)' },
		sort: { type: 'string', description: 'Integer column ordering the horizontal headers' },
	},
	async run({ args }) {
		const opts = buildOptions(args);
		const input = openInput(args.input, args.query);
		try {
			const view = newCrosstabView(input.resultSet, {
				vertical: args.vertical,
				horizontal: args.horizontal,
				data: args.data,
				sort: args.sort,
			});
			await render(view, opts);
		} finally {
			input.close();
		}
	},
});
