import { describe, expect, test } from 'vitest';

import { formatList } from '../../src/commands/formats';
import { renderStyles } from '../../src/commands/styles';
import { sink } from '../helpers';

describe('renderStyles', () => {
	test('renders the sample in every line style', async () => {
		const { out, text } = sink();
		await renderStyles(out);
		const lines = text().split('\n');

		expect(lines.slice(0, 10)).toEqual([
			'         ascii',
			'+----+-------+---------+',
			'| id | name  | note    |',
			'+----+-------+---------+',
			'|  1 | plain |         |',
			'|  2 | two  +| wrapped |',
			'|    | lines |         |',
			'+----+-------+---------+',
			'',
			'       old-ascii',
		]);
		expect(lines[18]).toBe('        unicode');
		expect(lines[23]).toBe('│  2 │ two  ↵│ wrapped │');
		expect(lines[27]).toBe('     unicode-double');
	});
});

describe('formatList', () => {
	test('lists every format', () => {
		expect(formatList().slice(0, 6)).toEqual(['FORMATS', '  aligned', '  unaligned', '  csv', '  json', '  html']);
	});
});
