import { describe, expect, test } from 'vitest';

import { ExpandedEncoder } from '../src/expanded';
import { MemoryResultSet } from '../src/result-set';
import type { TableOptions } from '../src/table';
import { sink } from './helpers';

const rows = () =>
	new MemoryResultSet({
		columns: ['id', 'name'],
		rows: [
			[1, 'alice wonderland'],
			[2, 'bob'],
		],
	});

async function render(options: TableOptions = {}): Promise<string> {
	const { out, text } = sink();
	await new ExpandedEncoder(rows(), { newline: '\n', ...options }).encode(out);
	return text();
}

describe('ExpandedEncoder', () => {
	test('prints one record per row', async () => {
		expect(await render()).toBe(
			[
				'-[ RECORD 1 ]------------',
				' id   | 1 ',
				' name | alice wonderland ',
				'-[ RECORD 2 ]------------',
				' id   | 2 ',
				' name | bob ',
				'',
			].join('\n'),
		);
	});

	test('border 2 boxes the records', async () => {
		expect(await render({ border: 2 })).toBe(
			[
				'+-[ RECORD 1 ]------------+',
				'| id   | 1                |',
				'| name | alice wonderland |',
				'+-[ RECORD 2 ]------------+',
				'| id   | 2                |',
				'| name | bob              |',
				'+------+------------------+',
				'',
			].join('\n'),
		);
	});

	test('border 0 uses plain record headers', async () => {
		expect(await render({ border: 0 })).toBe(['* Record 1            ', 'id   1 ', 'name alice wonderland ', '* Record 2            ', 'id   2 ', 'name bob ', ''].join('\n'));
	});

	test('prints the title once and a footer only when asked', async () => {
		const text = await render({ title: 'People', summary: new Map([[-1, (n: number) => `(${n} rows)`]]) });
		const lines = text.split('\n');
		expect(lines[0]).toBe('People');
		expect(lines[1]).toBe('-[ RECORD 1 ]------------');
		expect(lines.at(-2)).toBe('(2 rows)');
	});

	test('prints nothing for an empty result', async () => {
		const { out, text } = sink();
		await new ExpandedEncoder(new MemoryResultSet({ columns: ['id'], rows: [] }), { newline: '\n', border: 2 }).encode(out);
		expect(text()).toBe('');
	});
});
