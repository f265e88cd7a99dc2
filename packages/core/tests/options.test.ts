import { EOL } from 'node:os';

import { describe, expect, test } from 'vitest';

import { ErrorEncoder } from '../src/encoder';
import { ExpandedEncoder } from '../src/expanded';
import { HTMLEncoder } from '../src/html';
import { JSONEncoder } from '../src/json';
import { encoderFromMap, formatterOptionsFromMap, type OptionsMap } from '../src/options';
import { MemoryResultSet } from '../src/result-set';
import { TableEncoder } from '../src/table';
import { UnalignedEncoder } from '../src/unaligned';
import { people, sink } from './helpers';

const size = () => ({ columns: 80, rows: 24 });

async function render(opts: OptionsMap): Promise<string[]> {
	const { out, text } = sink();
	await encoderFromMap(new MemoryResultSet(people()), opts, size).encode(out);
	return text().split(EOL);
}

describe('formatterOptionsFromMap', () => {
	test('reads time, locale and column name options', () => {
		expect(formatterOptionsFromMap({ time: 'RFC3339Nano', numericlocale: 'on', lower_column_names: 'true' })).toEqual({
			timeFormat: 'RFC3339Nano',
			numericLocale: 'en-US',
			lowerColumnNames: true,
		});
		expect(formatterOptionsFromMap({ numericlocale: 'on', locale: 'de-DE' }).numericLocale).toBe('de-DE');
		expect(formatterOptionsFromMap({})).toEqual({ timeFormat: 'RFC3339', numericLocale: undefined, lowerColumnNames: false });
	});
});

describe('encoderFromMap', () => {
	test('picks the encoder for the format', () => {
		const rs = new MemoryResultSet(people());
		expect(encoderFromMap(rs, {})).toBeInstanceOf(TableEncoder);
		expect(encoderFromMap(rs, { format: 'aligned', expanded: 'on' })).toBeInstanceOf(ExpandedEncoder);
		expect(encoderFromMap(rs, { format: 'unaligned' })).toBeInstanceOf(UnalignedEncoder);
		expect(encoderFromMap(rs, { format: 'csv' })).toBeInstanceOf(UnalignedEncoder);
		expect(encoderFromMap(rs, { format: 'json' })).toBeInstanceOf(JSONEncoder);
		expect(encoderFromMap(rs, { format: 'html' })).toBeInstanceOf(HTMLEncoder);
	});

	test('defers configuration errors to encode time', async () => {
		const rs = new MemoryResultSet(people());
		const cases: [OptionsMap, string][] = [
			[{ format: 'latex' }, 'InvalidFormat'],
			[{ linestyle: 'fancy' }, 'InvalidLineStyle'],
			[{ format: 'unaligned', fieldsep: '||' }, 'InvalidFieldSeparator'],
			[{ format: 'csv', csv_fieldsep: '' }, 'InvalidCSVFieldSeparator'],
		];
		for (const [opts, code] of cases) {
			const encoder = encoderFromMap(rs, opts);
			expect(encoder).toBeInstanceOf(ErrorEncoder);
			const { out, text } = sink();
			await expect(encoder.encodeAll(out)).rejects.toMatchObject({ code });
			expect(text()).toBe('');
		}
	});

	test('applies border and line style', async () => {
		const lines = await render({ border: '2', linestyle: 'unicode', unicode_border_linestyle: 'double' });
		expect(lines[0]).toBe('╔════╦═══════╗');
		expect(lines[2]).toBe('╠════╬═══════╣');
		expect(lines[5]).toBe('╚════╩═══════╝');

		const single = await render({ border: '2', linestyle: 'unicode' });
		expect(single[0]).toBe('┌────┬───────┐');
		expect(single[1]).toBe('│ id │ name  │');
	});

	test('centres column names', async () => {
		const { out, text } = sink();
		const rs = new MemoryResultSet({ columns: ['id', 'name'], rows: [[1, 'alice!!']] });
		await encoderFromMap(rs, { border: '2' }, size).encode(out);
		const lines = text().split(EOL);
		expect(lines[0]).toBe('+----+---------+');
		expect(lines[1]).toBe('| id |  name   |');
		expect(lines[3]).toBe('|  1 | alice!! |');
	});

	test('tuples_only prints rows without header or footer', async () => {
		expect(await render({ tuples_only: 'on' })).toEqual(['  1 | alice ', '  2 | bob ', '']);
	});

	test('footer off drops the row count', async () => {
		const lines = await render({ footer: 'off', title: 'People', null: '-' });
		expect(lines).toEqual(['   People', ' id | name ', '----+-------', '  1 | alice ', '  2 | bob ', '']);
	});

	test('expanded auto switches on narrow terminals', async () => {
		const { out, text } = sink();
		await encoderFromMap(new MemoryResultSet(people()), { expanded: 'auto' }, () => ({ columns: 10, rows: 24 })).encode(out);
		expect(text().split(EOL)).toEqual(['-[ RECORD 1 ]-', ' id   | 1 ', ' name | alice ', '-[ RECORD 2 ]-', ' id   | 2 ', ' name | bob ', '(2 rows)', '']);

		expect((await render({ expanded: 'auto' }))[0]).toBe(' id | name ');
		expect((await render({ expanded: 'auto', columns: '10' }))[0]).toBe('-[ RECORD 1 ]-');
	});

	test('configures delimited output', async () => {
		const { out, text } = sink();
		await encoderFromMap(new MemoryResultSet(people()), { format: 'unaligned', fieldsep: ',', recordsep: '\n' }).encodeAll(out);
		expect(text()).toBe('id,name\n1,alice\n2,bob\n');

		const csv = sink();
		await encoderFromMap(new MemoryResultSet(people()), { format: 'csv', csv_fieldsep: ';', recordsep: '\n', tuples_only: 'on' }).encode(csv.out);
		expect(csv.text()).toBe('1;alice\n2;bob\n');

		const zero = sink();
		await encoderFromMap(new MemoryResultSet(people()), { format: 'unaligned', fieldsep_zero: 'on', recordsep_zero: 'on' }).encode(zero.out);
		expect(zero.text()).toBe('id\0name\x001\0alice\x002\0bob\0');
	});

	test('json output keeps plain numbers', async () => {
		const { out, text } = sink();
		const rs = new MemoryResultSet({ columns: ['N'], rows: [[1234]] });
		await encoderFromMap(rs, { format: 'json', numericlocale: 'on', lower_column_names: 'on' }).encode(out);
		expect(text()).toBe('[{"N":1234}]');
	});
});
