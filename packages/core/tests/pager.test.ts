import { describe, expect, test } from 'vitest';

import { Pager } from '../src/pager';
import { MemoryResultSet } from '../src/result-set';
import { TableEncoder } from '../src/table';
import { people, sink } from './helpers';

describe('Pager', () => {
	test('copies the pager output to the sink', async () => {
		const { out, text } = sink();
		const pager = Pager.start('cat', out);
		pager.input.write('hello\n');
		await pager.close();
		expect(text()).toBe('hello\n');
	});

	test('fails when the pager exits non-zero', async () => {
		const { out } = sink();
		const pager = Pager.start('cat >/dev/null; exit 3', out);
		pager.input.write('hello\n');
		await expect(pager.close()).rejects.toThrow('pager exited with status 3');
	});
});

describe('TableEncoder with a pager', () => {
	test('pages the table through the command', async () => {
		const { out, text } = sink();
		await new TableEncoder(new MemoryResultSet(people()), { newline: '\n', pager: 'head -n 2', minPagerHeight: -1 }).encode(out);
		expect(text()).toBe(' id | name \n----+-------\n');
	});

	test('stops cleanly when the pager quits early', async () => {
		const rows = Array.from({ length: 20000 }, (_, i) => [i, 'x']);
		const { out, text } = sink();
		await new TableEncoder(new MemoryResultSet({ columns: ['id', 'name'], rows }), {
			newline: '\n',
			pager: 'head -n 1',
			minPagerHeight: -1,
		}).encode(out);
		expect(text()).toBe(' id    | name \n');
	});

	test('reports a pager command that cannot run', async () => {
		const { out } = sink();
		const encoder = new TableEncoder(new MemoryResultSet(people()), { newline: '\n', pager: 'no-such-pager-cmd', minPagerHeight: -1 });
		await expect(encoder.encode(out)).rejects.toThrow('pager exited with status 127');
	});

	test('pages only past the height limit', async () => {
		const { out, text } = sink();
		await new TableEncoder(new MemoryResultSet(people()), { newline: '\n', pager: 'head -n 1', minPagerHeight: 100 }).encode(out);
		expect(text()).toBe(' id | name \n----+-------\n  1 | alice \n  2 | bob \n(2 rows)\n');
	});
});
