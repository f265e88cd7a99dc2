import { describe, expect, test } from 'vitest';

import { EscapeFormatter } from '../src/formatter';
import { MemoryResultSet } from '../src/result-set';
import { UnalignedEncoder, type UnalignedOptions } from '../src/unaligned';
import { authors, sink } from './helpers';

async function render(options: UnalignedOptions = {}): Promise<string> {
	const { out, text } = sink();
	await new UnalignedEncoder(new MemoryResultSet(authors()), { newline: '\n', ...options }).encodeAll(out);
	return text();
}

describe('UnalignedEncoder', () => {
	test('separates fields with a pipe', async () => {
		expect(await render()).toBe('author_id|name|z\n14|a\tb\tc\td|x\n15|aoeu\ntest\n|\n');
	});

	test('quotes CSV fields that need it', async () => {
		expect(await render({ sep: ',', quote: '"' })).toBe('author_id,name,z\n14,"a\tb\tc\td",x\n15,"aoeu\ntest\n",\n');
	});

	test('doubles quotes inside CSV fields', async () => {
		const { out, text } = sink();
		const rs = new MemoryResultSet({ columns: ['q'], rows: [['say "hi"'], ['a,b']] });
		await new UnalignedEncoder(rs, { sep: ',', quote: '"', newline: '\n' }).encode(out);
		expect(text()).toBe('q\n"say ""hi"""\n"a,b"\n');
	});

	test('skips the header and prints the null placeholder', async () => {
		expect(await render({ skipHeader: true, empty: '<nil>' })).toBe('14|a\tb\tc\td|x\n15|aoeu\ntest\n|<nil>\n');
	});

	test('prints the title above the header', async () => {
		expect((await render({ title: 'Authors' })).split('\n').slice(0, 2)).toEqual(['Authors', 'author_id|name|z']);
	});

	test('uses a custom record separator', async () => {
		const rs = new MemoryResultSet({ columns: ['a', 'b'], rows: [[1, 2]] });
		const { out, text } = sink();
		await new UnalignedEncoder(rs, { sep: '\0', newline: '\0' }).encode(out);
		expect(text()).toBe('a\0b\x001\x002\0');
	});

	test('separates result sets with an empty record', async () => {
		const rs = new MemoryResultSet([
			{ columns: ['a'], rows: [[1]] },
			{ columns: ['b'], rows: [[2]] },
		]);
		const { out, text } = sink();
		await new UnalignedEncoder(rs, { newline: '\n' }).encodeAll(out);
		expect(text()).toBe('a\n1\n\nb\n2\n');
	});

	test('formats numbers with the formatter given', async () => {
		const rs = new MemoryResultSet({ columns: ['n'], rows: [[1234567]] });
		const { out, text } = sink();
		const formatter = new EscapeFormatter({ isRaw: true, numericLocale: 'en-US' });
		await new UnalignedEncoder(rs, { newline: '\n', formatter }).encode(out);
		expect(text()).toBe('n\n1,234,567\n');
	});
});
