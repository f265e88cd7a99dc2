import { describe, expect, test } from 'vitest';

import { BufferedWriter } from '../src/writer';
import { sink } from './helpers';

describe('BufferedWriter', () => {
	test('holds text until a full chunk is pending', async () => {
		const { out, text } = sink();
		const w = new BufferedWriter(out, 8);
		w.write('abc');
		w.repeat('-', 3);
		await w.maybeFlush();
		expect(text()).toBe('');
		expect(w.pending).toBe(6);

		w.write('de');
		await w.maybeFlush();
		expect(text()).toBe('abc---de');
		expect(w.pending).toBe(0);
	});

	test('redirect flushes to the old stream first', async () => {
		const first = sink();
		const second = sink();
		const w = new BufferedWriter(first.out);
		w.write('one');
		await w.redirect(second.out);
		w.write('two');
		await w.flush();
		expect(first.text()).toBe('one');
		expect(second.text()).toBe('two');
	});

	test('surfaces stream errors', async () => {
		const { out } = sink();
		out.destroy();
		const w = new BufferedWriter(out);
		w.write('late');
		await expect(w.flush()).rejects.toThrow();
	});
});
