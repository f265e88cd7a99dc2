import { Writable } from 'node:stream';

import type { MemoryResult } from '../src/result-set';

/** A stream that keeps everything written to it. */
export function sink(): { out: Writable; text: () => string } {
	const chunks: string[] = [];
	const out = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(chunk.toString('utf-8'));
			callback();
		},
	});
	return { out, text: () => chunks.join('') };
}

export const authors = (): MemoryResult => ({
	columns: ['author_id', 'name', 'z'],
	rows: [
		[14, 'a\tb\tc\td', 'x'],
		[15, 'aoeu\ntest\n', null],
	],
});

export const people = (): MemoryResult => ({
	columns: ['id', 'name'],
	rows: [
		[1, 'alice'],
		[2, 'bob'],
	],
});
