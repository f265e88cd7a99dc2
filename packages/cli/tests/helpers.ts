import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';

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

export function tempDir(): string {
	return mkdtempSync(join(tmpdir(), 'gridprint-cli-'));
}
