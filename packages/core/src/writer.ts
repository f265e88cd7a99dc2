import type { Writable } from 'node:stream';

const DEFAULT_CHUNK = 2048;

/** Write one chunk and wait for the stream to accept it. */
export function writeChunk(out: Writable, data: string): Promise<void> {
	return new Promise((resolve, reject) => {
		out.write(data, (err) => {
			if (err) {
				reject(err);
				return;
			}
			resolve();
		});
	});
}

/**
 * Accumulates rendered text and hands it to the stream in chunks. Layout
 * code writes synchronously; the render loop awaits flush() between rows.
 */
export class BufferedWriter {
	private chunks: string[] = [];
	private size = 0;

	constructor(
		private out: Writable,
		private readonly chunkSize = DEFAULT_CHUNK,
	) {}

	write(text: string): void {
		if (text === '') return;
		this.chunks.push(text);
		this.size += text.length;
	}

	repeat(text: string, count: number): void {
		if (count > 0) {
			this.write(text.repeat(count));
		}
	}

	get pending(): number {
		return this.size;
	}

	/** Flush when a full chunk is pending. */
	async maybeFlush(): Promise<void> {
		if (this.size >= this.chunkSize) {
			await this.flush();
		}
	}

	async flush(): Promise<void> {
		if (this.size === 0) return;
		const data = this.chunks.join('');
		this.chunks = [];
		this.size = 0;
		await writeChunk(this.out, data);
	}

	/** Flush pending text to the current stream, then write to out. */
	async redirect(out: Writable): Promise<void> {
		await this.flush();
		this.out = out;
	}
}
