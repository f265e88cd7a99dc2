import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import type { Writable } from 'node:stream';

export function isBrokenPipe(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'EPIPE';
}

type Exit = { code: number | null; signal: NodeJS.Signals | null; error?: Error };

/**
 * A pager process fed through its stdin. Its own output is copied to the
 * sink the table would otherwise have been written to.
 */
export class Pager {
	private stdinError: Error | null = null;

	private constructor(
		private readonly child: ChildProcessWithoutNullStreams,
		private readonly exited: Promise<Exit>,
	) {
		child.stdin.on('error', (err) => {
			this.stdinError = err;
		});
	}

	static start(command: string, sink: Writable): Pager {
		const child = spawn('sh', ['-c', command]);
		child.stdout.pipe(sink, { end: false });
		child.stderr.pipe(sink, { end: false });
		// a failed spawn settles it too
		const exited = new Promise<Exit>((resolve) => {
			child.on('error', (error) => resolve({ code: null, signal: null, error }));
			child.on('close', (code, signal) => resolve({ code, signal }));
		});
		return new Pager(child, exited);
	}

	get input(): Writable {
		return this.child.stdin;
	}

	/**
	 * Close the pager's input and wait for it to exit. A pager that quit
	 * before reading everything is not an error; one that exits non-zero is.
	 */
	async close(): Promise<void> {
		this.child.stdin.end();
		const { code, signal, error } = await this.exited;
		if (error) {
			throw error;
		}
		if (signal !== null && signal !== 'SIGPIPE') {
			throw new Error(`pager terminated by ${signal}`);
		}
		if (code !== null && code !== 0) {
			throw new Error(`pager exited with status ${code}`);
		}
		if (this.stdinError && !isBrokenPipe(this.stdinError)) {
			throw this.stdinError;
		}
	}
}
