/**
 * Forward-only cursor over one or more result sets, the shape every
 * encoder reads from.
 */
export interface ResultSet {
	columns(): string[];
	/** Move to the next row; false at the end of the set or on error. */
	advance(): boolean;
	/** Copy the current row into dest. Only valid after advance() returned true. */
	scan(dest: unknown[]): void;
	/** Last error hit while advancing, if any. */
	err(): Error | null;
	close(): void;
	/** Move to the next result set; false when there are no more. */
	advanceResultSet(): boolean;
}

export type MemoryResult = {
	columns: string[];
	rows: unknown[][];
};

/**
 * In-memory ResultSet over a list of result sets.
 */
export class MemoryResultSet implements ResultSet {
	private readonly sets: MemoryResult[];
	private set = 0;
	private row = -1;
	private closed = false;
	private failure: Error | null = null;

	constructor(sets: MemoryResult[] | MemoryResult) {
		this.sets = Array.isArray(sets) ? sets : [sets];
	}

	/** Cursor positioned before the first row of the first set. */
	reset(): void {
		this.set = 0;
		this.row = -1;
		this.closed = false;
		this.failure = null;
	}

	/** Make the next advance() fail with err. */
	fail(err: Error): void {
		this.failure = err;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	columns(): string[] {
		return [...(this.sets[this.set]?.columns ?? [])];
	}

	advance(): boolean {
		if (this.failure) {
			return false;
		}
		const rows = this.sets[this.set]?.rows ?? [];
		if (this.row + 1 >= rows.length) {
			this.row = rows.length;
			return false;
		}
		this.row += 1;
		return true;
	}

	scan(dest: unknown[]): void {
		const current = this.sets[this.set]?.rows[this.row];
		if (!current) {
			throw new Error('scan called without a current row');
		}
		for (let i = 0; i < dest.length; i += 1) {
			dest[i] = current[i];
		}
	}

	err(): Error | null {
		return this.failure;
	}

	close(): void {
		this.closed = true;
	}

	advanceResultSet(): boolean {
		if (this.set + 1 >= this.sets.length) {
			return false;
		}
		this.set += 1;
		this.row = -1;
		return true;
	}
}
