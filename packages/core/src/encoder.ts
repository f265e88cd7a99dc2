import { EOL } from 'node:os';
import type { Writable } from 'node:stream';

import { GridError } from './errors';
import type { ResultSet } from './result-set';
import { writeChunk } from './writer';

export interface Encoder {
	/** Render the current result set. */
	encode(out: Writable): Promise<void>;
	/** Render the current result set and every one after it. */
	encodeAll(out: Writable): Promise<void>;
}

/** Footer text by row count; -1 is the fallback for counts with no entry. */
export type Summary = Map<number, (count: number) => string>;

export const DEFAULT_NEWLINE = EOL;

export function defaultSummary(): Summary {
	return new Map([
		[1, (count: number) => `(${count} row)`],
		[-1, (count: number) => `(${count} rows)`],
	]);
}

export function summaryText(summary: Summary | null, count: number): string | null {
	if (!summary) return null;
	const render = summary.get(count) ?? summary.get(-1);
	return render ? render(count) : null;
}

/** The result set and its columns, rejecting missing and column-less sets. */
export function openResultSet(resultSet: ResultSet | null | undefined): { resultSet: ResultSet; cols: string[] } {
	if (!resultSet) {
		throw new GridError('ResultSetIsNil');
	}
	const cols = resultSet.columns();
	if (cols.length === 0) {
		throw new GridError('ResultSetHasNoColumns');
	}
	return { resultSet, cols };
}

/**
 * Advance and scan the next row into a fresh array, or null at the end.
 * The cursor's error is checked before each scan and once it stops.
 */
export function scanRow(resultSet: ResultSet, width: number): unknown[] | null {
	if (!resultSet.advance()) {
		const err = resultSet.err();
		if (err) throw err;
		return null;
	}
	const err = resultSet.err();
	if (err) throw err;
	const row: unknown[] = new Array(width).fill(null);
	resultSet.scan(row);
	return row;
}

/**
 * encodeAll shared by every encoder: the current set, then each further set
 * after the separator, then the trailer (nothing when it is empty).
 */
export async function encodeEach(encoder: Encoder, resultSet: ResultSet | null | undefined, out: Writable, trailer: string, separator = trailer): Promise<void> {
	await encoder.encode(out);
	while (resultSet?.advanceResultSet()) {
		await writeChunk(out, separator);
		await encoder.encode(out);
	}
	if (trailer !== '') {
		await writeChunk(out, trailer);
	}
}

/** Encoder that only reports a configuration error. */
export class ErrorEncoder implements Encoder {
	constructor(readonly error: Error) {}

	encode(): Promise<void> {
		return Promise.reject(this.error);
	}

	encodeAll(): Promise<void> {
		return Promise.reject(this.error);
	}
}
