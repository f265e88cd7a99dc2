import type { Writable } from 'node:stream';

import { DEFAULT_NEWLINE, type Encoder, encodeEach, openResultSet, scanRow } from './encoder';
import { EscapeFormatter, type Formatter } from './formatter';
import type { ResultSet } from './result-set';
import type { Value } from './value';
import { BufferedWriter } from './writer';

export type UnalignedOptions = {
	/** Field separator; '\0' for fieldsep_zero. */
	sep?: string;
	/** Quote character; '' writes values as they are. */
	quote?: string;
	/** Record separator. */
	newline?: string;
	formatter?: Formatter;
	skipHeader?: boolean;
	title?: string;
	/** Text written for NULL. */
	empty?: string;
};

/**
 * Delimited output: unaligned ("a|b") and CSV. Values the escaper flagged as
 * needing quotes are wrapped in the quote character when there is one.
 */
export class UnalignedEncoder implements Encoder {
	private readonly sep: string;
	private readonly quote: string;
	private readonly newline: string;
	private readonly formatter: Formatter;
	private readonly skipHeader: boolean;
	private readonly title: string;
	private readonly empty: string;

	constructor(
		private readonly resultSet: ResultSet | null | undefined,
		options: UnalignedOptions = {},
	) {
		this.sep = options.sep ?? '|';
		this.quote = options.quote ?? '';
		this.newline = options.newline ?? DEFAULT_NEWLINE;
		this.formatter = options.formatter ?? new EscapeFormatter({ isRaw: true, sep: this.sep, quote: this.quote });
		this.skipHeader = options.skipHeader ?? false;
		this.title = options.title ?? '';
		this.empty = options.empty ?? '';
	}

	async encode(out: Writable): Promise<void> {
		const { resultSet, cols } = openResultSet(this.resultSet);
		const w = new BufferedWriter(out);

		if (!this.skipHeader) {
			if (this.title !== '') {
				w.write(this.title);
				w.write(this.newline);
			}
			this.record(w, this.formatter.header(cols));
		}
		for (;;) {
			const row = scanRow(resultSet, cols.length);
			if (!row) break;
			this.record(w, this.formatter.format(row));
			await w.maybeFlush();
		}
		await w.flush();
	}

	/** Result sets separated by a blank record; every record already ends in the separator. */
	encodeAll(out: Writable): Promise<void> {
		return encodeEach(this, this.resultSet, out, '', this.newline);
	}

	private record(w: BufferedWriter, vals: (Value | null)[]): void {
		vals.forEach((v, i) => {
			if (i !== 0) {
				w.write(this.sep);
			}
			w.write(this.field(v));
		});
		w.write(this.newline);
	}

	private field(v: Value | null): string {
		if (!v) {
			return this.empty;
		}
		if (v.quoted && this.quote !== '') {
			return `${this.quote}${v.buf}${this.quote}`;
		}
		return v.buf;
	}
}
