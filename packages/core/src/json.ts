import type { Writable } from 'node:stream';

import { DEFAULT_NEWLINE, type Encoder, encodeEach, openResultSet, scanRow } from './encoder';
import { EscapeFormatter, type Formatter } from './formatter';
import type { ResultSet } from './result-set';
import { Value } from './value';
import { BufferedWriter } from './writer';

export type JSONOptions = {
	newline?: string;
	/** Must escape for JSON; defaults to a JSON escaping formatter. */
	formatter?: Formatter;
	/** Raw JSON text written for NULL. */
	empty?: string;
};

/**
 * JSON encoder: each result set becomes an array of objects keyed by column
 * name. Raw values (numbers, booleans, nested JSON) are written unquoted.
 */
export class JSONEncoder implements Encoder {
	private readonly newline: string;
	private readonly formatter: Formatter;
	private readonly empty: Value;

	constructor(
		private readonly resultSet: ResultSet | null | undefined,
		options: JSONOptions = {},
	) {
		this.newline = options.newline ?? DEFAULT_NEWLINE;
		this.formatter = options.formatter ?? new EscapeFormatter({ isJSON: true });
		this.empty = new Value({ buf: options.empty ?? 'null', raw: true });
	}

	async encode(out: Writable): Promise<void> {
		const { resultSet, cols } = openResultSet(this.resultSet);
		const keys = cols.map((col) => `${JSON.stringify(col)}:`);
		const w = new BufferedWriter(out);

		w.write('[');
		for (let count = 0; ; count += 1) {
			const row = scanRow(resultSet, cols.length);
			if (!row) break;
			if (count !== 0) {
				w.write(',');
			}
			const vals = this.formatter.format(row);
			w.write('{');
			keys.forEach((key, i) => {
				const v = vals[i] ?? this.empty;
				w.write(key);
				w.write(v.raw ? v.buf : `"${v.buf}"`);
				if (i !== keys.length - 1) {
					w.write(',');
				}
			});
			w.write('}');
			await w.maybeFlush();
		}
		w.write(']');
		await w.flush();
	}

	encodeAll(out: Writable): Promise<void> {
		return encodeEach(this, this.resultSet, out, this.newline, `,${this.newline}`);
	}
}
