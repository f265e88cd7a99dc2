import type { Writable } from 'node:stream';

import { DEFAULT_NEWLINE, type Encoder, encodeEach, openResultSet, scanRow } from './encoder';
import { EscapeFormatter, type Formatter } from './formatter';
import type { ResultSet } from './result-set';
import { Value } from './value';
import { BufferedWriter } from './writer';

export type HTMLOptions = {
	newline?: string;
	formatter?: Formatter;
	title?: string;
	/** Text written for NULL. */
	empty?: string;
	/** Extra attributes for the table element, e.g. 'class="data"'. */
	attributes?: string;
};

const HTML_ESCAPES: Record<string, string> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&#34;',
	"'": '&#39;',
};

export function escapeHTML(text: string): string {
	return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export class HTMLEncoder implements Encoder {
	private readonly newline: string;
	private readonly formatter: Formatter;
	private readonly title: string;
	private readonly empty: Value;
	private readonly attributes: string;

	constructor(
		private readonly resultSet: ResultSet | null | undefined,
		options: HTMLOptions = {},
	) {
		this.newline = options.newline ?? DEFAULT_NEWLINE;
		this.formatter = options.formatter ?? new EscapeFormatter();
		this.title = options.title ?? '';
		this.empty = options.empty !== undefined ? (this.formatter.format([options.empty])[0] ?? new Value()) : new Value();
		this.attributes = options.attributes ?? '';
	}

	async encode(out: Writable): Promise<void> {
		const { resultSet, cols } = openResultSet(this.resultSet);
		const headers = this.formatter.header(cols);
		const w = new BufferedWriter(out);
		const line = (indent: number, text: string) => {
			w.write(' '.repeat(indent));
			w.write(text);
			w.write(this.newline);
		};

		line(0, this.attributes !== '' ? `<table ${this.attributes}>` : '<table>');
		line(2, `<caption>${escapeHTML(this.title)}</caption>`);
		line(2, '<thead>');
		line(4, '<tr>');
		for (const h of headers) {
			line(6, `<th align="${h.align}">${escapeHTML(h.buf)}</th>`);
		}
		line(4, '</tr>');
		line(2, '</thead>');
		line(2, '<tbody>');
		for (;;) {
			const row = scanRow(resultSet, cols.length);
			if (!row) break;
			line(4, '<tr>');
			for (const cell of this.formatter.format(row)) {
				const v = cell ?? this.empty;
				line(6, `<td align="${v.align}">${escapeHTML(v.buf)}</td>`);
			}
			line(4, '</tr>');
			await w.maybeFlush();
		}
		line(2, '</tbody>');
		line(0, '</table>');
		await w.flush();
	}

	encodeAll(out: Writable): Promise<void> {
		return encodeEach(this, this.resultSet, out, '', this.newline);
	}
}
