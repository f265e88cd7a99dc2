/**
 * Crosstab (pivot) view: turns (vertical, horizontal, data) rows into a grid
 * with one row per vertical key and one column per horizontal key.
 */

import { GridError } from './errors';
import { EscapeFormatter, type Formatter } from './formatter';
import type { ResultSet } from './result-set';

/** Column references: names (case-insensitive) or 1-based column numbers. */
export type CrosstabParams = {
	vertical?: string;
	horizontal?: string;
	data?: string;
	sort?: string;
};

export type CrosstabOptions = {
	/** Formats the key columns; raw escaping by default. */
	formatter?: Formatter;
};

type HorizontalKey = { key: string; sort: number };

const INTEGER_RE = /^[+-]?\d+$/;

/** Index of ref in cols, or -1. Numeric refs are 1-based. */
export function indexOf(cols: string[], ref: string): number {
	const s = ref.trim();
	if (INTEGER_RE.test(s)) {
		const i = Number.parseInt(s, 10) - 1;
		return i >= 0 && i < cols.length ? i : -1;
	}
	const wanted = s.toLowerCase();
	return cols.findIndex((col) => col.trim().toLowerCase() === wanted);
}

function findIndex(cols: string[], ref: string, fallback: number): number {
	if (ref === '') {
		return fallback < cols.length ? fallback : -1;
	}
	return indexOf(cols, ref);
}

function toParams(params: CrosstabParams | string[]): CrosstabParams {
	if (!Array.isArray(params)) {
		return params;
	}
	if (params.length > 4) {
		throw new GridError('InvalidColumnParams');
	}
	const [vertical, horizontal, data, sort] = params;
	return { vertical, horizontal, data, sort };
}

export class CrosstabView implements ResultSet {
	private readonly verticalName: string;
	private readonly vkeys: string[] = [];
	private hkeys: HorizontalKey[] = [];
	private readonly pivot = new Map<string, Map<string, unknown>>();
	private pos = -1;

	constructor(
		private readonly resultSet: ResultSet,
		params: CrosstabParams,
		private readonly formatter: Formatter,
	) {
		const v = params.vertical ?? '';
		const h = params.horizontal ?? '';
		const d = params.data ?? '';
		const s = params.sort ?? '';

		if (v !== '' && h !== '' && v === h) {
			throw new GridError('CrosstabVerticalAndHorizontalColumnsMustNotBeSame');
		}

		const cols = resultSet.columns();
		if (cols.length < 3) {
			throw new GridError('CrosstabResultMustHaveAtLeast3Columns');
		}
		if (cols.length > 3 && d === '') {
			throw new GridError('CrosstabDataColumnMustBeSpecified');
		}

		const vindex = findIndex(cols, v, 0);
		if (vindex === -1) {
			throw new GridError('CrosstabVerticalColumnNotInResult');
		}
		const hindex = findIndex(cols, h, 1);
		if (hindex === -1) {
			throw new GridError('CrosstabHorizontalColumnNotInResult');
		}
		if (vindex === hindex) {
			throw new GridError('CrosstabVerticalAndHorizontalColumnsMustNotBeSame');
		}

		// with three columns the data column is the one left over
		let fallback = 2;
		for (let i = 0; i < 3; i += 1) {
			if (i !== vindex && i !== hindex) {
				fallback = i;
			}
		}
		const dindex = findIndex(cols, d, fallback);
		if (dindex === -1) {
			throw new GridError('CrosstabDataColumnNotInResult');
		}

		let sindex = -1;
		if (s !== '') {
			sindex = indexOf(cols, s);
			if (sindex === -1) {
				throw new GridError('CrosstabHorizontalSortColumnNotInResult');
			}
		}

		this.verticalName = cols[vindex] ?? '';
		this.build(cols.length, vindex, hindex, dindex, sindex);
	}

	private build(width: number, vindex: number, hindex: number, dindex: number, sindex: number): void {
		const { resultSet } = this;
		const row: unknown[] = new Array(width).fill(null);
		while (resultSet.advance()) {
			resultSet.scan(row);
			const keys = [row[vindex], row[hindex]];
			if (sindex !== -1) {
				keys.push(row[sindex]);
			}
			const [vkey, hkey, sortValue] = this.formatter.format(keys);
			let sort = 0;
			if (sortValue) {
				const text = sortValue.toString().trim();
				if (!INTEGER_RE.test(text)) {
					throw new GridError('CrosstabHorizontalSortColumnIsNotANumber');
				}
				sort = Number.parseInt(text, 10);
			}
			this.add(row[dindex], vkey?.toString() ?? '', hkey?.toString() ?? '', sort);
		}
		const err = resultSet.err();
		if (err) {
			throw err;
		}
		if (sindex !== -1) {
			this.hkeys = [...this.hkeys].sort((a, b) => a.sort - b.sort);
		}
	}

	private add(data: unknown, vkey: string, hkey: string, sort: number): void {
		if (!this.vkeys.includes(vkey)) {
			this.vkeys.push(vkey);
		}
		if (!this.hkeys.some((k) => k.key === hkey)) {
			this.hkeys.push({ key: hkey, sort });
		}
		let cells = this.pivot.get(vkey);
		if (!cells) {
			cells = new Map();
			this.pivot.set(vkey, cells);
		}
		if (cells.has(hkey)) {
			throw new GridError('CrosstabDuplicateVerticalAndHorizontalValue');
		}
		cells.set(hkey, data);
	}

	columns(): string[] {
		return [this.verticalName, ...this.hkeys.map((k) => k.key)];
	}

	advance(): boolean {
		this.pos += 1;
		return this.pos < this.vkeys.length;
	}

	scan(dest: unknown[]): void {
		const vkey = this.vkeys[this.pos];
		if (vkey === undefined) {
			throw new Error('scan called without a current row');
		}
		if (dest.length > 0) {
			dest[0] = vkey;
		}
		const cells = this.pivot.get(vkey);
		for (let i = 0; i < this.hkeys.length && i < dest.length - 1; i += 1) {
			const hkey = this.hkeys[i];
			dest[i + 1] = hkey && cells?.has(hkey.key) ? cells.get(hkey.key) : null;
		}
	}

	err(): Error | null {
		return null;
	}

	close(): void {
		this.resultSet.close();
	}

	/** A view covers a single result set. */
	advanceResultSet(): boolean {
		return false;
	}
}

/**
 * Build a crosstab view over the current result set. params is either an
 * object or up to four positional references: vertical, horizontal, data,
 * sort. The source is read to the end before this returns.
 */
export function newCrosstabView(resultSet: ResultSet, params: CrosstabParams | string[] = {}, options: CrosstabOptions = {}): CrosstabView {
	const formatter = options.formatter ?? new EscapeFormatter({ isRaw: true });
	return new CrosstabView(resultSet, toParams(params), formatter);
}
