/**
 * Cell formatting: turns scanned values into measured, escaped Values.
 */

import stringWidth from 'string-width';

import { escapeText } from './escape';
import { type Align, Value } from './value';

export interface Formatter {
	/** Format column names. */
	header(names: string[]): Value[];
	/** Format one row of scanned values; null entries are SQL NULL. */
	format(values: unknown[]): (Value | null)[];
}

export type TimeFormat = 'RFC3339' | 'RFC3339Nano' | ((date: Date) => string);

export type EscapeFormatterOptions = {
	/** Header text for blank column names; %d becomes the 1-based column number. */
	mask?: string;
	headerAlign?: Align;
	timeFormat?: TimeFormat;
	/** Locale for grouped numbers (e.g. "en-US"); plain digits when unset. */
	numericLocale?: string | undefined;
	/** Serializer for nested values; its output is embedded as-is. */
	encoder?: ((value: unknown) => string) | undefined;
	/** Indent passed to JSON.stringify for nested values. */
	jsonIndent?: string;
	isJSON?: boolean;
	isRaw?: boolean;
	sep?: string;
	quote?: string;
	invalid?: string | undefined;
	/** Lower-case column names written entirely in capitals. */
	lowerColumnNames?: boolean;
};

/** A nullable wrapper, as returned by drivers that distinguish NULL from zero values. */
export type Nullable<T = unknown> = { valid: boolean; value: T };

export type Cell =
	| { kind: 'null' }
	| { kind: 'boolean'; value: boolean }
	| { kind: 'integer'; value: number | bigint }
	| { kind: 'float'; value: number }
	| { kind: 'text'; value: string }
	| { kind: 'bytes'; value: Uint8Array }
	| { kind: 'time'; value: Date }
	| { kind: 'structured'; value: unknown };

function isNullable(value: object): value is Nullable {
	return 'valid' in value && 'value' in value && typeof value.valid === 'boolean' && Object.keys(value).length === 2;
}

/**
 * Classify a scanned value. Nullable wrappers are unwrapped first, so
 * { valid: false } is NULL and { valid: true, value: 3 } is an integer.
 */
export function classifyCell(value: unknown): Cell {
	if (value === null || value === undefined) {
		return { kind: 'null' };
	}
	switch (typeof value) {
		case 'boolean':
			return { kind: 'boolean', value };
		case 'bigint':
			return { kind: 'integer', value };
		case 'number':
			return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
		case 'string':
			return { kind: 'text', value };
		case 'object':
			break;
		default:
			return { kind: 'text', value: String(value) };
	}
	if (value instanceof Uint8Array) {
		return { kind: 'bytes', value };
	}
	if (value instanceof Date) {
		return { kind: 'time', value };
	}
	if (isNullable(value)) {
		return value.valid ? classifyCell(value.value) : { kind: 'null' };
	}
	return { kind: 'structured', value };
}

function pad(n: number, width: number): string {
	return String(n).padStart(width, '0');
}

/** RFC 3339 in UTC; nano adds the fractional seconds (trailing zeros trimmed). */
export function formatTime(date: Date, format: TimeFormat): string {
	if (typeof format === 'function') {
		return format(date);
	}
	const base = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}T${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`;
	if (format === 'RFC3339Nano') {
		const ms = date.getUTCMilliseconds();
		if (ms !== 0) {
			return `${base}.${pad(ms, 3).replace(/0+$/, '')}Z`;
		}
	}
	return `${base}Z`;
}

function isAllCaps(name: string): boolean {
	return name === name.toUpperCase() && name !== name.toLowerCase();
}

/**
 * Escaping formatter for the values drivers return: booleans, numbers,
 * bigints, strings, bytes, dates, nullable wrappers and nested structures
 * (serialized as JSON).
 */
export class EscapeFormatter implements Formatter {
	readonly mask: string;
	readonly headerAlign: Align;
	readonly timeFormat: TimeFormat;
	readonly encoder: ((value: unknown) => string) | undefined;
	readonly jsonIndent: string;
	readonly isJSON: boolean;
	readonly isRaw: boolean;
	readonly sep: string;
	readonly quote: string;
	readonly invalid: string | undefined;
	readonly invalidWidth: number;
	readonly lowerColumnNames: boolean;

	private readonly integerFormat: Intl.NumberFormat | undefined;
	private readonly floatFormat: Intl.NumberFormat | undefined;

	constructor(options: EscapeFormatterOptions = {}) {
		this.mask = options.mask ?? '%d';
		this.headerAlign = options.headerAlign ?? 'left';
		this.timeFormat = options.timeFormat ?? 'RFC3339Nano';
		this.encoder = options.encoder;
		this.jsonIndent = options.jsonIndent ?? '  ';
		this.isJSON = options.isJSON ?? false;
		this.isRaw = options.isRaw ?? false;
		this.sep = options.sep ?? '';
		this.quote = options.quote ?? '';
		this.invalid = options.invalid;
		this.invalidWidth = options.invalid === undefined ? 0 : stringWidth(options.invalid);
		this.lowerColumnNames = options.lowerColumnNames ?? false;

		if (options.numericLocale !== undefined) {
			this.integerFormat = new Intl.NumberFormat(options.numericLocale, { maximumFractionDigits: 0 });
			this.floatFormat = new Intl.NumberFormat(options.numericLocale, { minimumFractionDigits: 1, maximumFractionDigits: 20 });
		}
	}

	/** Copy of this formatter with some options replaced. */
	with(options: EscapeFormatterOptions): EscapeFormatter {
		return new EscapeFormatter({ ...this.options(), ...options });
	}

	options(): EscapeFormatterOptions {
		return {
			mask: this.mask,
			headerAlign: this.headerAlign,
			timeFormat: this.timeFormat,
			numericLocale: this.integerFormat?.resolvedOptions().locale,
			encoder: this.encoder,
			jsonIndent: this.jsonIndent,
			isJSON: this.isJSON,
			isRaw: this.isRaw,
			sep: this.sep,
			quote: this.quote,
			invalid: this.invalid,
			lowerColumnNames: this.lowerColumnNames,
		};
	}

	header(names: string[]): Value[] {
		return names.map((name, i) => {
			let s = name.trim();
			if (s === '') {
				s = this.mask.replaceAll('%d', String(i + 1));
			} else if (this.lowerColumnNames && isAllCaps(s)) {
				s = s.toLowerCase();
			}
			const v = this.escape(s);
			v.align = this.headerAlign;
			return v;
		});
	}

	format(values: unknown[]): (Value | null)[] {
		return values.map((value) => this.formatCell(classifyCell(value)));
	}

	private formatCell(cell: Cell): Value | null {
		switch (cell.kind) {
			case 'null':
				return null;
			case 'boolean':
				return Value.plain(String(cell.value), 'left', true);
			case 'integer':
				return Value.plain(this.integerFormat ? this.integerFormat.format(cell.value) : String(cell.value), 'right', true);
			case 'float':
				return Value.plain(this.floatFormat ? this.floatFormat.format(cell.value) : String(cell.value), 'right', true);
			case 'text':
			case 'bytes':
				return this.escape(cell.value);
			case 'time':
				return Value.plain(formatTime(cell.value, this.timeFormat), 'left', false);
			case 'structured':
				return this.formatStructured(cell.value);
		}
	}

	private formatStructured(value: unknown): Value {
		if (this.encoder) {
			return new Value({ buf: this.encoder(value), raw: true });
		}
		const text = (JSON.stringify(value, null, this.jsonIndent) ?? 'null').trim();
		if (this.isJSON) {
			return new Value({ buf: text, raw: true });
		}
		const v = escapeText(text, { invalid: this.invalid, invalidWidth: this.invalidWidth, isRaw: this.isRaw, sep: this.sep, quote: this.quote });
		v.raw = true;
		return v;
	}

	private escape(src: string | Uint8Array): Value {
		return escapeText(src, {
			invalid: this.invalid,
			invalidWidth: this.invalidWidth,
			isJSON: this.isJSON,
			isRaw: this.isRaw,
			sep: this.sep,
			quote: this.quote,
		});
	}
}
