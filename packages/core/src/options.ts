/**
 * psql-style named options ("\pset") to encoders.
 */

import { type Encoder, ErrorEncoder } from './encoder';
import { GridError } from './errors';
import { ExpandedEncoder } from './expanded';
import { EscapeFormatter, type EscapeFormatterOptions } from './formatter';
import { HTMLEncoder } from './html';
import { JSONEncoder } from './json';
import { ASCII, type LineStyle, OLD_ASCII, UNICODE, UNICODE_DOUBLE } from './line-style';
import type { ResultSet } from './result-set';
import { TableEncoder, type TableOptions } from './table';
import { UnalignedEncoder } from './unaligned';

export type OptionsMap = Record<string, string | undefined>;

export type TerminalSize = { columns: number; rows: number };

export const FORMATS = ['aligned', 'unaligned', 'csv', 'json', 'html'] as const;

/** Size of the terminal stdout is attached to, 80x24 when it is not a terminal. */
export function terminalSize(): TerminalSize {
	return {
		columns: process.stdout.columns || 80,
		rows: process.stdout.rows || 24,
	};
}

function isOn(value: string | undefined): boolean {
	return value === 'on' || value === 'true';
}

function positive(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value)) return undefined;
	const n = Number.parseInt(value, 10);
	return n > 0 ? n : undefined;
}

/** Formatter options shared by every format: time layout, locale, column name case. */
export function formatterOptionsFromMap(opts: OptionsMap): EscapeFormatterOptions {
	const numericLocale = isOn(opts['numericlocale']) ? opts['locale'] || 'en-US' : undefined;
	return {
		timeFormat: opts['time'] === 'RFC3339Nano' ? 'RFC3339Nano' : 'RFC3339',
		numericLocale,
		lowerColumnNames: isOn(opts['lower_column_names']),
	};
}

/** The one-character separator under key, or the fallback when unset. */
function separator(opts: OptionsMap, key: string, fallback: string, error: 'InvalidFieldSeparator' | 'InvalidCSVFieldSeparator'): string {
	const value = opts[key];
	if (value === undefined) return fallback;
	if ([...value].length !== 1) {
		throw new GridError(error);
	}
	return value;
}

function lineStyleFromMap(opts: OptionsMap): LineStyle | undefined {
	switch (opts['linestyle']) {
		case 'ascii':
			return ASCII;
		case 'old-ascii':
			return OLD_ASCII;
		case 'unicode':
			return opts['unicode_border_linestyle'] === 'double' ? UNICODE_DOUBLE : UNICODE;
		case undefined:
			return undefined;
		default:
			throw new GridError('InvalidLineStyle');
	}
}

function alignedFromMap(resultSet: ResultSet | null | undefined, opts: OptionsMap, size: () => TerminalSize): Encoder {
	// psql centres column names
	const formatter = new EscapeFormatter({ headerAlign: 'center', ...formatterOptionsFromMap(opts) });
	const options: TableOptions = { formatter };

	const border = opts['border'];
	if (border !== undefined) {
		options.border = Number.parseInt(border, 10) || 0;
	}
	let footer = opts['footer'];
	if (opts['tuples_only'] === 'on') {
		options.skipHeader = true;
		footer = 'off';
	}
	if (opts['title'] !== undefined) {
		options.title = opts['title'];
	}
	if (opts['null'] !== undefined) {
		options.empty = opts['null'];
	}
	if (footer === 'off') {
		options.summary = new Map();
	}
	const lineStyle = lineStyleFromMap(opts);
	if (lineStyle) {
		options.lineStyle = lineStyle;
	}

	const pager = opts['pager'];
	const pagerCmd = opts['pager_cmd'];
	if (pager && pagerCmd) {
		options.pager = pagerCmd;
		if (pager === 'on') {
			const { columns, rows } = size();
			options.minPagerWidth = (positive(opts['columns']) ?? columns) + 1;
			options.minPagerHeight = (positive(opts['pager_min_lines']) ?? rows) + 1;
		} else if (pager === 'always') {
			options.minPagerWidth = -1;
			options.minPagerHeight = -1;
		}
	}

	switch (opts['expanded']) {
		case 'on':
			return new ExpandedEncoder(resultSet, options);
		case 'auto':
			options.minExpandWidth = (positive(opts['columns']) ?? size().columns) + 1;
			break;
	}
	return new TableEncoder(resultSet, options);
}

function unalignedFromMap(resultSet: ResultSet | null | undefined, opts: OptionsMap, csv: boolean): Encoder {
	let sep = csv ? separator(opts, 'csv_fieldsep', ',', 'InvalidCSVFieldSeparator') : separator(opts, 'fieldsep', '|', 'InvalidFieldSeparator');
	if (!csv && opts['fieldsep_zero'] === 'on') {
		sep = '\0';
	}
	const quote = csv ? '"' : '';
	let newline = opts['recordsep'];
	if (opts['recordsep_zero'] === 'on') {
		newline = '\0';
	}
	return new UnalignedEncoder(resultSet, {
		sep,
		quote,
		newline,
		formatter: new EscapeFormatter({ ...formatterOptionsFromMap(opts), isRaw: true, sep, quote }),
		skipHeader: opts['tuples_only'] === 'on',
		title: opts['title'],
		empty: opts['null'],
	});
}

/**
 * Encoder for a psql-style options map. Never throws: an invalid option comes
 * back as an encoder whose encode() rejects with the error.
 */
export function encoderFromMap(resultSet: ResultSet | null | undefined, opts: OptionsMap, size: () => TerminalSize = terminalSize): Encoder {
	try {
		const format = opts['format'] ?? 'aligned';
		switch (format) {
			case 'aligned':
				return alignedFromMap(resultSet, opts, size);
			case 'unaligned':
			case 'csv':
				return unalignedFromMap(resultSet, opts, format === 'csv');
			case 'json':
				// grouped digits are not JSON numbers
				return new JSONEncoder(resultSet, { formatter: new EscapeFormatter({ ...formatterOptionsFromMap(opts), numericLocale: undefined, isJSON: true }) });
			case 'html':
				return new HTMLEncoder(resultSet, {
					formatter: new EscapeFormatter(formatterOptionsFromMap(opts)),
					title: opts['title'],
					empty: opts['null'],
					attributes: opts['tableattr'],
				});
			default:
				throw new GridError('InvalidFormat');
		}
	} catch (err) {
		if (err instanceof Error) {
			return new ErrorEncoder(err);
		}
		throw err;
	}
}
