/**
 * Shared command arguments and their mapping onto the options map.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';

import { MemoryResultSet, type OptionsMap, type ResultSet } from '@gridprint/core';
import { psetToMap, resolveConfig } from '@gridprint/core/config';

import { parseCsv } from './csv';
import { openReadonlyDatabase, SqliteResultSet } from './db';

export const inputArgs = {
	input: { type: 'positional' as const, description: 'CSV file or SQLite database', required: true },
	query: { type: 'string' as const, description: 'SQL to run against a SQLite database' },
};

export const outputArgs = {
	format: { type: 'string' as const, description: 'aligned (default), unaligned, csv, json, html' },
	border: { type: 'string' as const, description: 'Border style: 0, 1 or 2' },
	linestyle: { type: 'string' as const, description: 'ascii, old-ascii or unicode' },
	title: { type: 'string' as const, description: 'Table title' },
	null: { type: 'string' as const, description: 'Text printed for NULL' },
	expanded: { type: 'string' as const, description: 'Expanded records: on, off or auto' },
	'tuples-only': { type: 'boolean' as const, description: 'Print rows only, without header and footer' },
	pset: { type: 'string' as const, description: 'Extra options as key=value pairs, comma separated' },
	config: { type: 'string' as const, description: 'Config file (default: GRIDPRINT_CONFIG or nearest .gridprint.toml)' },
};

export type OutputFlags = {
	format?: string | undefined;
	border?: string | undefined;
	linestyle?: string | undefined;
	title?: string | undefined;
	null?: string | undefined;
	expanded?: string | undefined;
	'tuples-only'?: boolean | undefined;
	pset?: string | undefined;
	config?: string | undefined;
};

/** "a=1,b=2" as [key, value] pairs; a bare key means "on". */
export function parsePairs(text: string): [string, string][] {
	return text
		.split(',')
		.map((pair) => pair.trim())
		.filter((pair) => pair !== '')
		.map((pair): [string, string] => {
			const eq = pair.indexOf('=');
			return eq === -1 ? [pair, 'on'] : [pair.slice(0, eq).trim(), pair.slice(eq + 1)];
		});
}

/**
 * Options for encoderFromMap. Later sources win: config file [pset], then the
 * dedicated flags, then --pset.
 */
export function buildOptions(flags: OutputFlags, cwd?: string): OptionsMap {
	const opts = psetToMap(resolveConfig(flags.config, cwd));
	const direct: [string, string | undefined][] = [
		['format', flags.format],
		['border', flags.border],
		['linestyle', flags.linestyle],
		['title', flags.title],
		['null', flags.null],
		['expanded', flags.expanded],
	];
	for (const [key, value] of direct) {
		if (value !== undefined) {
			opts[key] = value;
		}
	}
	if (flags['tuples-only']) {
		opts['tuples_only'] = 'on';
	}
	if (flags.pset) {
		for (const [key, value] of parsePairs(flags.pset)) {
			opts[key] = value;
		}
	}
	return opts;
}

export type Input = {
	resultSet: ResultSet;
	close(): void;
};

/** A .csv file, or a SQLite database read with query. */
export function openInput(path: string, query?: string): Input {
	if (extname(path).toLowerCase() === '.csv') {
		const resultSet = new MemoryResultSet(parseCsv(readFileSync(path, 'utf-8')));
		return { resultSet, close: () => resultSet.close() };
	}
	if (!query) {
		throw new Error('--query is required for a database input');
	}
	const db = openReadonlyDatabase(path);
	let resultSet: SqliteResultSet;
	try {
		resultSet = new SqliteResultSet(db, query);
	} catch (err) {
		db.close();
		throw err;
	}
	return {
		resultSet,
		close: () => {
			resultSet.close();
			db.close();
		},
	};
}
