import type { MemoryResult } from '@gridprint/core';
import Papa from 'papaparse';

/**
 * Parse CSV text into a result: the first record names the columns, numbers
 * booleans and ISO dates are typed, empty fields are NULL.
 */
export function parseCsv(text: string, delimiter = ','): MemoryResult {
	const result = Papa.parse<unknown[]>(text, {
		delimiter,
		dynamicTyping: true,
		skipEmptyLines: true,
	});

	if (result.errors.length > 0) {
		throw new Error(`CSV parse errors: ${result.errors.map((e) => e.message).join('; ')}`);
	}

	const [header, ...rows] = result.data;
	if (!header) {
		return { columns: [], rows: [] };
	}
	return {
		columns: header.map((name) => String(name ?? '')),
		rows: rows.map((row) => row.map((value) => (value === '' ? null : value))),
	};
}
