import type { ResultSet } from './result-set';
import { type TableOptions, TableEncoder } from './table';

/**
 * Expanded encoder: every record printed as name/value pairs under a
 * "[ RECORD n ]" header. No footer unless a summary is given.
 */
export class ExpandedEncoder extends TableEncoder {
	protected override readonly expanded = true;

	constructor(resultSet: ResultSet | null | undefined, options: TableOptions = {}) {
		super(resultSet, options, null);
	}
}
