/**
 * SQLite input: a query's statements as a sequence of result sets.
 */

import type { ResultSet } from '@gridprint/core';
import Database from 'better-sqlite3';

export function openReadonlyDatabase(path: string): Database.Database {
	return new Database(path, { readonly: true, fileMustExist: true });
}

/**
 * Split SQL text on top-level semicolons. Quoted strings and identifiers are
 * kept whole, comments are dropped and so are empty statements.
 */
export function splitStatements(sql: string): string[] {
	const statements: string[] = [];
	let current = '';
	let quote: string | null = null;
	for (let i = 0; i < sql.length; i += 1) {
		const ch = sql.charAt(i);
		if (quote) {
			current += ch;
			if (ch === quote) quote = null;
			continue;
		}
		if (ch === '-' && sql.charAt(i + 1) === '-') {
			const eol = sql.indexOf('\n', i);
			i = eol === -1 ? sql.length : eol;
			current += '\n';
			continue;
		}
		if (ch === '/' && sql.charAt(i + 1) === '*') {
			const close = sql.indexOf('*/', i + 2);
			i = close === -1 ? sql.length : close + 1;
			current += ' ';
			continue;
		}
		if (ch === "'" || ch === '"' || ch === '`') {
			quote = ch;
			current += ch;
			continue;
		}
		if (ch === ';') {
			statements.push(current);
			current = '';
			continue;
		}
		current += ch;
	}
	statements.push(current);
	return statements.map((s) => s.trim()).filter((s) => s !== '');
}

type OpenStatement = {
	columns: string[];
	rows: IterableIterator<unknown[]>;
};

/**
 * Runs each statement in turn. Statements that return no rows are executed
 * and skipped; each one that does is one result set.
 */
export class SqliteResultSet implements ResultSet {
	private readonly statements: string[];
	private index = -1;
	private current: OpenStatement | null = null;
	private row: unknown[] | null = null;
	private failure: Error | null = null;

	constructor(
		private readonly db: Database.Database,
		sql: string,
	) {
		this.statements = splitStatements(sql);
		this.advanceResultSet();
	}

	private open(sql: string): OpenStatement | null {
		const stmt = this.db.prepare<unknown[], unknown[]>(sql);
		if (!stmt.reader) {
			stmt.run();
			return null;
		}
		stmt.raw(true);
		// INTEGER columns past 2^53 stay exact
		stmt.safeIntegers(true);
		return {
			columns: stmt.columns().map((c) => c.name),
			rows: stmt.iterate(),
		};
	}

	columns(): string[] {
		return this.current ? [...this.current.columns] : [];
	}

	advance(): boolean {
		if (!this.current || this.failure) return false;
		try {
			const next = this.current.rows.next();
			if (next.done) {
				this.row = null;
				return false;
			}
			this.row = next.value;
			return true;
		} catch (err) {
			this.failure = err instanceof Error ? err : new Error(String(err));
			this.row = null;
			return false;
		}
	}

	scan(dest: unknown[]): void {
		if (!this.row) {
			throw new Error('scan called without a current row');
		}
		for (let i = 0; i < dest.length; i += 1) {
			dest[i] = this.row[i] ?? null;
		}
	}

	err(): Error | null {
		return this.failure;
	}

	close(): void {
		this.current?.rows.return?.();
		this.current = null;
	}

	advanceResultSet(): boolean {
		this.close();
		while (this.index + 1 < this.statements.length) {
			this.index += 1;
			const sql = this.statements[this.index];
			if (sql === undefined) break;
			const opened = this.open(sql);
			if (opened) {
				this.current = opened;
				return true;
			}
		}
		return false;
	}
}
