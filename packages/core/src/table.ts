import type { Writable } from 'node:stream';

import { DEFAULT_NEWLINE, defaultSummary, type Encoder, encodeEach, openResultSet, scanRow, type Summary } from './encoder';
import { EscapeFormatter, type Formatter } from './formatter';
import { ExpandedLayout, type LayoutSettings, TableLayout } from './layout';
import { ASCII, type LineStyle, validateLineStyle } from './line-style';
import { isBrokenPipe, Pager } from './pager';
import type { ResultSet } from './result-set';
import { Value } from './value';
import { BufferedWriter } from './writer';

export type TableOptions = {
	/** Rows measured per batch before printing them; 0 reads everything first. */
	count?: number;
	/** Tab stop width. */
	tab?: number;
	newline?: string;
	/** 0 = no borders, 1 = inner borders, 2 = inner and outer borders. */
	border?: number;
	/** Draw the column names inside the top border. */
	inline?: boolean;
	lineStyle?: LineStyle;
	formatter?: Formatter;
	skipHeader?: boolean;
	/** Footer by row count. null or an empty map prints no footer. */
	summary?: Summary | null;
	title?: string;
	/** Text printed for NULL. */
	empty?: string;
	/** Minimum column widths, by column index. */
	widths?: number[];
	/** Switch to the expanded layout once the table is at least this wide; 0 never switches. */
	minExpandWidth?: number;
	/** Shell command to page output through. */
	pager?: string;
	/** Page once the table is at least this wide; 0 disables, -1 always pages. */
	minPagerWidth?: number;
	/** Page once the table is at least this tall; 0 disables, -1 always pages. */
	minPagerHeight?: number;
};

type TableSettings = LayoutSettings & {
	count: number;
	formatter: Formatter;
	widths: number[];
	minExpandWidth: number;
	pager: string;
	minPagerWidth: number;
	minPagerHeight: number;
};

function resolveSettings(options: TableOptions, defaultSummaryMap: Summary | null): TableSettings {
	const formatter = options.formatter ?? new EscapeFormatter();
	const title = options.title ? (formatter.header([options.title])[0] ?? null) : null;
	const empty = options.empty !== undefined ? (formatter.format([options.empty])[0] ?? new Value()) : new Value();
	return {
		count: options.count ?? 0,
		tab: options.tab ?? 8,
		newline: options.newline ?? DEFAULT_NEWLINE,
		border: options.border ?? 1,
		inline: options.inline ?? false,
		lineStyle: validateLineStyle(options.lineStyle ?? ASCII),
		formatter,
		skipHeader: options.skipHeader ?? false,
		summary: options.summary === undefined ? defaultSummaryMap : options.summary,
		title,
		empty,
		widths: options.widths ?? [],
		minExpandWidth: options.minExpandWidth ?? 0,
		pager: options.pager ?? '',
		minPagerWidth: options.minPagerWidth ?? 0,
		minPagerHeight: options.minPagerHeight ?? 0,
	};
}

/**
 * Aligned table encoder. Rows are read in batches; each batch widens the
 * columns as needed before it is printed, so later batches never narrow a
 * column an earlier one printed.
 */
export class TableEncoder implements Encoder {
	protected readonly settings: TableSettings;
	/** Start in the expanded layout instead of switching to it. */
	protected readonly expanded: boolean = false;

	constructor(
		protected readonly resultSet: ResultSet | null | undefined,
		options: TableOptions = {},
		defaultSummaryMap: Summary | null = defaultSummary(),
	) {
		this.settings = resolveSettings(options, defaultSummaryMap);
	}

	async encode(out: Writable): Promise<void> {
		const { resultSet, cols } = openResultSet(this.resultSet);

		const { settings } = this;
		const w = new BufferedWriter(out);
		const headers = settings.formatter.header(cols);
		const table = new TableLayout(settings, headers, w, settings.widths);
		let expanded = this.expanded ? new ExpandedLayout(settings, headers, w) : null;
		let wroteHeader = settings.skipHeader;
		let pager: Pager | null = null;
		let tableOpen = false;

		try {
			for (;;) {
				const rows = this.nextBatch(resultSet, cols.length, table);
				if (rows.length === 0) break;

				const printedWidths = [...table.maxWidths];
				table.calcWidth(rows);
				if (!expanded && settings.minExpandWidth !== 0 && table.tableWidth() >= settings.minExpandWidth) {
					expanded = new ExpandedLayout(settings, headers, w);
					// close the box an earlier batch drew, at the widths it was drawn with
					if (tableOpen && settings.border >= 2) {
						table.divider(table.style(settings.lineStyle.end), printedWidths);
					}
				}
				const layout = expanded ?? table;
				if (expanded) {
					expanded.calcWidth(rows);
					expanded.scanCount = table.scanCount;
				}

				if (!pager && this.needsPager(layout, rows)) {
					pager = Pager.start(settings.pager, out);
					await w.redirect(pager.input);
				}

				if (expanded) {
					if (!wroteHeader) {
						wroteHeader = true;
						expanded.title();
					}
					for (const row of rows) {
						expanded.record(row);
						await w.maybeFlush();
					}
					continue;
				}

				if (!wroteHeader) {
					wroteHeader = true;
					table.header();
				}
				tableOpen = true;
				const rs = table.rowStyle;
				for (const row of rows) {
					table.row(row, rs);
					await w.maybeFlush();
				}
			}

			if (expanded) {
				if (settings.border >= 2 && table.scanCount !== 0) {
					expanded.divider(expanded.style(settings.lineStyle.end));
				}
			} else {
				// an empty result still gets its header
				if (!wroteHeader) {
					table.calcWidth([]);
					table.header();
				}
				if (settings.border >= 2 && (!settings.skipHeader || table.scanCount !== 0)) {
					table.divider(table.style(settings.lineStyle.end));
				}
			}
			table.summarize();
			await w.flush();
		} catch (err) {
			if (pager && isBrokenPipe(err)) {
				await pager.close();
				return;
			}
			pager?.input.destroy();
			throw err;
		}
		await pager?.close();
	}

	encodeAll(out: Writable): Promise<void> {
		return encodeEach(this, this.resultSet, out, this.settings.newline);
	}

	private nextBatch(resultSet: ResultSet, width: number, table: TableLayout): (Value | null)[][] {
		const rows: (Value | null)[][] = [];
		const { count, formatter } = this.settings;
		while (count === 0 || rows.length < count) {
			const row = scanRow(resultSet, width);
			if (!row) break;
			table.scanCount += 1;
			rows.push(formatter.format(row));
		}
		return rows;
	}

	private needsPager(layout: TableLayout, rows: (Value | null)[][]): boolean {
		const { pager, minPagerHeight, minPagerWidth } = this.settings;
		if (pager === '') return false;
		return (minPagerHeight !== 0 && layout.tableHeight(rows) >= minPagerHeight) || (minPagerWidth !== 0 && layout.tableWidth() >= minPagerWidth);
	}
}
