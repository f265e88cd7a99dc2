/**
 * Aligned layout engine shared by the table and expanded encoders.
 *
 * A layout owns the state of one render: column offsets, the running maximum
 * width of every column and the rows scanned so far. Widths are measured at
 * the screen column a cell starts at, since tab stops depend on it.
 */

import stringWidth from 'string-width';

import { summaryText, type Summary } from './encoder';
import type { LineRule, LineStyle } from './line-style';
import type { Align, Value } from './value';
import type { BufferedWriter } from './writer';

export type LayoutSettings = {
	tab: number;
	newline: string;
	border: number;
	inline: boolean;
	lineStyle: LineStyle;
	skipHeader: boolean;
	summary: Summary | null;
	title: Value | null;
	empty: Value;
};

/** Glyphs for one kind of line, ready to print. */
export type RowStyle = {
	left: string;
	/** Right border followed by the newline. */
	right: string;
	middle: string;
	filler: string;
	wrapper: string;
	hasWrapping: boolean;
	leftWidth: number;
	rightWidth: number;
	middleWidth: number;
};

export function rowStyle(rule: LineRule, settings: Pick<LayoutSettings, 'border' | 'lineStyle' | 'newline'>): RowStyle {
	const { border, lineStyle, newline } = settings;
	const spacerWidth = stringWidth(lineStyle.row[1]);
	const spacer = rule[1].repeat(spacerWidth);
	// compact styles have no fill glyph
	const filler = rule[1] === '' ? ' ' : rule[1];

	let left = '';
	let right = '';
	if (border > 1) {
		left = rule[0];
		right = rule[3];
	}
	if (border > 0) {
		left += spacer;
	}
	const middle = border >= 1 ? rule[2] + spacer : ' ';

	return {
		left,
		right: right + newline,
		middle,
		filler,
		wrapper: lineStyle.wrap[1],
		hasWrapping: spacerWidth > 0,
		leftWidth: stringWidth(left),
		rightWidth: stringWidth(right),
		middleWidth: stringWidth(middle),
	};
}

export class TableLayout {
	readonly offsets: number[];
	readonly maxWidths: number[];
	scanCount = 0;

	constructor(
		readonly settings: LayoutSettings,
		readonly headers: Value[],
		readonly w: BufferedWriter,
		widths: number[] = [],
	) {
		this.offsets = headers.map(() => 0);
		this.maxWidths = headers.map((_, i) => widths[i] ?? 0);
	}

	style(rule: LineRule): RowStyle {
		return rowStyle(rule, this.settings);
	}

	get rowStyle(): RowStyle {
		return this.style(this.settings.lineStyle.row);
	}

	/** Grow column widths to fit this batch; widths never shrink. */
	calcWidth(rows: (Value | null)[][]): void {
		const { tab, border } = this.settings;
		const rs = this.rowStyle;
		let offset = rs.leftWidth;
		this.headers.forEach((header, i) => {
			if (i !== 0) {
				offset += rs.middleWidth;
			}
			this.offsets[i] = offset;

			let width = Math.max(this.maxWidths[i] ?? 0, header.maxWidth(offset, tab));
			for (const row of rows) {
				const cell = row[i] ?? this.settings.empty;
				width = Math.max(width, cell.maxWidth(offset, tab));
			}
			this.maxWidths[i] = width;

			// one extra column for the wrap indicator
			offset += width;
			if (rs.hasWrapping && border !== 0) {
				offset += 1;
			}
		});
	}

	tableWidth(): number {
		const rs = this.style(this.settings.lineStyle.mid);
		let width = rs.leftWidth + rs.rightWidth;
		this.maxWidths.forEach((w, i) => {
			width += w;
			if (rs.hasWrapping && this.settings.border >= 1) {
				width += 1;
			}
			if (i !== this.maxWidths.length - 1) {
				width += rs.middleWidth;
			}
		});
		return width;
	}

	/** Lines needed to print rows, counting everything around them. */
	tableHeight(rows: (Value | null)[][]): number {
		const { border, inline, title } = this.settings;
		let height = 0;
		if (title && title.width !== 0) {
			height += title.lineCount;
		}
		if (border >= 2 && !inline) {
			height += 1;
		}
		height += Math.max(1, ...this.headers.map((h) => h.lineCount));
		if (!inline) {
			height += 1;
		}
		for (const row of rows) {
			height += Math.max(1, ...row.map((cell) => (cell ?? this.settings.empty).lineCount));
		}
		if (border >= 2) {
			height += 1;
		}
		if (summaryText(this.settings.summary, this.scanCount) !== null) {
			height += 1;
		}
		return height;
	}

	/** A border line; widths default to the current column widths. */
	divider(rs: RowStyle, widths: number[] = this.maxWidths): void {
		const { w } = this;
		w.write(rs.left);
		widths.forEach((width, i) => {
			w.repeat(rs.filler, width);
			if (rs.hasWrapping && this.settings.border >= 1) {
				w.write(rs.filler);
			}
			if (i !== widths.length - 1) {
				w.write(rs.middle);
			}
		});
		w.write(rs.right);
	}

	/** Title, top border, column names and the divider under them. */
	header(): void {
		const { title, border, inline, lineStyle, newline } = this.settings;
		let rs = this.rowStyle;

		if (title && title.width !== 0) {
			const width = Math.trunc((this.tableWidth() - title.width) / 2) + title.width;
			this.writeAligned(title.buf, rs.filler, 'right', width - title.width);
			this.w.write(newline);
		}
		if (border >= 2 && !inline) {
			this.divider(this.style(lineStyle.top));
		}
		if (inline) {
			rs = this.style(lineStyle.top);
		}
		this.row(this.headers, rs);
		if (!inline) {
			this.divider(this.style(lineStyle.mid));
		}
	}

	/**
	 * Print one row, one physical line per pass, until every cell has run out
	 * of lines. A cell that continues on the next line gets the wrap glyph.
	 */
	row(vals: (Value | null)[], rs: RowStyle): void {
		const { border, tab } = this.settings;
		const { w } = this;
		for (let l = 0; ; l += 1) {
			w.write(rs.left);

			let remaining = false;
			vals.forEach((cell, i) => {
				const v = cell ?? this.settings.empty;
				const last = i === vals.length - 1;
				const maxWidth = this.maxWidths[i] ?? 0;

				if (l <= v.newlines.length) {
					let padding = maxWidth - v.lineWidth(l, this.offsets[i] ?? 0, tab);
					// the last cell is not padded out when nothing follows it
					if (border <= 1 && last && (!rs.hasWrapping || l >= v.newlines.length)) {
						padding = 0;
					}
					this.writeAligned(v.line(l), rs.filler, v.align, padding);
				} else if (border > 1 || !last) {
					w.repeat(rs.filler, maxWidth);
				}

				if (rs.hasWrapping) {
					w.write(l < v.newlines.length ? rs.wrapper : rs.filler);
				}
				remaining ||= l < v.newlines.length;

				// without a border the wrap column separates cells
				if (i !== this.maxWidths.length - 1 && border >= 1) {
					w.write(rs.middle);
				}
			});

			w.write(rs.right);
			if (!remaining) break;
		}
	}

	writeAligned(text: string, filler: string, align: Align, padding: number): void {
		let left = 0;
		let right = 0;
		switch (align) {
			case 'right':
				left = padding;
				break;
			case 'center':
				left = Math.trunc(padding / 2);
				right = Math.trunc(padding / 2) + (padding % 2);
				break;
			case 'left':
				right = padding;
				break;
		}
		this.w.repeat(filler, left);
		this.w.write(text);
		this.w.repeat(filler, right);
	}

	summarize(): void {
		const text = summaryText(this.settings.summary, this.scanCount);
		if (text !== null) {
			this.w.write(text);
			this.w.write(this.settings.newline);
		}
	}
}

/**
 * Two-column layout: column names on the left, one record at a time.
 */
export class ExpandedLayout extends TableLayout {
	readonly names: Value[];
	/** Records printed so far in this render. */
	records = 0;

	constructor(settings: LayoutSettings, headers: Value[], w: BufferedWriter) {
		super(settings, [], w);
		this.names = headers.map((h) => h.withAlign('left'));
		this.offsets.push(0, 0);
		this.maxWidths.push(0, 0);
	}

	recordHeader(n: number): string {
		return this.settings.border !== 0 ? `[ RECORD ${n} ]` : `* Record ${n}`;
	}

	override calcWidth(rows: (Value | null)[][]): void {
		const { tab, border } = this.settings;
		const rs = this.rowStyle;

		let offset = rs.leftWidth;
		this.offsets[0] = offset;
		let nameWidth = this.maxWidths[0] ?? 0;
		for (const name of this.names) {
			nameWidth = Math.max(nameWidth, name.maxWidth(offset, tab));
		}
		this.maxWidths[0] = nameWidth;

		offset += nameWidth;
		if (rs.hasWrapping && border !== 0) {
			offset += 1;
		}
		offset += rs.middleWidth;
		this.offsets[1] = offset;

		// wide enough for the last record header of the batch
		const header = this.recordHeader(this.records + rows.length);
		let valueWidth = Math.max(this.maxWidths[1] ?? 0, header.length - nameWidth - rs.middleWidth - 1);
		for (const row of rows) {
			for (const cell of row) {
				valueWidth = Math.max(valueWidth, (cell ?? this.settings.empty).maxWidth(offset, tab));
			}
		}
		this.maxWidths[1] = valueWidth;
	}

	override tableHeight(rows: (Value | null)[][]): number {
		const { border, title, skipHeader } = this.settings;
		let height = 0;
		if (title && title.width !== 0) {
			height += title.lineCount;
		}
		for (const row of rows) {
			if (!skipHeader) {
				height += 1;
			}
			for (const cell of row) {
				height += (cell ?? this.settings.empty).lineCount;
			}
		}
		if (border >= 2) {
			height += 1;
		}
		if (summaryText(this.settings.summary, this.scanCount) !== null) {
			height += 1;
		}
		return height;
	}

	/** The title, as is, on a line of its own. */
	title(): void {
		const { title, newline } = this.settings;
		if (title && title.width !== 0) {
			this.w.write(title.buf);
			this.w.write(newline);
		}
	}

	record(vals: (Value | null)[]): void {
		const { border, lineStyle, skipHeader } = this.settings;
		const rs = this.rowStyle;
		this.records += 1;

		if (!skipHeader) {
			let headerRS = rs;
			if (border !== 0) {
				headerRS = this.style(this.records === 1 ? lineStyle.top : lineStyle.mid);
			}
			const header = this.recordHeader(this.records);
			this.w.write(headerRS.left);
			this.w.write(header);
			this.w.repeat(headerRS.filler, (this.maxWidths[0] ?? 0) + (this.maxWidths[1] ?? 0) + headerRS.middleWidth * 2 - header.length - 1);
			this.w.write(headerRS.filler);
			this.w.write(headerRS.right);
		}

		vals.forEach((v, j) => {
			this.row([this.names[j] ?? null, v ? v.withAlign('left') : null], rs);
		});
	}
}
