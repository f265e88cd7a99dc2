/**
 * Formatted cell model.
 * A Value carries its escaped text plus the positions of every line break and
 * tab stop, so layout code never has to re-scan the text to measure it.
 */

export type Align = 'left' | 'right' | 'center';

/** [offset in buf, display width of the segment before it] */
export type Position = [offset: number, width: number];

export type ValueInit = {
	buf?: string;
	newlines?: Position[];
	tabs?: Position[][];
	width?: number;
	align?: Align;
	raw?: boolean;
	quoted?: boolean;
};

export class Value {
	buf: string;
	newlines: Position[];
	/** One list per physical line. */
	tabs: Position[][];
	/** Width of the segment after the last newline. */
	width: number;
	align: Align;
	raw: boolean;
	quoted: boolean;

	constructor(init: ValueInit = {}) {
		this.buf = init.buf ?? '';
		this.newlines = init.newlines ?? [];
		this.tabs = init.tabs ?? [[]];
		this.width = init.width ?? 0;
		this.align = init.align ?? 'left';
		this.raw = init.raw ?? false;
		this.quoted = init.quoted ?? false;
	}

	/**
	 * Value for text known to contain nothing to escape (numbers, booleans,
	 * formatted times), one column per character.
	 */
	static plain(text: string, align: Align, raw: boolean): Value {
		return new Value({ buf: text, width: text.length, align, raw });
	}

	get lineCount(): number {
		return this.newlines.length + 1;
	}

	/** Text of physical line l, without its newline. */
	line(l: number): string {
		const start = l > 0 ? (this.newlines[l - 1]?.[0] ?? 0) + 1 : 0;
		const end = this.newlines[l]?.[0] ?? this.buf.length;
		return this.buf.slice(start, end);
	}

	/** Width of line l when the column starts at screen column offset. */
	lineWidth(l: number, offset: number, tab: number): number {
		let width = 0;
		const nl = this.newlines[l];
		if (nl) {
			width += nl[1];
		}
		const tabs = this.tabs[l];
		if (tabs && tabs.length !== 0) {
			width += tabWidth(tabs, offset, tab);
		}
		if (l === this.newlines.length) {
			width += this.width;
		}
		return width;
	}

	/** Widest line, relative to the starting offset and tab width. */
	maxWidth(offset: number, tab: number): number {
		let width = this.width;
		for (let l = 0; l < this.tabs.length; l += 1) {
			width = Math.max(width, this.lineWidth(l, offset, tab));
		}
		return width;
	}

	withAlign(align: Align): Value {
		return new Value({
			buf: this.buf,
			newlines: this.newlines,
			tabs: this.tabs,
			width: this.width,
			align,
			raw: this.raw,
			quoted: this.quoted,
		});
	}

	toString(): string {
		return this.buf;
	}
}

/**
 * Width taken by the tab-terminated segments of one line, given the column
 * offset the line starts at and the tab stop width.
 */
export function tabWidth(tabs: Position[], offset: number, tab: number): number {
	let width = offset;
	for (const [, segment] of tabs) {
		width += segment;
		width += tab - (width % tab);
	}
	return width - offset;
}
