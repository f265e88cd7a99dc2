import { GridError } from './errors';
import { runeWidth } from './escape';

/** [left, fill, junction, right]; '' means the glyph is absent. */
export type LineRule = readonly [left: string, fill: string, junction: string, right: string];

export type LineStyle = {
	top: LineRule;
	mid: LineRule;
	row: LineRule;
	wrap: LineRule;
	end: LineRule;
};

export type LineStyleName = 'ascii' | 'old-ascii' | 'unicode' | 'unicode-double';

export const ASCII: LineStyle = {
	top: ['+', '-', '+', '+'],
	mid: ['+', '-', '+', '+'],
	row: ['|', ' ', '|', '|'],
	wrap: ['|', '+', '.', '|'],
	end: ['+', '-', '+', '+'],
};

export const OLD_ASCII: LineStyle = {
	...ASCII,
	wrap: ['|', '+', ':', '|'],
};

export const UNICODE: LineStyle = {
	top: ['┌', '─', '┬', '┐'],
	mid: ['├', '─', '┼', '┤'],
	row: ['│', ' ', '│', '│'],
	wrap: ['│', '↵', '…', '│'],
	end: ['└', '─', '┴', '┘'],
};

export const UNICODE_DOUBLE: LineStyle = {
	top: ['╔', '═', '╦', '╗'],
	mid: ['╠', '═', '╬', '╣'],
	row: ['║', ' ', '║', '║'],
	wrap: ['│', '↵', '…', '│'],
	end: ['╚', '═', '╩', '╝'],
};

export const LINE_STYLES: Record<LineStyleName, LineStyle> = {
	ascii: ASCII,
	'old-ascii': OLD_ASCII,
	unicode: UNICODE,
	'unicode-double': UNICODE_DOUBLE,
};

export function isLineStyleName(name: string): name is LineStyleName {
	return Object.hasOwn(LINE_STYLES, name);
}

export function lineStyleByName(name: string): LineStyle {
	if (!isLineStyleName(name)) {
		throw new GridError('InvalidLineStyle');
	}
	return LINE_STYLES[name];
}

/** Throws InvalidLineStyle unless every glyph is empty or one cell wide. */
export function validateLineStyle(style: LineStyle): LineStyle {
	for (const rule of [style.top, style.mid, style.row, style.wrap, style.end]) {
		for (const glyph of rule) {
			if (glyph !== '' && runeWidth(glyph) !== 1) {
				throw new GridError('InvalidLineStyle');
			}
		}
	}
	return style;
}
