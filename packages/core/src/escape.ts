import stringWidth from 'string-width';

import { type Position, Value } from './value';

export type EscapeOptions = {
	/** Replacement for invalid UTF-8 sequences; hex escaped when unset. */
	invalid?: string | undefined;
	/** Display width of the invalid replacement. */
	invalidWidth?: number;
	/** JSON string escaping. */
	isJSON?: boolean;
	/** Delimited-text mode: copy characters through and flag values needing quotes. */
	isRaw?: boolean;
	/** Field separator in raw mode ('' for none). */
	sep?: string;
	/** Quote character in raw mode ('' for none). */
	quote?: string;
};

const LOWER_HEX = '0123456789abcdef';

const GRAPHIC_RE = /^[\p{L}\p{M}\p{N}\p{P}\p{S}\p{Zs}]$/u;
const SPACE_RE = /^\p{White_Space}$/u;

const INVALID = -1;

const SIMPLE_ESCAPES: Record<number, string> = {
	0x07: '\\a',
	0x08: '\\b',
	0x0c: '\\f',
	0x0d: '\\r',
	0x0b: '\\v',
};

const JSON_ESCAPES: Record<number, string> = {
	0x07: '\\u0007',
	0x08: '\\b',
	0x0c: '\\f',
	0x0a: '\\n',
	0x0d: '\\r',
	0x09: '\\t',
	0x22: '\\"',
	0x5c: '\\\\',
};

/** Width of one printable character in terminal cells. */
export function runeWidth(ch: string): number {
	return stringWidth(ch);
}

function hex(n: number, digits: number): string {
	let out = '';
	for (let s = (digits - 1) * 4; s >= 0; s -= 4) {
		out += LOWER_HEX.charAt((n >>> s) & 0xf);
	}
	return out;
}

type Decoded = { cp: number; size: number; byte: number };

/**
 * Decode one UTF-8 sequence at i. Overlong forms, surrogates and code points
 * past U+10FFFF decode as INVALID with size 1.
 */
function decodeUtf8(src: Uint8Array, i: number): Decoded {
	const b0 = src[i] ?? 0;
	const invalid = { cp: INVALID, size: 1, byte: b0 };
	if (b0 < 0x80) {
		return { cp: b0, size: 1, byte: b0 };
	}

	let size: number;
	let cp: number;
	let min: number;
	if (b0 >= 0xc2 && b0 <= 0xdf) {
		size = 2;
		cp = b0 & 0x1f;
		min = 0x80;
	} else if (b0 >= 0xe0 && b0 <= 0xef) {
		size = 3;
		cp = b0 & 0x0f;
		min = 0x800;
	} else if (b0 >= 0xf0 && b0 <= 0xf4) {
		size = 4;
		cp = b0 & 0x07;
		min = 0x10000;
	} else {
		return invalid;
	}

	if (i + size > src.length) {
		return invalid;
	}
	for (let k = 1; k < size; k += 1) {
		const b = src[i + k] ?? 0;
		if ((b & 0xc0) !== 0x80) {
			return invalid;
		}
		cp = (cp << 6) | (b & 0x3f);
	}

	if (cp < min || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
		return invalid;
	}
	return { cp, size, byte: b0 };
}

function* codePoints(src: string | Uint8Array): Generator<Decoded> {
	if (typeof src === 'string') {
		for (let i = 0; i < src.length; ) {
			const cp = src.codePointAt(i) ?? 0;
			const size = cp > 0xffff ? 2 : 1;
			if (cp >= 0xd800 && cp <= 0xdfff) {
				// a lone surrogate reads as the three bytes it would encode to
				for (const byte of [0xe0 | (cp >> 12), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f)]) {
					yield { cp: INVALID, size: 1, byte };
				}
			} else {
				yield { cp, size, byte: cp & 0xff };
			}
			i += size;
		}
		return;
	}
	for (let i = 0; i < src.length; ) {
		const d = decodeUtf8(src, i);
		yield d;
		i += d.size;
	}
}

function jsonUnicodeEscape(cp: number): string {
	if (cp < 0x10000) {
		return `\\u${hex(cp, 4)}`;
	}
	const v = cp - 0x10000;
	return `\\u${hex(0xd800 + (v >> 10), 4)}\\u${hex(0xdc00 + (v & 0x3ff), 4)}`;
}

/**
 * Escape src into a Value, recording where tabs and newlines fall and how
 * wide each segment is.
 *
 * Outside of JSON and raw modes, tabs and newlines are kept literally: they
 * are layout positions, not content. Every other non-printable character is
 * replaced by a backslash escape.
 */
export function escapeText(src: string | Uint8Array, options: EscapeOptions = {}): Value {
	const { invalid, invalidWidth = 0, isJSON = false, isRaw = false, sep = '', quote = '' } = options;

	let buf = '';
	let width = 0;
	let quoted = false;
	const newlines: Position[] = [];
	const tabs: Position[][] = [[]];
	let line = 0;

	for (const { cp, byte } of codePoints(src)) {
		if (cp === INVALID) {
			if (invalid !== undefined) {
				buf += invalid;
				width += invalidWidth;
				quoted = true;
			} else if (isJSON) {
				buf += '\\ufffd';
				width += 6;
			} else {
				buf += `\\x${hex(byte, 2)}`;
				width += 4;
				quoted = true;
			}
			continue;
		}

		if (isJSON) {
			const esc = JSON_ESCAPES[cp];
			if (esc !== undefined) {
				buf += esc;
				width += esc.length;
				continue;
			}
		}

		const ch = String.fromCodePoint(cp);

		if (isRaw) {
			const w = runeWidth(ch);
			buf += ch;
			width += w;
			if (ch === sep) {
				quoted = true;
			} else if (quote !== '' && ch === quote) {
				buf += ch;
				width += w;
				quoted = true;
			} else if (SPACE_RE.test(ch)) {
				quoted = true;
			}
			continue;
		}

		if (GRAPHIC_RE.test(ch)) {
			buf += ch;
			width += runeWidth(ch);
			continue;
		}

		if (cp === 0x09) {
			tabs[line]?.push([buf.length, width]);
			buf += '\t';
			width = 0;
			continue;
		}
		if (cp === 0x0a) {
			newlines.push([buf.length, width]);
			buf += '\n';
			width = 0;
			tabs.push([]);
			line += 1;
			continue;
		}

		if (isJSON) {
			const esc = jsonUnicodeEscape(cp);
			buf += esc;
			width += esc.length;
			continue;
		}

		const simple = SIMPLE_ESCAPES[cp];
		if (simple !== undefined) {
			buf += simple;
			width += 2;
		} else if (cp < 0x20) {
			buf += `\\x${hex(cp, 2)}`;
			width += 4;
		} else if (cp < 0x10000) {
			buf += `\\u${hex(cp, 4)}`;
			width += 6;
		} else {
			buf += `\\U${hex(cp, 8)}`;
			width += 10;
		}
	}

	return new Value({ buf, newlines, tabs, width, quoted });
}
