import { describe, expect, test } from 'vitest';

import { isGridError } from '../src/errors';
import { ASCII, isLineStyleName, lineStyleByName, UNICODE, validateLineStyle } from '../src/line-style';

describe('line styles', () => {
	test('looks styles up by name', () => {
		expect(lineStyleByName('unicode')).toBe(UNICODE);
		expect(isLineStyleName('old-ascii')).toBe(true);
		expect(isLineStyleName('toString')).toBe(false);
	});

	test('rejects unknown names', () => {
		expect(() => lineStyleByName('fancy')).toThrow('invalid line style');
	});

	test('rejects glyphs wider than one cell', () => {
		let caught: unknown;
		try {
			validateLineStyle({ ...ASCII, row: ['袈', ' ', '|', '|'] });
		} catch (err) {
			caught = err;
		}
		expect(isGridError(caught, 'InvalidLineStyle')).toBe(true);
		expect(() => validateLineStyle({ ...ASCII, mid: ['++', '-', '+', '+'] })).toThrow('invalid line style');
	});

	test('accepts empty glyphs', () => {
		const compact = { ...ASCII, row: ['', ' ', '|', ''] as const };
		expect(validateLineStyle(compact)).toBe(compact);
	});
});
