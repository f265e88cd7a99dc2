import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { CONFIG_FILE_NAME, findConfigPath, findConfigUpwards, loadConfig, parseConfig, psetToMap, resolveConfig } from '../../src/config/loader';

describe('parseConfig', () => {
	test('reads the pset table', () => {
		const config = parseConfig('[pset]\nformat = "csv"\nborder = 2\nnumericlocale = true\nnull = "(null)"\n', 'test.toml');
		expect(config.pset).toEqual({ format: 'csv', border: 2, numericlocale: true, null: '(null)' });
	});

	test('defaults to an empty pset', () => {
		expect(parseConfig('', 'empty.toml')).toEqual({ pset: {} });
	});

	test('reports invalid values with their path', () => {
		expect(() => parseConfig('[pset]\nborder = 5\n', 'bad.toml')).toThrow('Invalid config file at bad.toml:\n  pset.border: Border must be 0, 1 or 2');
		expect(() => parseConfig('[pset]\nformat = "xml"\n', 'bad.toml')).toThrow('pset.format');
	});
});

describe('psetToMap', () => {
	test('stringifies values and maps booleans to on/off', () => {
		const map = psetToMap({ pset: { border: 2, expanded: true, pager: false, title: 'Report' } });
		expect(map).toEqual({ border: '2', expanded: 'on', pager: 'off', title: 'Report' });
	});
});

describe('config files', () => {
	let root: string;

	beforeEach(() => {
		root = mkdtempSync(join(tmpdir(), 'gridprint-'));
	});

	afterEach(() => {
		rmSync(root, { recursive: true, force: true });
		vi.unstubAllEnvs();
	});

	test('finds the nearest config walking up', () => {
		const nested = join(root, 'a', 'b');
		mkdirSync(nested, { recursive: true });
		writeFileSync(join(root, CONFIG_FILE_NAME), '[pset]\nborder = 2\n');
		writeFileSync(join(root, 'a', CONFIG_FILE_NAME), '[pset]\nborder = 0\n');

		expect(findConfigUpwards(nested)).toBe(join(root, 'a', CONFIG_FILE_NAME));
		expect(resolveConfig(undefined, nested).pset.border).toBe(0);
	});

	test('prefers an explicit path, then GRIDPRINT_CONFIG', () => {
		vi.stubEnv('GRIDPRINT_CONFIG', 'env.toml');
		expect(findConfigPath('explicit.toml', root)).toBe(join(root, 'explicit.toml'));
		expect(findConfigPath(undefined, root)).toBe(join(root, 'env.toml'));
	});

	test('loads an explicit file', () => {
		const path = join(root, 'custom.toml');
		writeFileSync(path, '[pset]\nlinestyle = "unicode"\n');
		expect(loadConfig(path).pset.linestyle).toBe('unicode');
	});

	test('rejects a missing file', () => {
		const path = join(root, 'missing.toml');
		expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
		expect(() => resolveConfig(path)).toThrow('Config file not found');
	});
});
