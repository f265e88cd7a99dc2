import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { parse as parseTOML } from 'smol-toml';

import type { OptionsMap } from '../options';
import { type GridConfig, GridConfigSchema } from './schema';

export const CONFIG_FILE_NAME = '.gridprint.toml';

/**
 * Walk up the directory tree from startDir looking for .gridprint.toml.
 */
export function findConfigUpwards(startDir: string): string | null {
	let dir = startDir;
	for (;;) {
		const candidate = join(dir, CONFIG_FILE_NAME);
		if (existsSync(candidate)) {
			return candidate;
		}
		if (dir === dirname(dir)) {
			return null;
		}
		dir = dirname(dir);
	}
}

function resolvePath(path: string, cwd: string): string {
	return isAbsolute(path) ? path : join(cwd, path);
}

/**
 * Config file to use: an explicit path, then GRIDPRINT_CONFIG, then the
 * nearest .gridprint.toml. Null when there is none.
 */
export function findConfigPath(explicit?: string, cwd = process.cwd()): string | null {
	if (explicit) {
		return resolvePath(explicit, cwd);
	}
	const envPath = process.env['GRIDPRINT_CONFIG'];
	if (envPath) {
		return resolvePath(envPath, cwd);
	}
	return findConfigUpwards(cwd);
}

export function parseConfig(content: string, source: string): GridConfig {
	const result = GridConfigSchema.safeParse(parseTOML(content));
	if (!result.success) {
		const errors = result.error.issues.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
		throw new Error(`Invalid config file at ${source}:\n${errors}`);
	}
	return result.data;
}

export function loadConfig(path: string): GridConfig {
	if (!existsSync(path)) {
		throw new Error(`Config file not found: ${path}`);
	}
	return parseConfig(readFileSync(path, 'utf-8'), path);
}

/** Load the config findConfigPath picks, or an empty one. */
export function resolveConfig(explicit?: string, cwd?: string): GridConfig {
	const path = findConfigPath(explicit, cwd);
	return path ? loadConfig(path) : { pset: {} };
}

/** [pset] as the string map encoderFromMap reads; booleans become on/off. */
export function psetToMap(config: GridConfig): OptionsMap {
	const map: OptionsMap = {};
	for (const [key, value] of Object.entries(config.pset)) {
		if (value === undefined) continue;
		map[key] = typeof value === 'boolean' ? (value ? 'on' : 'off') : String(value);
	}
	return map;
}
