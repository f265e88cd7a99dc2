/**
 * formats - List the output formats and line styles.
 */

import { FORMATS } from '@gridprint/core';
import { defineCommand } from 'citty';

import { log } from '../logger';

export function formatList(): string[] {
	return [
		'FORMATS',
		...FORMATS.map((format) => `  ${format}`),
		'',
		'LINE STYLES',
		'  ascii',
		'  old-ascii',
		'  unicode        (unicode_border_linestyle=double for double borders)',
	];
}

export const formats = defineCommand({
	meta: { name: 'formats', description: 'List output formats and line styles' },
	run() {
		for (const line of formatList()) {
			log(line);
		}
	},
});
