import { z } from 'zod';

// psql \pset values; numbers and booleans are accepted for convenience
const PsetValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const PsetSchema = z
	.object({
		format: z.enum(['aligned', 'unaligned', 'csv', 'json', 'html']).optional(),
		border: z.number().int().min(0, 'Border must be 0, 1 or 2').max(2, 'Border must be 0, 1 or 2').optional(),
		linestyle: z.enum(['ascii', 'old-ascii', 'unicode']).optional(),
		unicode_border_linestyle: z.enum(['single', 'double']).optional(),
		expanded: z.union([z.enum(['on', 'off', 'auto']), z.boolean()]).optional(),
		pager: z.union([z.enum(['on', 'off', 'always']), z.boolean()]).optional(),
		columns: z.number().int().min(0, 'Must be a non-negative integer').optional(),
	})
	.catchall(PsetValueSchema);

export const GridConfigSchema = z.object({
	pset: PsetSchema.default({}),
});

export type GridConfig = z.infer<typeof GridConfigSchema>;
export type Pset = z.infer<typeof PsetSchema>;
