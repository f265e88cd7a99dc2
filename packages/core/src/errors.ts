export const ERROR_CODES = {
	ResultSetIsNil: 'result set is nil',
	ResultSetHasNoColumns: 'result set has no columns',
	InvalidFormat: 'invalid format',
	InvalidLineStyle: 'invalid line style',
	InvalidFieldSeparator: 'invalid field separator',
	InvalidCSVFieldSeparator: 'invalid csv field separator',
	InvalidColumnParams: 'invalid column params',
	CrosstabResultMustHaveAtLeast3Columns: 'crosstab result must have at least 3 columns',
	CrosstabDataColumnMustBeSpecified: 'data column must be specified when query returns more than three columns',
	CrosstabVerticalAndHorizontalColumnsMustNotBeSame: 'crosstab vertical and horizontal columns must not be same',
	CrosstabVerticalColumnNotInResult: 'crosstab vertical column not in result',
	CrosstabHorizontalColumnNotInResult: 'crosstab horizontal column not in result',
	CrosstabDataColumnNotInResult: 'crosstab data column not in result',
	CrosstabHorizontalSortColumnNotInResult: 'crosstab horizontal sort column not in result',
	CrosstabDuplicateVerticalAndHorizontalValue: 'crosstab duplicate vertical and horizontal value',
	CrosstabHorizontalSortColumnIsNotANumber: 'crosstab horizontal sort column is not a number',
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error raised by the renderers and the crosstab view.
 * The message is fixed per code so callers can match on either.
 */
export class GridError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode) {
		super(ERROR_CODES[code]);
		this.name = 'GridError';
		this.code = code;
	}
}

export function isGridError(err: unknown, code?: ErrorCode): err is GridError {
	return err instanceof GridError && (code === undefined || err.code === code);
}
