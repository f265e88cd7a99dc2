export { type CrosstabOptions, type CrosstabParams, CrosstabView, newCrosstabView } from './crosstab';
export { DEFAULT_NEWLINE, defaultSummary, type Encoder, ErrorEncoder, type Summary } from './encoder';
export { ERROR_CODES, type ErrorCode, GridError, isGridError } from './errors';
export { escapeText, type EscapeOptions, runeWidth } from './escape';
export { ExpandedEncoder } from './expanded';
export { type Cell, classifyCell, EscapeFormatter, type EscapeFormatterOptions, type Formatter, formatTime, type Nullable, type TimeFormat } from './formatter';
export { escapeHTML, HTMLEncoder, type HTMLOptions } from './html';
export { JSONEncoder, type JSONOptions } from './json';
export { ASCII, isLineStyleName, LINE_STYLES, type LineRule, type LineStyle, type LineStyleName, lineStyleByName, OLD_ASCII, UNICODE, UNICODE_DOUBLE, validateLineStyle } from './line-style';
export { encoderFromMap, FORMATS, formatterOptionsFromMap, type OptionsMap, type TerminalSize, terminalSize } from './options';
export { isBrokenPipe } from './pager';
export { type MemoryResult, MemoryResultSet, type ResultSet } from './result-set';
export { TableEncoder, type TableOptions } from './table';
export { UnalignedEncoder, type UnalignedOptions } from './unaligned';
export { type Align, type Position, tabWidth, Value } from './value';
