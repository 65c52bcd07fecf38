export const VERSION = '0.1.0';
export const USER_AGENT = `spanwire/${VERSION}`;

export const DEFAULT_BASE_URL = 'https://api.spanwire.dev';
export const DEFAULT_FALLBACK_FILE = 'spanwire_spans.bin';
/** 5 MiB */
export const DEFAULT_MAX_BODY_SIZE = 5 * 1024 * 1024;
export const DEFAULT_SCHEDULED_DELAY_MILLIS = 500;
export const DEFAULT_EXPORT_TIMEOUT_MILLIS = 30_000;
export const DEFAULT_METRIC_EXPORT_INTERVAL_MILLIS = 60_000;

export const ATTR_CODE_FILEPATH = 'code.filepath';
export const ATTR_CODE_LINENO = 'code.lineno';
export const ATTR_CODE_FUNCTION = 'code.function';

export const ATTR_NULL_ARGS = 'logfire.null_args';
export const ATTR_TAGS = 'logfire.tags';
export const ATTR_MSG_TEMPLATE = 'logfire.msg_template';
export const ATTR_MSG = 'logfire.msg';
export const ATTR_LEVEL = 'logfire.level';
export const ATTR_SPAN_TYPE = 'logfire.span_type';
export const ATTR_START_PARENT_ID = 'logfire.start_parent_id';

export const ATTR_EXCEPTION_DATA = 'exception.logfire.data';
export const ATTR_EXCEPTION_TRACE = 'exception.logfire.trace';

export const RESERVED_ATTRIBUTE_PREFIXES = ['code.', 'logfire.'] as const;

export const JSON_ATTRIBUTE_SUFFIX = '__JSON';
export const DATATYPE_KEY = '$__datatype__';
export const START_SPAN_SUFFIX = ' (start)';

export type Level =
	| 'trace'
	| 'debug'
	| 'info'
	| 'notice'
	| 'warn'
	| 'error'
	| 'fatal';
