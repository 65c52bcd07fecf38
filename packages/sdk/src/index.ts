export {
	type ConfigState,
	SpanwireConfig,
	type SpanwireOptions,
	type SpanwireSettings,
	resolveSettings,
} from './config';
export * from './constants';
export * from './errors';
export { configure, GLOBAL_CONFIG, spanwire } from './global';

export {
	type CallSite,
	type EncodedRecord,
	encode,
	encodeValue,
} from './encoding/attributes';
export { type Classification, classify, encodeJson } from './encoding/json';
export { formatValue, parseTemplate, renderTemplate } from './encoding/template';

export {
	buildExceptionTrace,
	captureException,
	type ExceptionStack,
	type ExceptionTrace,
	exceptionAttributes,
	exceptionMessage,
	exceptionType,
	isValidationError,
	type ValidationError,
} from './exceptions/capture';
export { parseStack, type StackFrame } from './exceptions/stack';

export { type ActivateOptions, LiveSpan, type LiveSpanState } from './lifecycle/LiveSpan';
export {
	type InstrumentOptions,
	type LogOptions,
	type NamedValues,
	Spanwire,
	type SpanOptions,
} from './lifecycle/Spanwire';
export { type NsTimestampGenerator, nsToHrTime } from './lifecycle/clock';

export {
	BatchRecordProcessor,
	type BatchRecordProcessorOptions,
} from './export/BatchRecordProcessor';
export { FallbackRecordExporter } from './export/FallbackRecordExporter';
export { FileRecordExporter } from './export/FileRecordExporter';
export {
	FALLBACK_FILE_HEADER,
	type FallbackFileContents,
	readFallbackFile,
	replayFallbackFile,
	type ReplayOptions,
} from './export/fallbackFile';
export { createMetricReader, type MetricReaderOptions } from './export/metrics';
export {
	OtlpRecordExporter,
	type OtlpRecordExporterOptions,
} from './export/OtlpRecordExporter';
export {
	createSpanProcessor,
	type SpanProcessorOptions,
	type SpanProcessorStrategy,
} from './export/processors';
export {
	type FetchFn,
	OtlpHttpSession,
	type OtlpHttpSessionOptions,
	type RequestBody,
} from './export/session';
