import {
	SimpleSpanProcessor,
	type SpanExporter,
	type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import {
	BatchRecordProcessor,
	type BatchRecordProcessorOptions,
} from './BatchRecordProcessor';

/**
 * Span processor strategy for telemetry export
 * - 'batch': Queue records and export them from a timer (default)
 * - 'simple': Export each record as soon as it ends
 */
export type SpanProcessorStrategy = 'batch' | 'simple';

export interface SpanProcessorOptions extends BatchRecordProcessorOptions {
	strategy: SpanProcessorStrategy;
}

/**
 * Create a span processor based on the strategy
 */
export function createSpanProcessor(
	exporter: SpanExporter,
	options: SpanProcessorOptions,
): SpanProcessor {
	const { strategy, ...config } = options;

	if (strategy === 'simple') {
		return new SimpleSpanProcessor(exporter);
	}

	return new BatchRecordProcessor(exporter, config);
}
