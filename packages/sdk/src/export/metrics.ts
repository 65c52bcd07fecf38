import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import {
	type MetricReader,
	PeriodicExportingMetricReader,
} from '@opentelemetry/sdk-metrics';
import { DEFAULT_METRIC_EXPORT_INTERVAL_MILLIS } from '../constants';

export interface MetricReaderOptions {
	/** Full metrics endpoint, e.g. `https://api.spanwire.dev/v1/metrics` */
	url: string;
	headers?: Record<string, string>;
	exportIntervalMillis?: number;
}

/**
 * Periodic OTLP metric export. Runs on its own interval, independent of
 * span batching.
 */
export function createMetricReader(options: MetricReaderOptions): MetricReader {
	const exportIntervalMillis =
		options.exportIntervalMillis ?? DEFAULT_METRIC_EXPORT_INTERVAL_MILLIS;

	return new PeriodicExportingMetricReader({
		exporter: new OTLPMetricExporter({
			url: options.url,
			headers: options.headers,
		}),
		exportIntervalMillis,
		exportTimeoutMillis: Math.min(30_000, exportIntervalMillis),
	});
}
