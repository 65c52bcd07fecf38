import { type Context, context } from '@opentelemetry/api';
import { ExportResultCode, suppressTracing } from '@opentelemetry/core';
import {
	BatchSpanProcessor,
	type ReadableSpan,
	type Span,
	type SpanExporter,
	type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { Logger } from '@spanwire/logger';
import {
	DEFAULT_EXPORT_TIMEOUT_MILLIS,
	DEFAULT_SCHEDULED_DELAY_MILLIS,
} from '../constants';
import { toError } from './OtlpRecordExporter';

export interface BatchRecordProcessorOptions {
	/** Records held before new ones are dropped (default 2048) */
	maxQueueSize?: number;
	/** Records per export; a full batch flushes early (default 512) */
	maxExportBatchSize?: number;
	/** Delay between a record arriving and its flush (default 500 ms) */
	scheduledDelayMillis?: number;
	/** Bound on a single export call (default 30 s) */
	exportTimeoutMillis?: number;
	/** Bound on the flush performed at shutdown (default 30 s) */
	shutdownTimeoutMillis?: number;
	logger: Logger;
}

/**
 * Batches finished records with OpenTelemetry's `BatchSpanProcessor`.
 * Once shutdown has begun, each late record is handed to the exporter
 * on its own so it still gets one export attempt.
 *
 * @example
 * ```typescript
 * const processor = new BatchRecordProcessor(exporter, {
 *   scheduledDelayMillis: 500,
 *   logger,
 * });
 * provider.addSpanProcessor(processor);
 * ```
 */
export class BatchRecordProcessor implements SpanProcessor {
	private readonly batcher: BatchSpanProcessor;
	private readonly shutdownTimeoutMillis: number;
	private readonly logger: Logger;
	private readonly lateExports = new Set<Promise<void>>();
	private shutdownPromise: Promise<void> | undefined;

	constructor(
		private readonly exporter: SpanExporter,
		options: BatchRecordProcessorOptions,
	) {
		this.batcher = new BatchSpanProcessor(exporter, {
			maxQueueSize: options.maxQueueSize ?? 2048,
			maxExportBatchSize: options.maxExportBatchSize ?? 512,
			scheduledDelayMillis:
				options.scheduledDelayMillis ?? DEFAULT_SCHEDULED_DELAY_MILLIS,
			exportTimeoutMillis:
				options.exportTimeoutMillis ?? DEFAULT_EXPORT_TIMEOUT_MILLIS,
		});
		this.shutdownTimeoutMillis = options.shutdownTimeoutMillis ?? 30_000;
		this.logger = options.logger;
	}

	onStart(span: Span, parentContext: Context): void {
		this.batcher.onStart(span, parentContext);
	}

	onEnd(span: ReadableSpan): void {
		if (this.shutdownPromise) {
			this.exportLate(span);
			return;
		}
		this.batcher.onEnd(span);
	}

	async forceFlush(): Promise<void> {
		await Promise.all([
			this.batcher.forceFlush().catch((error: unknown) => {
				this.logger.error(
					{ error: toError(error).message },
					'Span export failed, records lost',
				);
			}),
			...this.lateExports,
		]);
	}

	shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.shutdownOnce();
		}
		return this.shutdownPromise;
	}

	private async shutdownOnce(): Promise<void> {
		let deadline: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<'timeout'>((resolve) => {
			deadline = setTimeout(
				() => resolve('timeout'),
				this.shutdownTimeoutMillis,
			);
			deadline.unref();
		});

		const flushed = this.batcher.shutdown().then(
			() => 'flushed' as const,
			(error: unknown) => {
				this.logger.error(
					{ error: toError(error).message },
					'Shutdown flush failed, records lost',
				);
				return 'failed' as const;
			},
		);
		const outcome = await Promise.race([flushed, timedOut]);
		clearTimeout(deadline);

		if (outcome === 'timeout') {
			this.logger.warn(
				{ timeoutMillis: this.shutdownTimeoutMillis },
				'Shutdown flush timed out',
			);
		}
	}

	private exportLate(span: ReadableSpan): void {
		const attempt = new Promise<void>((resolve) => {
			// the export's own I/O must not produce spans
			context.with(suppressTracing(context.active()), () => {
				this.exporter.export([span], (result) => {
					if (result.code !== ExportResultCode.SUCCESS) {
						this.logger.error(
							{ name: span.name, error: result.error?.message },
							'Late span export failed, record lost',
						);
					}
					resolve();
				});
			});
		}).catch((error: unknown) => {
			this.logger.error(
				{ name: span.name, error: toError(error).message },
				'Late span exporter threw, record lost',
			);
		});

		this.lateExports.add(attempt);
		void attempt.finally(() => this.lateExports.delete(attempt));
	}
}
