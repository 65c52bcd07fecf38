import { basename } from 'node:path';
import { type Tracer, context } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { Resource } from '@opentelemetry/resources';
import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import {
	BasicTracerProvider,
	type IdGenerator,
	type SpanExporter,
	type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import {
	ATTR_SERVICE_NAME,
	ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { LogLevel, type Logger } from '@spanwire/logger';
import { createLogger } from '@spanwire/logger/pino';
import { z } from 'zod/v4';
import {
	DEFAULT_BASE_URL,
	DEFAULT_EXPORT_TIMEOUT_MILLIS,
	DEFAULT_FALLBACK_FILE,
	DEFAULT_MAX_BODY_SIZE,
	DEFAULT_METRIC_EXPORT_INTERVAL_MILLIS,
	DEFAULT_SCHEDULED_DELAY_MILLIS,
	USER_AGENT,
	VERSION,
} from './constants';
import { ConfigurationError } from './errors';
import { FallbackRecordExporter } from './export/FallbackRecordExporter';
import { FileRecordExporter } from './export/FileRecordExporter';
import { OtlpRecordExporter } from './export/OtlpRecordExporter';
import { createMetricReader } from './export/metrics';
import { createSpanProcessor } from './export/processors';
import { type FetchFn, OtlpHttpSession } from './export/session';
import {
	type NsTimestampGenerator,
	defaultNsTimestampGenerator,
} from './lifecycle/clock';

export interface SpanwireOptions {
	/** Export to the backend; defaults to whether a token is available */
	sendToBackend?: boolean;
	/** Ingest token, falls back to `SPANWIRE_TOKEN` */
	token?: string;
	/** Defaults to the name of the working directory */
	serviceName?: string;
	serviceVersion?: string;
	baseUrl?: string;
	/** Where rejected batches are kept; `false` disables the fallback */
	exporterFallbackFilePath?: string | false;
	idGenerator?: IdGenerator;
	nsTimestampGenerator?: NsTimestampGenerator;
	/** Attached in addition to the export pipeline */
	processors?: SpanProcessor[];
	/** Builds the processor wrapping the export chain (default: batching) */
	defaultSpanProcessor?: (exporter: SpanExporter) => SpanProcessor;
	/** Replaces the OTLP exporter as the primary of the export chain */
	spanExporter?: SpanExporter;
	metricReaders?: MetricReader[];
	requestHeaders?: Record<string, string>;
	fetch?: FetchFn;
	maxBodySize?: number;
	scheduledDelayMillis?: number;
	exportTimeoutMillis?: number;
	metricExportIntervalMillis?: number;
	resourceAttributes?: Record<string, string | number | boolean>;
	logger?: Logger;
}

const positiveInt = z.number().int().positive();

const settingsSchema = z.object({
	token: z.string().min(1).optional(),
	sendToBackend: z.boolean(),
	serviceName: z.string().min(1),
	serviceVersion: z.string().min(1).optional(),
	baseUrl: z.url(),
	exporterFallbackFilePath: z.union([z.string().min(1), z.literal(false)]),
	maxBodySize: positiveInt,
	scheduledDelayMillis: positiveInt,
	exportTimeoutMillis: positiveInt,
	metricExportIntervalMillis: positiveInt,
	tracesExporter: z.enum(['otlp', 'none']),
});

const envSchema = z.object({
	SPANWIRE_TOKEN: z.string().min(1).optional(),
	OTEL_BSP_SCHEDULE_DELAY: z.coerce.number().int().positive().optional(),
	OTEL_TRACES_EXPORTER: z.enum(['otlp', 'none']).optional(),
});

export type SpanwireSettings = z.infer<typeof settingsSchema>;

function formatIssues(
	issues: z.core.$ZodIssue[],
	prefix: string[] = [],
): string[] {
	return issues.map((issue) =>
		[...prefix, ...issue.path.map(String)].join('.'),
	);
}

/**
 * Merges options, environment and defaults, and validates the result.
 *
 * @throws {ConfigurationError} naming every invalid setting
 */
export function resolveSettings(
	options: SpanwireOptions,
	env: NodeJS.ProcessEnv = process.env,
): SpanwireSettings {
	const envResult = envSchema.safeParse({
		SPANWIRE_TOKEN: env.SPANWIRE_TOKEN || undefined,
		OTEL_BSP_SCHEDULE_DELAY: env.OTEL_BSP_SCHEDULE_DELAY || undefined,
		OTEL_TRACES_EXPORTER: env.OTEL_TRACES_EXPORTER || undefined,
	});
	const fromEnv = envResult.success ? envResult.data : {};

	const token = options.token ?? fromEnv.SPANWIRE_TOKEN;
	const result = settingsSchema.safeParse({
		token,
		sendToBackend: options.sendToBackend ?? token !== undefined,
		serviceName: options.serviceName ?? (basename(process.cwd()) || 'unknown_service'),
		serviceVersion: options.serviceVersion,
		baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
		exporterFallbackFilePath:
			options.exporterFallbackFilePath ?? DEFAULT_FALLBACK_FILE,
		maxBodySize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
		scheduledDelayMillis:
			options.scheduledDelayMillis ??
			fromEnv.OTEL_BSP_SCHEDULE_DELAY ??
			DEFAULT_SCHEDULED_DELAY_MILLIS,
		exportTimeoutMillis:
			options.exportTimeoutMillis ?? DEFAULT_EXPORT_TIMEOUT_MILLIS,
		metricExportIntervalMillis:
			options.metricExportIntervalMillis ??
			DEFAULT_METRIC_EXPORT_INTERVAL_MILLIS,
		tracesExporter: fromEnv.OTEL_TRACES_EXPORTER ?? 'otlp',
	});

	const fields = [
		...(envResult.success ? [] : formatIssues(envResult.error.issues, ['env'])),
		...(result.success ? [] : formatIssues(result.error.issues)),
	];
	if (!result.success || fields.length > 0) {
		throw new ConfigurationError(
			`Invalid configuration: ${fields.join(', ')}`,
			fields,
		);
	}

	const settings = result.data;
	if (settings.sendToBackend && !settings.token) {
		throw new ConfigurationError(
			'sendToBackend requires a token (pass `token` or set SPANWIRE_TOKEN)',
			['token'],
		);
	}

	return settings;
}

let contextManagerRegistered = false;

function registerContextManager(): void {
	if (contextManagerRegistered) return;
	context.setGlobalContextManager(
		new AsyncLocalStorageContextManager().enable(),
	);
	contextManagerRegistered = true;
}

export interface ConfigState {
	settings: SpanwireSettings;
	logger: Logger;
	clock: NsTimestampGenerator;
	tracerProvider: BasicTracerProvider;
	tracer: Tracer;
	meterProvider: MeterProvider;
	spanProcessors: SpanProcessor[];
}

function backendHeaders(settings: SpanwireSettings): Record<string, string> {
	return settings.token
		? { Authorization: settings.token, 'User-Agent': USER_AGENT }
		: { 'User-Agent': USER_AGENT };
}

function buildState(options: SpanwireOptions): ConfigState {
	const settings = resolveSettings(options);
	const logger =
		options.logger ??
		createLogger({ name: 'spanwire', level: LogLevel.Warn, redact: true });

	registerContextManager();

	const resource = new Resource({
		[ATTR_SERVICE_NAME]: settings.serviceName,
		...(settings.serviceVersion
			? { [ATTR_SERVICE_VERSION]: settings.serviceVersion }
			: {}),
		...options.resourceAttributes,
	});

	const spanProcessors = [...(options.processors ?? [])];

	const exportSpans =
		(settings.sendToBackend || options.spanExporter !== undefined) &&
		settings.tracesExporter !== 'none';
	if (exportSpans) {
		let exporter: SpanExporter =
			options.spanExporter ??
			new OtlpRecordExporter({
				url: `${settings.baseUrl}/v1/traces`,
				token: settings.token,
				headers: options.requestHeaders,
				session: new OtlpHttpSession({
					maxBodySize: settings.maxBodySize,
					fetch: options.fetch,
				}),
			});

		if (settings.exporterFallbackFilePath !== false) {
			exporter = new FallbackRecordExporter(
				exporter,
				new FileRecordExporter(
					settings.exporterFallbackFilePath,
					logger.child({ component: 'fallback' }),
				),
				logger.child({ component: 'exporter' }),
			);
		}

		spanProcessors.push(
			options.defaultSpanProcessor?.(exporter) ??
				createSpanProcessor(exporter, {
					strategy: 'batch',
					scheduledDelayMillis: settings.scheduledDelayMillis,
					exportTimeoutMillis: settings.exportTimeoutMillis,
					logger: logger.child({ component: 'batcher' }),
				}),
		);
	}

	const tracerProvider = new BasicTracerProvider({
		resource,
		idGenerator: options.idGenerator,
	});
	for (const processor of spanProcessors) {
		tracerProvider.addSpanProcessor(processor);
	}

	const readers = [...(options.metricReaders ?? [])];
	if (settings.sendToBackend) {
		readers.push(
			createMetricReader({
				url: `${settings.baseUrl}/v1/metrics`,
				headers: { ...options.requestHeaders, ...backendHeaders(settings) },
				exportIntervalMillis: settings.metricExportIntervalMillis,
			}),
		);
	}

	return {
		settings,
		logger,
		clock: options.nsTimestampGenerator ?? defaultNsTimestampGenerator,
		tracerProvider,
		tracer: tracerProvider.getTracer('spanwire', VERSION),
		meterProvider: new MeterProvider({ resource, readers }),
		spanProcessors,
	};
}

async function shutdownState(state: ConfigState): Promise<void> {
	await Promise.all([
		state.tracerProvider.shutdown(),
		state.meterProvider.shutdown(),
	]);
}

/**
 * Settings and export pipeline shared by {@link Spanwire} handles.
 * Initialized on first use, or eagerly by {@link SpanwireConfig.configure}.
 *
 * @example
 * ```typescript
 * const config = new SpanwireConfig({ token: process.env.SPANWIRE_TOKEN });
 * const spanwire = new Spanwire(config);
 * ```
 */
export class SpanwireConfig {
	private state: ConfigState | undefined;

	constructor(private options: SpanwireOptions = {}) {}

	/**
	 * Replaces the options and rebuilds the pipeline. Handles created
	 * earlier use the new pipeline from their next call; the previous one
	 * is flushed and shut down in the background.
	 *
	 * @throws {ConfigurationError} when the options are invalid
	 */
	configure(options: SpanwireOptions = {}): void {
		const next = buildState(options);
		const previous = this.state;
		this.options = options;
		this.state = next;

		if (previous) {
			shutdownState(previous).catch((error: unknown) => {
				next.logger.warn(
					{ error: error instanceof Error ? error.message : String(error) },
					'Failed to shut down previous configuration',
				);
			});
		}
	}

	initialize(): ConfigState {
		if (!this.state) {
			this.state = buildState(this.options);
		}
		return this.state;
	}

	get settings(): SpanwireSettings {
		return this.initialize().settings;
	}

	get logger(): Logger {
		return this.initialize().logger;
	}

	get clock(): NsTimestampGenerator {
		return this.initialize().clock;
	}

	get tracer(): Tracer {
		return this.initialize().tracer;
	}

	get meterProvider(): MeterProvider {
		return this.initialize().meterProvider;
	}

	get spanProcessors(): readonly SpanProcessor[] {
		return this.initialize().spanProcessors;
	}

	async forceFlush(): Promise<void> {
		if (!this.state) return;
		await Promise.all([
			this.state.tracerProvider.forceFlush(),
			this.state.meterProvider.forceFlush(),
		]);
	}

	async shutdown(): Promise<void> {
		if (!this.state) return;
		const state = this.state;
		this.state = undefined;
		await shutdownState(state);
	}
}
