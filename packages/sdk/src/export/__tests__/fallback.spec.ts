import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type ExportResult, ExportResultCode } from '@opentelemetry/core';
import { ProtobufTraceSerializer } from '@opentelemetry/otlp-transformer';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
	createMockLogger,
	createSpans,
	exportSpans,
} from '../../__tests__/helpers';
import { ExportTransportError, FallbackFileError } from '../../errors';
import { FallbackRecordExporter } from '../FallbackRecordExporter';
import { FileRecordExporter } from '../FileRecordExporter';
import {
	appendBatch,
	FALLBACK_FILE_HEADER,
	readFallbackFile,
	replayFallbackFile,
} from '../fallbackFile';
import { type FetchFn, OtlpHttpSession } from '../session';

const ENDPOINT = 'http://collector.test/v1/traces';

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), 'spanwire-fallback-'));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

function serialized(spans: ReadableSpan[]): Buffer {
	const payload = ProtobufTraceSerializer.serializeRequest(spans);
	if (!payload) {
		throw new Error('serialization failed');
	}
	return Buffer.from(payload);
}

function stubExporter(result: () => Promise<ExportResult>): SpanExporter {
	return {
		export: (_spans, callback) => {
			void result().then(callback);
		},
		shutdown: vi.fn(async () => {}),
		forceFlush: vi.fn(async () => {}),
	};
}

describe('fallback file', () => {
	it('should write the header once followed by length-prefixed batches', async () => {
		const path = join(dir, 'nested', 'spans.bin');
		const first = createSpans('a');
		const second = createSpans('b', 'c');

		await appendBatch(path, first);
		await appendBatch(path, second);

		const data = await readFile(path);
		expect(data.subarray(0, FALLBACK_FILE_HEADER.length).toString()).toBe(
			FALLBACK_FILE_HEADER,
		);
		const { batches, truncatedBytes } = await readFallbackFile(path);
		expect(batches.map((batch) => Buffer.from(batch))).toEqual([
			serialized(first),
			serialized(second),
		]);
		expect(truncatedBytes).toBe(0);
	});

	it('should refuse to append to a foreign file', async () => {
		const path = join(dir, 'notes.txt');
		await writeFile(path, 'shopping list\n');

		await expect(appendBatch(path, createSpans('a'))).rejects.toThrow(
			FallbackFileError,
		);
		expect(await readFile(path, 'utf8')).toBe('shopping list\n');
	});

	it('should read a missing file as empty', async () => {
		expect(await readFallbackFile(join(dir, 'missing.bin'))).toEqual({
			batches: [],
			truncatedBytes: 0,
		});
	});

	it('should rewrite a header cut short by a crash', async () => {
		const path = join(dir, 'spans.bin');
		await writeFile(path, 'SPANWIRE BA');

		expect(await readFallbackFile(path)).toEqual({
			batches: [],
			truncatedBytes: 11,
		});

		const spans = createSpans('a');
		await appendBatch(path, spans);

		const { batches, truncatedBytes } = await readFallbackFile(path);
		expect(batches.map((batch) => Buffer.from(batch))).toEqual([
			serialized(spans),
		]);
		expect(truncatedBytes).toBe(0);
	});

	it('should skip a partially written trailing batch', async () => {
		const path = join(dir, 'spans.bin');
		await appendBatch(path, createSpans('a'));
		const frame = Buffer.alloc(7);
		frame.writeUInt32BE(100, 0);
		await writeFile(path, frame, { flag: 'a' });

		const { batches, truncatedBytes } = await readFallbackFile(path);

		expect(batches).toHaveLength(1);
		expect(truncatedBytes).toBe(7);
	});
});

describe('FileRecordExporter', () => {
	it('should append each batch in order', async () => {
		const path = join(dir, 'spans.bin');
		const exporter = new FileRecordExporter(path, createMockLogger());

		const results = await Promise.all([
			exportSpans(exporter, createSpans('a')),
			exportSpans(exporter, createSpans('b')),
		]);

		expect(results.map((result) => result.code)).toEqual([
			ExportResultCode.SUCCESS,
			ExportResultCode.SUCCESS,
		]);
		const { batches } = await readFallbackFile(path);
		expect(batches).toHaveLength(2);
	});

	it('should write a single header when two exporters share a new file', async () => {
		const path = join(dir, 'shared.bin');
		const first = new FileRecordExporter(path, createMockLogger());
		const second = new FileRecordExporter(path, createMockLogger());

		await Promise.all([
			exportSpans(first, createSpans('a')),
			exportSpans(second, createSpans('b')),
			exportSpans(first, createSpans('c')),
		]);

		const data = await readFile(path);
		expect(data.indexOf(FALLBACK_FILE_HEADER, 1)).toBe(-1);
		const { batches, truncatedBytes } = await readFallbackFile(path);
		expect(batches).toHaveLength(3);
		expect(truncatedBytes).toBe(0);
	});

	it('should keep writing after a result callback throws', async () => {
		const path = join(dir, 'spans.bin');
		const logger = createMockLogger();
		const exporter = new FileRecordExporter(path, logger);

		exporter.export(createSpans('a'), () => {
			throw new Error('callback failed');
		});
		const result = await exportSpans(exporter, createSpans('b'));

		expect(result.code).toBe(ExportResultCode.SUCCESS);
		expect((await readFallbackFile(path)).batches).toHaveLength(2);
		expect(logger.error).toHaveBeenCalledWith(
			{ path, error: 'callback failed' },
			'Fallback export callback threw',
		);
	});

	it('should report and log write failures', async () => {
		const path = join(dir, 'notes.txt');
		await writeFile(path, 'shopping list\n');
		const logger = createMockLogger();
		const exporter = new FileRecordExporter(path, logger);

		const result = await exportSpans(exporter, createSpans('a', 'b'));

		expect(result.code).toBe(ExportResultCode.FAILED);
		expect(logger.error).toHaveBeenCalledWith(
			{
				path,
				count: 2,
				error: `${path} is not a spanwire fallback file`,
			},
			'Failed to write spans to fallback file',
		);
	});
});

describe('FallbackRecordExporter', () => {
	it('should not touch the fallback when the primary succeeds', async () => {
		const primary = stubExporter(async () => ({
			code: ExportResultCode.SUCCESS,
		}));
		const fallback = stubExporter(async () => ({
			code: ExportResultCode.SUCCESS,
		}));
		const fallbackExport = vi.spyOn(fallback, 'export');
		const exporter = new FallbackRecordExporter(
			primary,
			fallback,
			createMockLogger(),
		);

		const result = await exportSpans(exporter, createSpans('a'));

		expect(result.code).toBe(ExportResultCode.SUCCESS);
		expect(fallbackExport).not.toHaveBeenCalled();
	});

	it('should divert rejected batches to the file and report success', async () => {
		const path = join(dir, 'spans.bin');
		const logger = createMockLogger();
		const primary = stubExporter(async () => ({
			code: ExportResultCode.FAILED,
			error: new ExportTransportError('status 503', 503),
		}));
		const exporter = new FallbackRecordExporter(
			primary,
			new FileRecordExporter(path, logger),
			logger,
		);
		const spans = createSpans('a', 'b');

		const result = await exportSpans(exporter, spans);

		expect(result).toEqual({ code: ExportResultCode.SUCCESS });
		expect(logger.warn).toHaveBeenCalledWith(
			{ count: 2, error: 'status 503' },
			'Primary export failed, writing spans to fallback',
		);
		const { batches } = await readFallbackFile(path);
		expect(batches.map((batch) => Buffer.from(batch))).toEqual([
			serialized(spans),
		]);
	});

	it('should divert when the primary throws synchronously', async () => {
		const path = join(dir, 'spans.bin');
		const primary: SpanExporter = {
			export: () => {
				throw new Error('boom');
			},
			shutdown: async () => {},
		};
		const exporter = new FallbackRecordExporter(
			primary,
			new FileRecordExporter(path, createMockLogger()),
			createMockLogger(),
		);

		const result = await exportSpans(exporter, createSpans('a'));

		expect(result.code).toBe(ExportResultCode.SUCCESS);
		expect((await readFallbackFile(path)).batches).toHaveLength(1);
	});

	it('should report failure when both exporters fail', async () => {
		const failure = new Error('disk full');
		const exporter = new FallbackRecordExporter(
			stubExporter(async () => ({ code: ExportResultCode.FAILED })),
			stubExporter(async () => ({
				code: ExportResultCode.FAILED,
				error: failure,
			})),
			createMockLogger(),
		);

		const result = await exportSpans(exporter, createSpans('a'));

		expect(result).toEqual({ code: ExportResultCode.FAILED, error: failure });
	});

	it('should shut both exporters down', async () => {
		const primary = stubExporter(async () => ({
			code: ExportResultCode.SUCCESS,
		}));
		const fallback = stubExporter(async () => ({
			code: ExportResultCode.SUCCESS,
		}));

		await new FallbackRecordExporter(
			primary,
			fallback,
			createMockLogger(),
		).shutdown();

		expect(primary.shutdown).toHaveBeenCalled();
		expect(fallback.shutdown).toHaveBeenCalled();
	});
});

describe('replayFallbackFile', () => {
	it('should post every batch in order and clear the file', async () => {
		const path = join(dir, 'spans.bin');
		await appendBatch(path, createSpans('a'));
		await appendBatch(path, createSpans('b'));
		const fetchFn = vi.fn<FetchFn>(
			async () => new Response(null, { status: 200 }),
		);

		const count = await replayFallbackFile(
			path,
			new OtlpHttpSession({ fetch: fetchFn }),
			{ url: ENDPOINT, token: 'test-secret', clear: true },
		);

		expect(count).toBe(2);
		expect(fetchFn).toHaveBeenCalledTimes(2);
		const init = fetchFn.mock.calls[0][1];
		expect(init?.headers).toEqual({
			'Content-Type': 'application/x-protobuf',
			'User-Agent': 'spanwire/0.1.0',
			Authorization: 'test-secret',
		});
		expect(await readFallbackFile(path)).toEqual({
			batches: [],
			truncatedBytes: 0,
		});
	});

	it('should stop at the first rejected batch and keep the file', async () => {
		const path = join(dir, 'spans.bin');
		await appendBatch(path, createSpans('a'));
		await appendBatch(path, createSpans('b'));
		const fetchFn = vi.fn<FetchFn>(
			async () => new Response(null, { status: 503 }),
		);

		await expect(
			replayFallbackFile(path, new OtlpHttpSession({ fetch: fetchFn }), {
				url: ENDPOINT,
				clear: true,
			}),
		).rejects.toThrow(`Replay to ${ENDPOINT} failed with status 503`);
		expect(fetchFn).toHaveBeenCalledTimes(1);
		expect((await readFallbackFile(path)).batches).toHaveLength(2);
	});
});
