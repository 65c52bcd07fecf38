import { isAbsolute, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CallSite } from '../encoding/attributes';
import { parseStack } from '../exceptions/stack';

const SDK_SOURCE_DIR = fileURLToPath(new URL('..', import.meta.url));
const CAPTURE_STACK_LIMIT = 50;

function normalizeFile(file: string): string {
	if (file.startsWith('file://')) {
		return fileURLToPath(file);
	}
	return file;
}

function isSdkFile(file: string): boolean {
	if (!file.startsWith(SDK_SOURCE_DIR)) {
		return false;
	}
	return !file.includes(`${sep}__tests__${sep}`);
}

function displayPath(file: string): string {
	if (!isAbsolute(file)) {
		return file;
	}
	const path = relative(process.cwd(), file);
	return path.startsWith('..') ? file : path;
}

/**
 * First stack frame outside the SDK, i.e. the application code that
 * asked for a span or log.
 */
export function findCallSite(): CallSite | undefined {
	const limit = Error.stackTraceLimit;
	Error.stackTraceLimit = CAPTURE_STACK_LIMIT;
	const stack = new Error().stack ?? '';
	Error.stackTraceLimit = limit;

	for (const frame of parseStack(stack)) {
		const file = normalizeFile(frame.file);
		if (!frame.isApp || isSdkFile(file)) continue;

		return {
			filepath: displayPath(file),
			lineno: frame.line,
			function: frame.function,
		};
	}

	return undefined;
}
