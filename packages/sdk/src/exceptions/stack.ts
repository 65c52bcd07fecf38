export interface StackFrame {
	file: string;
	line: number;
	column: number;
	function: string;
	/** Whether this frame is from application code (vs node_modules) */
	isApp: boolean;
}

const FRAME_WITH_FUNCTION = /^\s*at\s+(.+?)\s+\((.+):(\d+):(\d+)\)$/;
const FRAME_WITHOUT_FUNCTION = /^\s*at\s+(.+):(\d+):(\d+)$/;

function frame(
	fn: string,
	file: string,
	line: string,
	column: string,
): StackFrame {
	return {
		function: fn.replace(/^async\s+/, ''),
		file,
		line: Number.parseInt(line, 10),
		column: Number.parseInt(column, 10),
		isApp: !file.includes('node_modules') && !file.startsWith('node:'),
	};
}

/**
 * Parses V8 stack text into frames, innermost call first. Lines that are
 * part of the message or not in `at ...` form are skipped.
 */
export function parseStack(stack: string): StackFrame[] {
	const frames: StackFrame[] = [];

	for (const line of stack.split('\n')) {
		const named = line.match(FRAME_WITH_FUNCTION);
		if (named) {
			frames.push(frame(named[1], named[2], named[3], named[4]));
			continue;
		}

		const anonymous = line.match(FRAME_WITHOUT_FUNCTION);
		if (anonymous) {
			frames.push(
				frame('<anonymous>', anonymous[1], anonymous[2], anonymous[3]),
			);
		}
	}

	return frames;
}
