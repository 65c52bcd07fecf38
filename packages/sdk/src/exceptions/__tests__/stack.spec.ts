import { describe, expect, it } from 'vitest';
import { parseStack } from '../stack';

const STACK = [
	'Error: boom',
	'  with a second message line',
	'    at inner (/srv/app/src/a.ts:10:5)',
	'    at async outer (/srv/app/src/b.ts:20:3)',
	'    at /srv/app/src/c.ts:30:7',
	'    at Layer.handle (/srv/app/node_modules/express/lib/layer.js:95:5)',
	'    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
].join('\n');

describe('parseStack', () => {
	it('should parse frames innermost first', () => {
		const frames = parseStack(STACK);

		expect(frames.map((frame) => frame.function)).toEqual([
			'inner',
			'outer',
			'<anonymous>',
			'Layer.handle',
			'process.processTicksAndRejections',
		]);
	});

	it('should keep file, line and column', () => {
		expect(parseStack(STACK)[0]).toEqual({
			function: 'inner',
			file: '/srv/app/src/a.ts',
			line: 10,
			column: 5,
			isApp: true,
		});
	});

	it('should flag dependency and runtime frames', () => {
		expect(parseStack(STACK).map((frame) => frame.isApp)).toEqual([
			true,
			true,
			true,
			false,
			false,
		]);
	});

	it('should return no frames for text without frames', () => {
		expect(parseStack('Error: nothing here')).toEqual([]);
	});
});
