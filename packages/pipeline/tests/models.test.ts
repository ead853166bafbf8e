import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { ModelConfigError } from '../src/errors';
import { loadModelTable, parseModelEntry, parseModelTable, resolveModel } from '../src/models';

const minimal = {
	file: 'tiny.onnx',
	inputSize: 160,
	layout: 'filtered',
	classes: [{ name: 'pothole', category: 'pothole' }, { name: 'cone' }],
};

describe('bundled model table', () => {
	it('ships the dense and filtered detectors', () => {
		const table = loadModelTable();
		expect([...table.keys()]).toEqual(['focusnet', 'focusnet-raw', 'ssd-baseline']);

		const focusnet = resolveModel('focusnet', table);
		expect(focusnet.layout).toBe('dense-grid');
		expect(focusnet.inputSize).toBe(320);
		expect(focusnet.classes.map((c) => c.category)).toEqual(['animal', 'hump', 'pedestrian', 'pothole', 'roadwork']);

		const raw = resolveModel('focusnet-raw', table);
		expect(raw.objectness).toBe(false);
		expect(raw.logits).toBe(false);

		const ssd = resolveModel('ssd-baseline', table);
		expect(ssd.layout).toBe('filtered');
		expect(ssd.tensorLayout).toBe('nchw');
		expect(ssd.classes).toHaveLength(4);
	});

	it('names the available models for an unknown id', () => {
		expect(() => resolveModel('yolo-xl')).toThrow("unknown model 'yolo-xl' (available: focusnet, focusnet-raw, ssd-baseline)");
	});
});

describe('parseModelEntry', () => {
	it('fills defaults for optional fields', () => {
		const model = parseModelEntry('tiny', minimal);
		expect(model).toEqual({
			id: 'tiny',
			file: 'tiny.onnx',
			inputSize: 160,
			layout: 'filtered',
			tensorLayout: 'nhwc',
			normalization: 'unit',
			objectness: true,
			logits: true,
			outputs: {},
			classes: [
				{ name: 'pothole', category: 'pothole' },
				{ name: 'cone', category: null },
			],
		});
	});

	it.each([
		['an unknown layout', { ...minimal, layout: 'heatmap' }, /layout must be one of/],
		['a fractional input size', { ...minimal, inputSize: 12.5 }, /inputSize/],
		['a missing file', { ...minimal, file: undefined }, /file is required/],
		['no classes', { ...minimal, classes: [] }, /classes must be a non-empty array/],
		['an unknown category', { ...minimal, classes: [{ name: 'x', category: 'bridge' }] }, /unknown category 'bridge'/],
		['a nameless class', { ...minimal, classes: [{ category: 'pothole' }] }, /class 0 needs a name/],
	])('rejects %s', (_, raw, message) => {
		expect(() => parseModelEntry('bad', raw)).toThrow(message);
	});

	it('rejects a table that is not an object', () => {
		expect(() => parseModelTable([minimal])).toThrow(ModelConfigError);
	});
});

describe('loadModelTable', () => {
	const dir = mkdtempSync(join(tmpdir(), 'roadwatch-models-'));

	afterAll(() => rmSync(dir, { recursive: true, force: true }));

	it('reads a table from disk', () => {
		const path = join(dir, 'models.json');
		writeFileSync(path, JSON.stringify({ tiny: minimal }));
		expect(resolveModel('tiny', loadModelTable(path)).inputSize).toBe(160);
	});

	it('wraps unreadable files', () => {
		const path = join(dir, 'broken.json');
		writeFileSync(path, '{ not json');
		expect(() => loadModelTable(path)).toThrow(ModelConfigError);
		expect(() => loadModelTable(join(dir, 'missing.json'))).toThrow(/cannot read model table/);
	});
});
