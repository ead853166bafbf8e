import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { HAZARD_CATEGORIES, type HazardCategory, type OutputLayout, type TensorLayout } from '@roadwatch/shared';
import { ModelConfigError } from './errors';

export type Normalization = 'unit' | 'standard';

export type ModelClass = {
	name: string;
	category: HazardCategory | null;
};

export type ModelConfig = {
	id: string;
	file: string;
	inputSize: number; // square
	layout: OutputLayout;
	tensorLayout: TensorLayout;
	normalization: Normalization;
	objectness: boolean; // dense-grid: channel 4 is objectness
	logits: boolean; // dense-grid: channels need a sigmoid
	outputs: Record<string, string>;
	classes: readonly ModelClass[];
};

export const DEFAULT_MODEL_TABLE_PATH = fileURLToPath(new URL('../models.json', import.meta.url));

const LAYOUTS: readonly OutputLayout[] = ['filtered', 'dense-grid'];
const TENSOR_LAYOUTS: readonly TensorLayout[] = ['nhwc', 'nchw'];
const NORMALIZATIONS: readonly Normalization[] = ['unit', 'standard'];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
	return allowed.find((a) => a === value);
}

function parseClass(id: string, raw: unknown, index: number): ModelClass {
	if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name.length === 0) {
		throw new ModelConfigError(`model '${id}': class ${index} needs a name`);
	}
	if (raw.category === undefined || raw.category === null) return { name: raw.name, category: null };
	const category = oneOf(HAZARD_CATEGORIES, raw.category);
	if (!category) {
		throw new ModelConfigError(`model '${id}': class '${raw.name}' has unknown category '${String(raw.category)}'`);
	}
	return { name: raw.name, category };
}

export function parseModelEntry(id: string, raw: unknown): ModelConfig {
	if (!isRecord(raw)) throw new ModelConfigError(`model '${id}' is not an object`);

	const layout = oneOf(LAYOUTS, raw.layout);
	if (!layout) throw new ModelConfigError(`model '${id}': layout must be one of ${LAYOUTS.join(', ')}`);
	const tensorLayout = oneOf(TENSOR_LAYOUTS, raw.tensorLayout ?? 'nhwc');
	if (!tensorLayout) throw new ModelConfigError(`model '${id}': tensorLayout must be nhwc or nchw`);
	const normalization = oneOf(NORMALIZATIONS, raw.normalization ?? 'unit');
	if (!normalization) throw new ModelConfigError(`model '${id}': normalization must be unit or standard`);

	const inputSize = raw.inputSize;
	if (typeof inputSize !== 'number' || !Number.isInteger(inputSize) || inputSize <= 0) {
		throw new ModelConfigError(`model '${id}': inputSize must be a positive integer`);
	}
	if (typeof raw.file !== 'string') throw new ModelConfigError(`model '${id}': file is required`);
	if (!Array.isArray(raw.classes) || raw.classes.length === 0) {
		throw new ModelConfigError(`model '${id}': classes must be a non-empty array`);
	}

	const outputs: Record<string, string> = {};
	if (isRecord(raw.outputs)) {
		for (const [key, value] of Object.entries(raw.outputs)) {
			if (typeof value === 'string') outputs[key] = value;
		}
	}

	return {
		id,
		file: raw.file,
		inputSize,
		layout,
		tensorLayout,
		normalization,
		objectness: raw.objectness !== false,
		logits: raw.logits !== false,
		outputs,
		classes: raw.classes.map((c, i) => parseClass(id, c, i)),
	};
}

export function parseModelTable(raw: unknown): Map<string, ModelConfig> {
	if (!isRecord(raw)) throw new ModelConfigError('model table must be an object keyed by model id');
	const table = new Map<string, ModelConfig>();
	for (const [id, entry] of Object.entries(raw)) {
		table.set(id, parseModelEntry(id, entry));
	}
	return table;
}

export function loadModelTable(path: string = DEFAULT_MODEL_TABLE_PATH): Map<string, ModelConfig> {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, 'utf8'));
	} catch (error) {
		throw new ModelConfigError(`cannot read model table ${path}`, { cause: error });
	}
	return parseModelTable(raw);
}

export function resolveModel(id: string, table: Map<string, ModelConfig> = loadModelTable()): ModelConfig {
	const model = table.get(id);
	if (!model) {
		throw new ModelConfigError(`unknown model '${id}' (available: ${[...table.keys()].join(', ')})`);
	}
	return model;
}
