import { vi } from 'vitest';
import type { DenseGridOutput, Detection, HazardCategory, Logger } from '@roadwatch/shared';
import type { ModelClass, ModelConfig } from '../src/models';

export const ROAD_CLASSES: readonly ModelClass[] = [
	{ name: 'animals', category: 'animal' },
	{ name: 'humps', category: 'hump' },
	{ name: 'pedestrian', category: 'pedestrian' },
	{ name: 'pothole', category: 'pothole' },
	{ name: 'roadworks', category: 'roadwork' },
];

export const SSD_CLASSES: readonly ModelClass[] = [
	{ name: 'animals', category: 'animal' },
	{ name: 'pedestrian', category: 'pedestrian' },
	{ name: 'pothole', category: 'pothole' },
	{ name: 'roadworks', category: 'roadwork' },
];

export function denseModel(overrides: Partial<ModelConfig> = {}): ModelConfig {
	return {
		id: 'test-dense',
		file: 'dense.onnx',
		inputSize: 640,
		layout: 'dense-grid',
		tensorLayout: 'nhwc',
		normalization: 'unit',
		objectness: true,
		logits: true,
		outputs: {},
		classes: ROAD_CLASSES,
		...overrides,
	};
}

export function filteredModel(overrides: Partial<ModelConfig> = {}): ModelConfig {
	return {
		id: 'test-filtered',
		file: 'ssd.onnx',
		inputSize: 320,
		layout: 'filtered',
		tensorLayout: 'nchw',
		normalization: 'standard',
		objectness: true,
		logits: true,
		outputs: {},
		classes: SSD_CLASSES,
		...overrides,
	};
}

export type AnchorSpec = {
	cx: number;
	cy: number;
	w: number;
	h: number;
	objectness?: number;
	classes: number[];
};

/** Channel-major grid: cx, cy, w, h, [objectness], classes. */
export function denseGrid(anchors: AnchorSpec[], numClasses: number, withObjectness = true): DenseGridOutput {
	const channels = (withObjectness ? 5 : 4) + numClasses;
	const count = anchors.length;
	const data = new Float32Array(channels * count);
	anchors.forEach((a, k) => {
		data[0 * count + k] = a.cx;
		data[1 * count + k] = a.cy;
		data[2 * count + k] = a.w;
		data[3 * count + k] = a.h;
		let c = 4;
		if (withObjectness) data[c++ * count + k] = a.objectness ?? 0;
		for (let i = 0; i < numClasses; i++) data[(c + i) * count + k] = a.classes[i] ?? -10;
	});
	return { kind: 'dense-grid', data, channels, anchors: count };
}

export function det(
	left: number,
	top: number,
	right: number,
	bottom: number,
	score: number,
	category: HazardCategory | null = 'pothole',
	label: string = category ?? 'debris',
): Detection {
	return { box: { left, top, right, bottom }, label, category, score };
}

export function silentLogger(): Logger {
	return { log: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}
