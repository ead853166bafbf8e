import { UNKNOWN_LABEL, type DenseGridOutput, type Detection, type FilteredOutput, type OutputLayout, type RawOutput } from '@roadwatch/shared';
import type { DenseGridOptions } from './config';
import { DecodeError } from './errors';
import { clamp } from './geometry';
import type { ModelClass, ModelConfig } from './models';

export interface OutputDecoder {
	readonly layout: OutputLayout;
	/** Detections in model input space, scaled to targetW x targetH. */
	decode(output: RawOutput, confidenceThreshold: number, targetW: number, targetH: number): Detection[];
}

export function sigmoid(x: number): number {
	return 1 / (1 + Math.exp(-x));
}

function labelFor(classes: readonly ModelClass[], index: number): Pick<Detection, 'label' | 'category'> {
	const cls = classes[index];
	return cls ? { label: cls.name, category: cls.category } : { label: UNKNOWN_LABEL, category: null };
}

/**
 * Pre-filtered triple-tensor output (boxes, labels, scores) as SSD-style
 * exports emit it. Boxes are corners in the model's native square space.
 */
export class FilteredDecoder implements OutputDecoder {
	readonly layout = 'filtered';

	constructor(
		private readonly classes: readonly ModelClass[],
		private readonly nativeSize: number,
	) {}

	decode(output: RawOutput, confidenceThreshold: number, targetW: number, targetH: number): Detection[] {
		if (output.kind !== 'filtered') throw new DecodeError(`expected filtered output, got ${output.kind}`);
		const { boxes, labels, scores } = checkFiltered(output);

		const sx = targetW / this.nativeSize;
		const sy = targetH / this.nativeSize;
		const detections: Detection[] = [];
		for (let i = 0; i < scores.length; i++) {
			const score = scores[i];
			if (!(score >= confidenceThreshold)) continue;
			const id = labels[i];
			if (!Number.isInteger(id) || id < 0 || id >= this.classes.length) continue;

			const left = clamp(boxes[i * 4] * sx, 0, targetW);
			const top = clamp(boxes[i * 4 + 1] * sy, 0, targetH);
			const right = clamp(boxes[i * 4 + 2] * sx, 0, targetW);
			const bottom = clamp(boxes[i * 4 + 3] * sy, 0, targetH);
			// also rejects NaN corners and boxes clamped flat against an edge
			if (!(right > left && bottom > top)) continue;

			detections.push({
				box: { left, top, right, bottom },
				...labelFor(this.classes, id),
				score: Math.min(1, score),
			});
		}
		return detections;
	}
}

function checkFiltered(output: FilteredOutput): FilteredOutput {
	const n = output.scores.length;
	if (output.labels.length !== n) {
		throw new DecodeError(`labels has ${output.labels.length} entries, scores has ${n}`);
	}
	if (output.boxes.length !== n * 4) {
		throw new DecodeError(`boxes has ${output.boxes.length} values, expected ${n * 4}`);
	}
	return output;
}

/**
 * Dense anchor-grid output, channel-major [C, B]: cx, cy, w, h (fractions of
 * the model input), optional objectness, then one channel per class.
 */
export class DenseGridDecoder implements OutputDecoder {
	readonly layout = 'dense-grid';
	private readonly classStart: number;

	constructor(
		private readonly classes: readonly ModelClass[],
		private readonly options: DenseGridOptions & { objectness: boolean; logits: boolean },
	) {
		this.classStart = options.objectness ? 5 : 4;
	}

	decode(output: RawOutput, confidenceThreshold: number, targetW: number, targetH: number): Detection[] {
		if (output.kind !== 'dense-grid') throw new DecodeError(`expected dense-grid output, got ${output.kind}`);
		const { data, channels, anchors } = checkDenseGrid(output, this.classStart);
		const activate = this.options.logits ? sigmoid : (v: number) => v;
		const numClasses = channels - this.classStart;
		const at = (c: number, k: number) => data[c * anchors + k];

		const detections: Detection[] = [];
		for (let k = 0; k < anchors; k++) {
			let objectness = 1;
			if (this.options.objectness) {
				objectness = activate(at(4, k));
				if (objectness < this.options.objectnessGate) continue;
			}

			let bestClass = -1;
			let bestProb = -Infinity;
			for (let c = 0; c < numClasses; c++) {
				const p = activate(at(this.classStart + c, k));
				if (p > bestProb) {
					bestProb = p;
					bestClass = c;
				}
			}
			const score = objectness * bestProb;
			if (!(score >= confidenceThreshold)) continue;

			const cx = at(0, k);
			const cy = at(1, k);
			const bw = at(2, k);
			const bh = at(3, k);
			if (!Number.isFinite(cx) || !Number.isFinite(cy) || !Number.isFinite(bw) || !Number.isFinite(bh)) continue;
			const left = clamp((cx - bw / 2) * targetW, 0, targetW);
			const top = clamp((cy - bh / 2) * targetH, 0, targetH);
			const right = clamp((cx + bw / 2) * targetW, 0, targetW);
			const bottom = clamp((cy + bh / 2) * targetH, 0, targetH);
			if (!(right - left >= this.options.minBoxSize && bottom - top >= this.options.minBoxSize)) continue;
			if (right <= left || bottom <= top) continue;

			detections.push({
				box: { left, top, right, bottom },
				...labelFor(this.classes, bestClass),
				score: Math.min(1, score),
			});
		}
		return detections;
	}
}

function checkDenseGrid(output: DenseGridOutput, classStart: number): DenseGridOutput {
	const { data, channels, anchors } = output;
	if (!Number.isInteger(channels) || !Number.isInteger(anchors) || anchors < 0) {
		throw new DecodeError(`invalid grid shape [${channels}, ${anchors}]`);
	}
	if (channels <= classStart) {
		throw new DecodeError(`grid has ${channels} channels, needs more than ${classStart}`);
	}
	if (data.length !== channels * anchors) {
		throw new DecodeError(`grid holds ${data.length} values, expected ${channels}x${anchors}`);
	}
	return output;
}

export function createDecoder(model: ModelConfig, denseGrid: DenseGridOptions): OutputDecoder {
	switch (model.layout) {
		case 'filtered':
			return new FilteredDecoder(model.classes, model.inputSize);
		case 'dense-grid':
			return new DenseGridDecoder(model.classes, {
				...denseGrid,
				objectness: model.objectness,
				logits: model.logits,
			});
	}
}
