import type { Box, Detection } from '@roadwatch/shared';
import { boxArea } from './geometry';

const IOU_EPSILON = 1e-6;

export function iou(a: Box, b: Box): number {
	const x1 = Math.max(a.left, b.left);
	const y1 = Math.max(a.top, b.top);
	const x2 = Math.min(a.right, b.right);
	const y2 = Math.min(a.bottom, b.bottom);
	if (x2 <= x1 || y2 <= y1) return 0;
	const inter = (x2 - x1) * (y2 - y1);
	return inter / (boxArea(a) + boxArea(b) - inter + IOU_EPSILON);
}

/**
 * Greedy non-max suppression. Survivors come back in descending score order;
 * equal scores keep their input order.
 */
export function suppress(detections: readonly Detection[], iouThreshold: number, maxDetections = Infinity): Detection[] {
	const sorted = detections
		.map((d, index) => ({ d, index }))
		.sort((a, b) => b.d.score - a.d.score || a.index - b.index)
		.map(({ d }) => d);

	const keep: Detection[] = [];
	for (const d of sorted) {
		if (keep.length >= maxDetections) break;
		let ok = true;
		for (const k of keep) {
			if (iou(d.box, k.box) > iouThreshold) {
				ok = false;
				break;
			}
		}
		if (ok) keep.push(d);
	}
	return keep;
}
