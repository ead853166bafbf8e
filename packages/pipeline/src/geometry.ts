import type { Box, Detection, Size } from '@roadwatch/shared';

/**
 * Linear per-axis scaling between two coordinate spaces. The pipeline never
 * letterboxes, so no aspect correction is applied.
 */
export function scaleBox(box: Box, from: Size, to: Size): Box {
	const sx = to.width / from.width;
	const sy = to.height / from.height;
	return {
		left: box.left * sx,
		top: box.top * sy,
		right: box.right * sx,
		bottom: box.bottom * sy,
	};
}

export function scaleDetections(detections: readonly Detection[], from: Size, to: Size): Detection[] {
	if (from.width === to.width && from.height === to.height) return detections.slice();
	return detections.map((d) => ({ ...d, box: scaleBox(d.box, from, to) }));
}

export function clampBox(box: Box, bounds: Size): Box {
	return {
		left: clamp(box.left, 0, bounds.width),
		top: clamp(box.top, 0, bounds.height),
		right: clamp(box.right, 0, bounds.width),
		bottom: clamp(box.bottom, 0, bounds.height),
	};
}

export function boxArea(box: Box): number {
	return Math.max(0, box.right - box.left) * Math.max(0, box.bottom - box.top);
}

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}
