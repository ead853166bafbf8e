import type { Detection } from '@roadwatch/shared';

/**
 * Keeps the last non-empty detection list on the overlay through short gaps.
 * An empty list is only accepted on every `holdFrames`th frame, so boxes do not
 * flicker when a single frame misses.
 */
export class OverlayHold {
	private frameCount = 0;
	private shown: readonly Detection[] = [];

	constructor(private readonly holdFrames: number) {}

	next(detections: readonly Detection[]): readonly Detection[] {
		this.frameCount++;
		if (detections.length > 0 || this.frameCount % this.holdFrames === 0) this.shown = detections;
		return this.shown;
	}
}
