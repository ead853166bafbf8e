import type { Detection, HazardCategory, HazardStatsSnapshot, PerformanceSnapshot } from '@roadwatch/shared';

export const PROCESSING_WINDOW = 10;
export const RECENT_CAPACITY = 10;

export type AggregateSnapshot = {
	readonly performance: PerformanceSnapshot;
	readonly hazards: HazardStatsSnapshot;
	readonly recent: readonly Detection[];
};

export function emptyHazardStats(): HazardStatsSnapshot {
	return Object.freeze({ pedestrian: 0, pothole: 0, hump: 0, animal: 0, roadwork: 0 });
}

export function emptyPerformance(): PerformanceSnapshot {
	return Object.freeze({
		fps: 0,
		processingTimeMs: 0,
		totalDetections: 0,
		avgConfidence: 0,
		sessionDurationMs: 0,
		framesProcessed: 0,
		skippedTicks: 0,
	});
}

/**
 * Session-scoped telemetry: rolling processing time, fps since session start,
 * cumulative per-category counts and the last few detections. Every update
 * returns fresh frozen snapshots; nothing already handed out is mutated.
 */
export class DetectionAggregator {
	private frameCount = 0;
	private skipped = 0;
	private totalDetections = 0;
	private confidenceSum = 0;
	private readonly processingTimes: number[] = [];
	private counters: Record<HazardCategory, number>;
	private recent: readonly Detection[] = [];
	private last: AggregateSnapshot;

	constructor(private readonly sessionStart: number) {
		this.counters = { ...emptyHazardStats() };
		this.last = Object.freeze({ performance: emptyPerformance(), hazards: emptyHazardStats(), recent: this.recent });
	}

	update(detections: readonly Detection[], frameStartTime: number, now: number): AggregateSnapshot {
		this.frameCount++;
		this.totalDetections += detections.length;

		this.processingTimes.push(Math.max(0, now - frameStartTime));
		if (this.processingTimes.length > PROCESSING_WINDOW) this.processingTimes.shift();

		for (const d of detections) {
			this.confidenceSum += d.score;
			if (d.category) this.counters[d.category]++;
		}

		if (detections.length > 0) {
			this.recent = Object.freeze([...detections, ...this.recent].slice(0, RECENT_CAPACITY));
		}

		this.last = Object.freeze({
			performance: this.performanceAt(now),
			hazards: Object.freeze({ ...this.counters }),
			recent: this.recent,
		});
		return this.last;
	}

	/** Counts a tick that produced no frame; frame-based rates are untouched. */
	recordSkip(now: number): AggregateSnapshot {
		this.skipped++;
		this.last = Object.freeze({ ...this.last, performance: this.performanceAt(now) });
		return this.last;
	}

	snapshot(): AggregateSnapshot {
		return this.last;
	}

	private performanceAt(now: number): PerformanceSnapshot {
		const sessionDurationMs = Math.max(0, now - this.sessionStart);
		const fps = sessionDurationMs >= 1 ? (this.frameCount * 1000) / sessionDurationMs : 0;
		const processingTimeMs =
			this.processingTimes.length > 0
				? this.processingTimes.reduce((sum, t) => sum + t, 0) / this.processingTimes.length
				: 0;
		return Object.freeze({
			fps,
			processingTimeMs,
			totalDetections: this.totalDetections,
			avgConfidence: this.totalDetections > 0 ? this.confidenceSum / this.totalDetections : 0,
			sessionDurationMs,
			framesProcessed: this.frameCount,
			skippedTicks: this.skipped,
		});
	}
}
