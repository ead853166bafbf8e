import { writeFile } from 'node:fs/promises';
import type { HazardStatsSnapshot, TelemetrySnapshot } from '@roadwatch/shared';

export type Summary = { median: number; p95: number };

export type BenchReport = {
	model: string;
	duration_ms: number;
	frames: number;
	skipped: number;
	detections: number;
	avg_confidence: number;
	fps: Summary;
	processing_ms: Summary;
	hazards: HazardStatsSnapshot;
};

export function summarize(values: readonly number[]): Summary {
	const a = values.filter((n) => Number.isFinite(n)).sort((x, y) => x - y);
	if (a.length === 0) return { median: 0, p95: 0 };
	const median = a[Math.floor(a.length / 2)];
	const p95 = a[Math.max(0, Math.ceil(a.length * 0.95) - 1)];
	return { median, p95 };
}

/** Collects per-frame telemetry during a bench run and reduces it to metrics.json. */
export class BenchRecorder {
	private readonly fps: number[] = [];
	private readonly processing: number[] = [];
	private lastFrameId = 0;
	private last: TelemetrySnapshot | null = null;

	constructor(private readonly model: string) {}

	record(snapshot: TelemetrySnapshot): void {
		this.last = snapshot;
		if (snapshot.frameId === this.lastFrameId) return;
		this.lastFrameId = snapshot.frameId;
		this.fps.push(snapshot.performance.fps);
		this.processing.push(snapshot.performance.processingTimeMs);
	}

	report(): BenchReport | null {
		const last = this.last;
		if (!last) return null;
		const { performance } = last;
		return {
			model: this.model,
			duration_ms: performance.sessionDurationMs,
			frames: performance.framesProcessed,
			skipped: performance.skippedTicks,
			detections: performance.totalDetections,
			avg_confidence: performance.avgConfidence,
			fps: summarize(this.fps),
			processing_ms: summarize(this.processing),
			hazards: last.hazards,
		};
	}

	async write(file: string): Promise<BenchReport | null> {
		const report = this.report();
		if (report) await writeFile(file, JSON.stringify(report, null, 2));
		return report;
	}
}
