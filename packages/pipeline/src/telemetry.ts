import { EventEmitter } from 'node:events';
import type { Logger, TelemetrySnapshot } from '@roadwatch/shared';
import { emptyHazardStats, emptyPerformance } from './aggregator';
import { describeError } from './errors';
import { clamp } from './geometry';

export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

export function emptyTelemetry(): TelemetrySnapshot {
	return Object.freeze({
		frameId: 0,
		performance: emptyPerformance(),
		hazards: emptyHazardStats(),
		recent: Object.freeze([]),
		detections: Object.freeze([]),
	});
}

/**
 * Hand-off point between the loop and its observers. Each publish replaces the
 * whole snapshot, so a reader sees one complete frame of telemetry or the
 * previous one.
 */
export class TelemetryBus {
	private readonly emitter = new EventEmitter();
	private current: TelemetrySnapshot = emptyTelemetry();

	constructor(private readonly logger: Logger = console) {}

	getSnapshot(): TelemetrySnapshot {
		return this.current;
	}

	publish(snapshot: TelemetrySnapshot): void {
		this.current = snapshot;
		this.emitter.emit('snapshot', snapshot);
	}

	reset(): void {
		this.publish(emptyTelemetry());
	}

	subscribe(listener: Listener<TelemetrySnapshot>): Unsubscribe {
		const safe = (snapshot: TelemetrySnapshot) => {
			try {
				listener(snapshot);
			} catch (error) {
				this.logger.warn('[telemetry] subscriber threw:', describeError(error));
			}
		};
		this.emitter.on('snapshot', safe);
		return () => {
			this.emitter.off('snapshot', safe);
		};
	}
}

/** Operator-adjustable confidence threshold, read at the top of every decode. */
export class ThresholdControl {
	private readonly emitter = new EventEmitter();
	private value: number;

	constructor(initial: number) {
		this.value = clamp(initial, 0, 1);
	}

	get(): number {
		return this.value;
	}

	set(next: number): number {
		if (!Number.isFinite(next)) return this.value;
		const value = clamp(next, 0, 1);
		if (value !== this.value) {
			this.value = value;
			this.emitter.emit('change', value);
		}
		return this.value;
	}

	subscribe(listener: Listener<number>): Unsubscribe {
		this.emitter.on('change', listener);
		return () => {
			this.emitter.off('change', listener);
		};
	}
}
