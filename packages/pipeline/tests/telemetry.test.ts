import { describe, expect, it, vi } from 'vitest';
import { TelemetryBus, ThresholdControl, emptyTelemetry } from '../src/telemetry';
import { silentLogger } from './fixtures';

describe('TelemetryBus', () => {
	it('starts from an empty snapshot', () => {
		const snapshot = new TelemetryBus().getSnapshot();
		expect(snapshot.frameId).toBe(0);
		expect(snapshot.detections).toEqual([]);
		expect(snapshot.performance.fps).toBe(0);
	});

	it('delivers every publish until unsubscribed', () => {
		const bus = new TelemetryBus();
		const listener = vi.fn();
		const unsubscribe = bus.subscribe(listener);
		const next = { ...emptyTelemetry(), frameId: 7 };
		bus.publish(next);
		unsubscribe();
		bus.reset();
		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(next);
		expect(bus.getSnapshot().frameId).toBe(0);
	});

	it('keeps publishing when a subscriber throws', () => {
		const logger = silentLogger();
		const bus = new TelemetryBus(logger);
		const after = vi.fn();
		bus.subscribe(() => {
			throw new Error('render failed');
		});
		bus.subscribe(after);
		bus.reset();
		expect(after).toHaveBeenCalledTimes(1);
		expect(logger.warn).toHaveBeenCalledWith('[telemetry] subscriber threw:', 'Error: render failed');
	});
});

describe('ThresholdControl', () => {
	it('clamps to [0, 1] and ignores non-finite values', () => {
		const control = new ThresholdControl(0.25);
		expect(control.set(1.4)).toBe(1);
		expect(control.set(-2)).toBe(0);
		expect(control.set(Number.NaN)).toBe(0);
	});

	it('notifies only on change', () => {
		const control = new ThresholdControl(0.25);
		const listener = vi.fn();
		control.subscribe(listener);
		control.set(0.25);
		control.set(0.5);
		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(0.5);
	});
});
