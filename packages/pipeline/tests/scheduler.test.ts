import { describe, expect, it, vi } from 'vitest';
import { PeriodicTask, abortableSleep, nextDelay, type Sleep } from '../src/scheduler';

describe('nextDelay', () => {
	it('sleeps the remainder of the interval', () => {
		expect(nextDelay(200, 50, 10)).toBe(150);
	});

	it('never drops below the floor', () => {
		expect(nextDelay(200, 195, 10)).toBe(10);
		expect(nextDelay(200, 450, 10)).toBe(10);
	});
});

describe('abortableSleep', () => {
	it('resolves as soon as the signal aborts', async () => {
		const controller = new AbortController();
		const started = Date.now();
		const pending = abortableSleep(60_000, controller.signal);
		controller.abort();
		await pending;
		expect(Date.now() - started).toBeLessThan(1000);
	});

	it('resolves immediately for an already aborted signal', async () => {
		const controller = new AbortController();
		controller.abort();
		await expect(abortableSleep(60_000, controller.signal)).resolves.toBeUndefined();
	});
});

describe('PeriodicTask', () => {
	it('paces ticks toward the target interval', async () => {
		let now = 0;
		const delays: number[] = [];
		const sleep: Sleep = async (ms) => {
			delays.push(ms);
			now += ms;
		};
		let ticks = 0;
		const task: PeriodicTask = new PeriodicTask(
			async () => {
				ticks++;
				now += ticks === 2 ? 250 : 30;
				if (ticks === 3) void task.stop();
			},
			{ targetIntervalMs: 200, minimumDelayMs: 10, clock: { now: () => now }, sleep },
		);

		expect(task.start()).toBe(true);
		await task.whenStopped();
		expect(ticks).toBe(3);
		expect(delays).toEqual([170, 10]);
		expect(task.running).toBe(false);
	});

	it('refuses a second start while running', async () => {
		const task = new PeriodicTask(async () => {}, { targetIntervalMs: 50, minimumDelayMs: 10 });
		expect(task.start()).toBe(true);
		expect(task.start()).toBe(false);
		await task.stop();
	});

	it('keeps running after a failing tick', async () => {
		const onError = vi.fn();
		let ticks = 0;
		const task: PeriodicTask = new PeriodicTask(
			async () => {
				ticks++;
				if (ticks === 1) throw new Error('boom');
				void task.stop();
			},
			{ targetIntervalMs: 0, minimumDelayMs: 0, sleep: async () => {}, onError },
		);
		task.start();
		await task.whenStopped();
		expect(ticks).toBe(2);
		expect(onError).toHaveBeenCalledWith(new Error('boom'));
	});

	it('stops promptly while sleeping', async () => {
		const task = new PeriodicTask(async () => {}, { targetIntervalMs: 60_000, minimumDelayMs: 60_000 });
		task.start();
		await new Promise((resolve) => setTimeout(resolve, 10));
		const started = Date.now();
		await task.stop();
		expect(Date.now() - started).toBeLessThan(1000);
	});
});
