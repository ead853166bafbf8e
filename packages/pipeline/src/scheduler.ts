export type Clock = { now(): number };

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const systemClock: Clock = { now: () => performance.now() };

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const abortableSleep: Sleep = (ms, signal) =>
	new Promise<void>((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal.addEventListener('abort', onAbort, { once: true });
	});

export function nextDelay(targetIntervalMs: number, elapsedMs: number, minimumDelayMs: number): number {
	return Math.max(targetIntervalMs - elapsedMs, minimumDelayMs);
}

export type PeriodicTaskOptions = {
	targetIntervalMs: number;
	minimumDelayMs: number;
	clock?: Clock;
	sleep?: Sleep;
	onError?: (error: unknown) => void;
};

/**
 * Runs `tick` back to back, sleeping between runs so the cadence approaches
 * (never exceeds) the target interval. Ticks never overlap. `stop()` cuts the
 * pacing sleep short and resolves once the in-flight tick has finished.
 */
export class PeriodicTask {
	private controller: AbortController | null = null;
	private done: Promise<void> = Promise.resolve();
	private readonly clock: Clock;
	private readonly sleep: Sleep;

	constructor(
		private readonly tick: (signal: AbortSignal) => Promise<void>,
		private readonly options: PeriodicTaskOptions,
	) {
		this.clock = options.clock ?? systemClock;
		this.sleep = options.sleep ?? abortableSleep;
	}

	get running(): boolean {
		return this.controller !== null && !this.controller.signal.aborted;
	}

	start(): boolean {
		if (this.running) return false;
		const controller = new AbortController();
		this.controller = controller;
		this.done = this.run(controller.signal);
		return true;
	}

	stop(): Promise<void> {
		this.controller?.abort();
		return this.done;
	}

	/** Settles when the task has exited. */
	whenStopped(): Promise<void> {
		return this.done;
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			const startedAt = this.clock.now();
			try {
				await this.tick(signal);
			} catch (error) {
				if (this.options.onError) this.options.onError(error);
				else console.error('[scheduler] tick failed:', error);
			}
			if (signal.aborted) break;
			const elapsed = this.clock.now() - startedAt;
			await this.sleep(nextDelay(this.options.targetIntervalMs, elapsed, this.options.minimumDelayMs), signal);
		}
	}
}
