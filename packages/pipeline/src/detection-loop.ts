import type {
	AlertSink,
	Detection,
	FrameSource,
	InferenceRuntime,
	Logger,
	OverlaySink,
	RawFrame,
	RawOutput,
	Size,
	TelemetrySnapshot,
	Tensor,
} from '@roadwatch/shared';
import { DetectionAggregator, type AggregateSnapshot } from './aggregator';
import { AlertPolicy } from './alert-policy';
import type { PipelineConfig } from './config';
import { createDecoder, type OutputDecoder } from './decode';
import { DecodeError, PipelineStartError, describeError } from './errors';
import { scaleDetections } from './geometry';
import { suppress } from './nms';
import { OverlayHold } from './overlay-hold';
import { prepareFrame } from './preprocess';
import { PeriodicTask, systemClock, type Clock, type Sleep } from './scheduler';
import { TelemetryBus, ThresholdControl } from './telemetry';

export type LoopState = 'idle' | 'starting' | 'running' | 'stopping';

export type DetectionLoopDeps = {
	frameSource: FrameSource;
	runtime: InferenceRuntime;
	overlay?: OverlaySink;
	alerts?: AlertSink;
	bus?: TelemetryBus;
	threshold?: ThresholdControl;
	logger?: Logger;
	clock?: Clock;
	sleep?: Sleep;
};

type Session = {
	config: PipelineConfig;
	modelSize: Size;
	decoder: OutputDecoder;
	aggregator: DetectionAggregator;
	policy: AlertPolicy;
	overlayHold: OverlayHold;
	task: PeriodicTask;
	frameId: number;
	released: boolean;
};

/**
 * Drives one pipeline pass per tick: acquire, preprocess, infer, decode,
 * suppress, map, aggregate, alert, publish. Only one session runs at a time;
 * all session state is built in `start` and dropped in `stop`.
 */
export class DetectionLoop {
	readonly bus: TelemetryBus;
	readonly threshold: ThresholdControl;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private state: LoopState = 'idle';
	private session: Session | null = null;
	private starting: Promise<boolean> | null = null;
	private stopping: Promise<void> | null = null;

	constructor(private readonly deps: DetectionLoopDeps) {
		this.logger = deps.logger ?? console;
		this.bus = deps.bus ?? new TelemetryBus(this.logger);
		this.threshold = deps.threshold ?? new ThresholdControl(0.25);
		this.clock = deps.clock ?? systemClock;
	}

	get status(): LoopState {
		return this.state;
	}

	start(config: PipelineConfig): Promise<boolean> {
		if (this.state !== 'idle') {
			this.logger.warn(`[loop] start ignored, loop is ${this.state}`);
			return Promise.resolve(false);
		}
		this.state = 'starting';
		this.starting = this.open(config).finally(() => {
			this.starting = null;
		});
		return this.starting;
	}

	stop(): Promise<void> {
		if (this.stopping) return this.stopping;
		if (this.state === 'idle') return Promise.resolve();

		this.stopping = (async () => {
			if (this.starting) await this.starting.catch(() => false);
			this.state = 'stopping';
			const session = this.session;
			if (session) {
				await session.task.stop();
				await this.release(session);
			}
			this.session = null;
			this.state = 'idle';
			this.logger.log('[loop] stopped');
		})().finally(() => {
			this.stopping = null;
		});
		return this.stopping;
	}

	private async open(config: PipelineConfig): Promise<boolean> {
		const { frameSource, overlay } = this.deps;
		try {
			await frameSource.open?.();
		} catch (error) {
			this.state = 'idle';
			throw new PipelineStartError(`frame source rejected session start: ${describeError(error)}`, { cause: error });
		}
		try {
			await overlay?.open?.();
		} catch (error) {
			await this.releaseQuietly('frame source', () => frameSource.release?.());
			this.state = 'idle';
			throw new PipelineStartError(`overlay rejected session start: ${describeError(error)}`, { cause: error });
		}

		const session: Session = {
			config,
			modelSize: { width: config.model.inputSize, height: config.model.inputSize },
			decoder: createDecoder(config.model, config.denseGrid),
			aggregator: new DetectionAggregator(this.clock.now()),
			policy: new AlertPolicy(config.alert),
			overlayHold: new OverlayHold(config.overlayHoldFrames),
			task: new PeriodicTask((signal) => this.tick(signal), {
				targetIntervalMs: config.targetIntervalMs,
				minimumDelayMs: config.minimumDelayMs,
				clock: this.clock,
				sleep: this.deps.sleep,
				onError: (error) => this.logger.error('[loop] tick failed:', describeError(error)),
			}),
			frameId: 0,
			released: false,
		};
		this.session = session;
		this.threshold.set(config.confidenceThreshold);
		this.bus.reset();

		// stop() may have been requested while resources were opening
		if (this.stopping) return true;
		this.state = 'running';
		session.task.start();
		this.logger.log(`[loop] started with model '${config.model.id}' (${config.model.layout})`);
		return true;
	}

	private async tick(signal: AbortSignal): Promise<void> {
		const session = this.session;
		if (!session) return;
		const frameStart = this.clock.now();

		const frame = await this.acquire();
		if (signal.aborted) return;
		if (!frame) {
			this.publish(session, session.aggregator.recordSkip(this.clock.now()), this.bus.getSnapshot().detections);
			return;
		}

		const { model } = session.config;
		const input = prepareFrame(frame, session.modelSize, {
			normalization: model.normalization,
			layout: model.tensorLayout,
		});
		if (!input.ok) {
			this.logger.warn('[loop] frame skipped:', input.error);
			this.publish(session, session.aggregator.recordSkip(this.clock.now()), this.bus.getSnapshot().detections);
			return;
		}

		const output = await this.infer(input.tensor);
		if (signal.aborted) return;

		const decoded = output ? this.decode(session, output) : [];
		const kept = suppress(decoded, session.config.iouThreshold, session.config.maxDetections);
		const display = session.config.displaySize ?? { width: frame.width, height: frame.height };
		const detections = Object.freeze(
			scaleDetections(kept, session.modelSize, display).map((d) => Object.freeze({ ...d, box: Object.freeze(d.box) })),
		);

		const aggregate = session.aggregator.update(detections, frameStart, this.clock.now());
		const alert = session.policy.evaluate(detections, this.clock.now());
		if (alert) this.speak(alert.text);

		session.frameId++;
		this.updateOverlay(session.overlayHold.next(detections));
		this.publish(session, aggregate, detections);
		this.logger.debug(
			`[loop] frame ${session.frameId}: ${decoded.length} decoded, ${detections.length} kept, ${aggregate.performance.processingTimeMs.toFixed(1)}ms avg`,
		);
	}

	private async acquire(): Promise<RawFrame | null> {
		try {
			return await this.deps.frameSource.acquireLatestFrame();
		} catch (error) {
			this.logger.warn('[loop] frame acquisition failed:', describeError(error));
			return null;
		}
	}

	private async infer(tensor: Tensor): Promise<RawOutput | null> {
		try {
			return await this.deps.runtime.infer(tensor);
		} catch (error) {
			this.logger.warn('[loop] inference failed, frame has no detections:', describeError(error));
			return null;
		}
	}

	private decode(session: Session, output: RawOutput): Detection[] {
		const { width, height } = session.modelSize;
		try {
			return session.decoder.decode(output, this.threshold.get(), width, height);
		} catch (error) {
			if (!(error instanceof DecodeError)) throw error;
			this.logger.warn('[loop] malformed output discarded:', error.message);
			return [];
		}
	}

	private speak(text: string) {
		const { alerts } = this.deps;
		if (!alerts) return;
		try {
			const pending = alerts.speak(text);
			if (pending instanceof Promise) {
				pending.catch((error: unknown) => this.logger.warn('[loop] alert sink failed:', describeError(error)));
			}
			this.logger.log(`[loop] announced: ${text}`);
		} catch (error) {
			this.logger.warn('[loop] alert sink failed:', describeError(error));
		}
	}

	private updateOverlay(detections: readonly Detection[]) {
		try {
			this.deps.overlay?.update(detections);
		} catch (error) {
			this.logger.warn('[loop] overlay update failed:', describeError(error));
		}
	}

	private publish(session: Session, aggregate: AggregateSnapshot, detections: readonly Detection[]) {
		const snapshot: TelemetrySnapshot = Object.freeze({
			frameId: session.frameId,
			performance: aggregate.performance,
			hazards: aggregate.hazards,
			recent: aggregate.recent,
			detections,
		});
		this.bus.publish(snapshot);
	}

	private async release(session: Session) {
		if (session.released) return;
		session.released = true;
		await this.releaseQuietly('overlay', () => this.deps.overlay?.release?.());
		await this.releaseQuietly('frame source', () => this.deps.frameSource.release?.());
	}

	private async releaseQuietly(what: string, release: () => void | Promise<void>) {
		try {
			await release();
		} catch (error) {
			this.logger.warn(`[loop] ${what} release failed:`, describeError(error));
		}
	}
}
