import path from 'node:path';
import {
	DetectionLoop,
	OrtInferenceRuntime,
	resolveModel,
	resolvePipelineConfig,
	type Clock,
	type ModelConfig,
	type Sleep,
} from '@roadwatch/pipeline';
import type { InferenceRuntime, Logger } from '@roadwatch/shared';
import type { ReplayOptions } from './cli';
import { PngDirectoryFrameSource } from './frame-source';
import { BenchRecorder, type BenchReport } from './metrics';
import { ConsoleAlertSink, ConsoleOverlaySink } from './sinks';

export type ReplayDeps = {
	logger?: Logger;
	resolve?: (id: string) => ModelConfig;
	createRuntime?: (modelPath: string, model: ModelConfig) => Promise<InferenceRuntime>;
	clock?: Clock;
	sleep?: Sleep;
	signal?: AbortSignal; // external stop (SIGINT)
};

/**
 * Replays a directory of frames through the detection loop until the frames
 * run out, the bench window closes, or `signal` aborts. Returns the bench
 * summary, also written to `options.out` when set.
 */
export async function runReplay(options: ReplayOptions, deps: ReplayDeps = {}): Promise<BenchReport | null> {
	const logger = deps.logger ?? console;
	const model = (deps.resolve ?? resolveModel)(options.model);
	const config = resolvePipelineConfig(model, options.overrides);
	const modelPath = path.join(options.modelDir, model.file);
	const runtime = await (deps.createRuntime ?? ((p, m) => OrtInferenceRuntime.create(p, m, { logger })))(modelPath, model);

	const frameSource = new PngDirectoryFrameSource(options.frames, { loop: options.loop });
	const loop = new DetectionLoop({
		frameSource,
		runtime,
		overlay: new ConsoleOverlaySink(logger),
		alerts: new ConsoleAlertSink(logger),
		logger,
		clock: deps.clock,
		sleep: deps.sleep,
	});
	const recorder = new BenchRecorder(model.id);

	try {
		await new Promise<void>((resolve, reject) => {
			let benchTimer: ReturnType<typeof setTimeout> | null = null;
			const finish = () => {
				if (benchTimer) clearTimeout(benchTimer);
				unsubscribe();
				deps.signal?.removeEventListener('abort', finish);
				resolve();
			};
			const unsubscribe = loop.bus.subscribe((snapshot) => {
				recorder.record(snapshot);
				if (frameSource.exhausted) finish();
			});
			deps.signal?.addEventListener('abort', finish, { once: true });

			loop.start(config).then(
				() => {
					logger.log(`[replay] ${frameSource.frameCount} frames from ${options.frames}`);
					if (options.bench > 0) benchTimer = setTimeout(finish, options.bench * 1000);
					if (deps.signal?.aborted) finish();
				},
				(error: unknown) => {
					unsubscribe();
					reject(error);
				},
			);
		});
	} finally {
		await loop.stop();
		await runtime.dispose?.();
	}

	const report = options.out ? await recorder.write(options.out) : recorder.report();
	if (report) {
		logger.log(
			`[replay] ${report.frames} frames, ${report.detections} detections, fps median ${report.fps.median.toFixed(1)}, processing p95 ${report.processing_ms.p95.toFixed(1)}ms`,
		);
		if (options.out) logger.log(`[replay] metrics written to ${options.out}`);
	}
	return report;
}
