import { readFile } from 'node:fs/promises';
import * as ort from 'onnxruntime-web';
import type { InferenceRuntime, Logger, RawOutput, Tensor } from '@roadwatch/shared';
import { DecodeError, PipelineStartError, describeError } from '../errors';
import type { ModelConfig } from '../models';

export type OrtRuntimeOptions = {
	logger?: Logger;
	numThreads?: number;
};

function numericData(tensor: ort.Tensor, name: string): ArrayLike<number> {
	const { data } = tensor;
	if (data instanceof BigInt64Array || data instanceof BigUint64Array) return Float64Array.from(data, Number);
	if (Array.isArray(data)) throw new DecodeError(`output '${name}' holds strings, expected numbers`);
	return data;
}

/**
 * InferenceRuntime over an onnxruntime-web session (wasm backend). Turns the
 * session's named outputs into the RawOutput variant the model declares.
 */
export class OrtInferenceRuntime implements InferenceRuntime {
	private constructor(
		private readonly session: ort.InferenceSession,
		private readonly model: ModelConfig,
		private readonly logger: Logger,
	) {}

	static async create(modelPath: string, model: ModelConfig, options: OrtRuntimeOptions = {}): Promise<OrtInferenceRuntime> {
		const logger = options.logger ?? console;
		ort.env.wasm.numThreads = options.numThreads ?? 1;
		ort.env.wasm.proxy = false;

		let session: ort.InferenceSession;
		try {
			const bytes = await readFile(modelPath);
			session = await ort.InferenceSession.create(new Uint8Array(bytes), {
				executionProviders: ['wasm'],
				graphOptimizationLevel: 'basic',
			});
		} catch (error) {
			throw new PipelineStartError(`cannot load model '${model.id}' from ${modelPath}: ${describeError(error)}`, {
				cause: error,
			});
		}
		if (session.inputNames.length === 0) {
			throw new PipelineStartError(`model '${model.id}' declares no inputs`);
		}
		logger.log(`[ort] model '${model.id}' loaded, inputs: ${session.inputNames.join(', ')}, outputs: ${session.outputNames.join(', ')}`);
		return new OrtInferenceRuntime(session, model, logger);
	}

	async infer(tensor: Tensor): Promise<RawOutput> {
		const feeds: Record<string, ort.Tensor> = {};
		feeds[this.session.inputNames[0]] = new ort.Tensor('float32', tensor.data, [...tensor.dims]);
		const results = await this.session.run(feeds);
		return this.model.layout === 'filtered' ? this.toFiltered(results) : this.toDenseGrid(results);
	}

	async dispose(): Promise<void> {
		await this.session.release();
		this.logger.log(`[ort] model '${this.model.id}' released`);
	}

	private output(results: ort.InferenceSession.OnnxValueMapType, key: string, fallbackIndex: number): [string, ort.Tensor] {
		const name = this.model.outputs[key] ?? this.session.outputNames[fallbackIndex];
		const value = name === undefined ? undefined : results[name];
		if (name === undefined || !value) throw new DecodeError(`model output '${key}' is missing`);
		return [name, value];
	}

	private toDenseGrid(results: ort.InferenceSession.OnnxValueMapType): RawOutput {
		const [name, grid] = this.output(results, 'grid', 0);
		const dims = grid.dims.length === 3 && grid.dims[0] === 1 ? grid.dims.slice(1) : grid.dims;
		if (dims.length !== 2) throw new DecodeError(`output '${name}' has shape [${grid.dims.join(', ')}], expected [1, C, B]`);
		return { kind: 'dense-grid', data: numericData(grid, name), channels: dims[0], anchors: dims[1] };
	}

	private toFiltered(results: ort.InferenceSession.OnnxValueMapType): RawOutput {
		const [boxesName, boxes] = this.output(results, 'boxes', 0);
		const [labelsName, labels] = this.output(results, 'labels', 1);
		const [scoresName, scores] = this.output(results, 'scores', 2);
		return {
			kind: 'filtered',
			boxes: numericData(boxes, boxesName),
			labels: numericData(labels, labelsName),
			scores: numericData(scores, scoresName),
		};
	}
}
