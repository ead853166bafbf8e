import type { Size } from '@roadwatch/shared';
import { ConfigError } from './errors';
import type { ModelConfig } from './models';

export type AlertStrategy = 'hazard-set' | 'lead-detection';

export type AlertPolicyConfig = {
	enabled: boolean;
	strategy: AlertStrategy;
	debounceMs: number;
};

export type DenseGridOptions = {
	objectnessGate: number; // cheap pre-filter before class scoring
	minBoxSize: number; // px in target space
};

export type PipelineConfig = {
	model: ModelConfig;
	confidenceThreshold: number;
	iouThreshold: number;
	maxDetections: number;
	targetIntervalMs: number;
	minimumDelayMs: number;
	displaySize: Size | null; // null = publish in source frame space
	overlayHoldFrames: number; // overlay takes an empty list only on every Nth frame
	denseGrid: DenseGridOptions;
	alert: AlertPolicyConfig;
};

export type PipelineOverrides = Partial<Omit<PipelineConfig, 'model' | 'denseGrid' | 'alert'>> & {
	denseGrid?: Partial<DenseGridOptions>;
	alert?: Partial<AlertPolicyConfig>;
};

export const DEFAULTS = {
	confidenceThreshold: 0.25,
	iouThreshold: 0.45,
	maxDetections: 50,
	targetIntervalMs: 200,
	minimumDelayMs: 10,
	displaySize: null,
	overlayHoldFrames: 3,
	denseGrid: { objectnessGate: 0.03, minBoxSize: 10 },
	alert: { enabled: true, strategy: 'hazard-set', debounceMs: 3000 },
} as const satisfies Omit<PipelineConfig, 'model'>;

function requireRange(name: string, value: number, min: number, max: number) {
	if (!Number.isFinite(value) || value < min || value > max) {
		throw new ConfigError(`${name} must be within [${min}, ${max}], got ${value}`);
	}
}

export function resolvePipelineConfig(model: ModelConfig, overrides: PipelineOverrides = {}): PipelineConfig {
	const config: PipelineConfig = {
		model,
		confidenceThreshold: overrides.confidenceThreshold ?? DEFAULTS.confidenceThreshold,
		iouThreshold: overrides.iouThreshold ?? DEFAULTS.iouThreshold,
		maxDetections: overrides.maxDetections ?? DEFAULTS.maxDetections,
		targetIntervalMs: overrides.targetIntervalMs ?? DEFAULTS.targetIntervalMs,
		minimumDelayMs: overrides.minimumDelayMs ?? DEFAULTS.minimumDelayMs,
		displaySize: overrides.displaySize ?? DEFAULTS.displaySize,
		overlayHoldFrames: overrides.overlayHoldFrames ?? DEFAULTS.overlayHoldFrames,
		denseGrid: { ...DEFAULTS.denseGrid, ...overrides.denseGrid },
		alert: { ...DEFAULTS.alert, ...overrides.alert },
	};

	requireRange('confidenceThreshold', config.confidenceThreshold, 0, 1);
	requireRange('iouThreshold', config.iouThreshold, 0, 1);
	requireRange('maxDetections', config.maxDetections, 1, Number.MAX_SAFE_INTEGER);
	requireRange('targetIntervalMs', config.targetIntervalMs, 0, 60_000);
	requireRange('minimumDelayMs', config.minimumDelayMs, 0, 60_000);
	requireRange('overlayHoldFrames', config.overlayHoldFrames, 1, 1000);
	if (!Number.isInteger(config.overlayHoldFrames)) {
		throw new ConfigError(`overlayHoldFrames must be an integer, got ${config.overlayHoldFrames}`);
	}
	requireRange('denseGrid.objectnessGate', config.denseGrid.objectnessGate, 0, 1);
	requireRange('denseGrid.minBoxSize', config.denseGrid.minBoxSize, 0, Number.MAX_SAFE_INTEGER);
	requireRange('alert.debounceMs', config.alert.debounceMs, 0, Number.MAX_SAFE_INTEGER);
	if (config.alert.strategy !== 'hazard-set' && config.alert.strategy !== 'lead-detection') {
		throw new ConfigError(`alert.strategy must be hazard-set or lead-detection, got ${String(config.alert.strategy)}`);
	}
	if (config.displaySize && (config.displaySize.width <= 0 || config.displaySize.height <= 0)) {
		throw new ConfigError('displaySize must have positive width and height');
	}
	return config;
}
