// Shared types for frames, tensors, detections and telemetry

export type Size = {
	width: number;
	height: number;
};

export type Box = {
	left: number;
	top: number;
	right: number;
	bottom: number;
};

export const HAZARD_CATEGORIES = ['pedestrian', 'pothole', 'hump', 'animal', 'roadwork'] as const;

export type HazardCategory = (typeof HAZARD_CATEGORIES)[number];

export const UNKNOWN_LABEL = 'unknown';

export type Detection = {
	box: Box;
	label: string; // class name from the model's table, or 'unknown'
	category: HazardCategory | null; // null = unknown bucket, never counted
	score: number; // 0..1
};

export type RawFrame = {
	width: number;
	height: number;
	data: Uint8Array | Uint8ClampedArray; // RGBA, row-major
	rowStride?: number; // bytes per row, defaults to width * 4
};

export type TensorLayout = 'nhwc' | 'nchw';

export type Tensor = {
	data: Float32Array;
	dims: readonly number[];
	layout: TensorLayout;
};

export type FilteredOutput = {
	kind: 'filtered';
	boxes: ArrayLike<number>; // 4 * N, xMin,yMin,xMax,yMax in model-native pixels
	labels: ArrayLike<number>; // N class ids
	scores: ArrayLike<number>; // N
};

export type DenseGridOutput = {
	kind: 'dense-grid';
	data: ArrayLike<number>; // channel-major: data[c * anchors + k]
	channels: number;
	anchors: number;
};

export type RawOutput = FilteredOutput | DenseGridOutput;

export type OutputLayout = RawOutput['kind'];

export type PerformanceSnapshot = {
	readonly fps: number;
	readonly processingTimeMs: number; // mean of the rolling window
	readonly totalDetections: number;
	readonly avgConfidence: number;
	readonly sessionDurationMs: number;
	readonly framesProcessed: number;
	readonly skippedTicks: number;
};

export type HazardStatsSnapshot = Readonly<Record<HazardCategory, number>>;

export type TelemetrySnapshot = {
	readonly frameId: number; // 0 before the first processed frame
	readonly performance: PerformanceSnapshot;
	readonly hazards: HazardStatsSnapshot;
	readonly recent: readonly Detection[]; // most recent first, capacity 10
	readonly detections: readonly Detection[]; // current frame, display space
};

// External collaborators

export interface FrameSource {
	open?(): void | Promise<void>;
	acquireLatestFrame(): RawFrame | null | Promise<RawFrame | null>;
	release?(): void | Promise<void>;
}

export interface InferenceRuntime {
	infer(tensor: Tensor): Promise<RawOutput>;
	dispose?(): Promise<void>;
}

export interface OverlaySink {
	open?(): void | Promise<void>;
	update(detections: readonly Detection[]): void;
	release?(): void | Promise<void>;
}

export interface AlertSink {
	speak(message: string): void | Promise<void>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error' | 'debug'>;
