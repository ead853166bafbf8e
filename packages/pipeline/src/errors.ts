export class PipelineError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Invalid pipeline overrides (threshold out of range, negative interval...). */
export class ConfigError extends PipelineError {}

/** Unknown model id or a malformed entry in models.json. */
export class ModelConfigError extends PipelineError {}

/** Output tensor does not match the layout the model declares. Frame-local. */
export class DecodeError extends PipelineError {}

/** Session could not acquire its capture or display resources. */
export class PipelineStartError extends PipelineError {}

export function describeError(error: unknown): string {
	if (error instanceof Error) return `${error.name}: ${error.message}`;
	return String(error);
}
