import path from 'node:path';
import { parseArgs } from 'node:util';
import { ConfigError, type AlertStrategy, type PipelineOverrides } from '@roadwatch/pipeline';

export type ReplayOptions = {
	frames: string;
	model: string;
	modelDir: string;
	bench: number; // seconds, 0 = until the frames run out
	out: string | null;
	loop: boolean;
	overrides: PipelineOverrides;
};

export const USAGE = `usage: replay --frames <dir> [--model focusnet] [--model-dir models]
              [--conf 0.25] [--iou 0.45] [--interval 200] [--display 1080x2340]
              [--alerts hazard-set|lead-detection|off] [--bench <sec>] [--out metrics.json] [--loop]`;

function numberFlag(name: string, raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number(raw);
	if (!Number.isFinite(value)) throw new ConfigError(`--${name} expects a number, got '${raw}'`);
	return value;
}

function parseSize(raw: string | undefined): { width: number; height: number } | undefined {
	if (raw === undefined) return undefined;
	const match = /^(\d+)x(\d+)$/.exec(raw);
	if (!match) throw new ConfigError(`--display expects WIDTHxHEIGHT, got '${raw}'`);
	return { width: Number(match[1]), height: Number(match[2]) };
}

function parseAlerts(raw: string | undefined): PipelineOverrides['alert'] {
	if (raw === undefined) return undefined;
	if (raw === 'off') return { enabled: false };
	const strategies: readonly AlertStrategy[] = ['hazard-set', 'lead-detection'];
	const strategy = strategies.find((s) => s === raw);
	if (!strategy) throw new ConfigError(`--alerts expects hazard-set, lead-detection or off, got '${raw}'`);
	return { enabled: true, strategy };
}

export function parseReplayArgs(argv: string[]): ReplayOptions {
	const { values } = parseArgs({
		args: argv,
		options: {
			frames: { type: 'string' },
			model: { type: 'string', default: 'focusnet' },
			'model-dir': { type: 'string', default: 'models' },
			conf: { type: 'string' },
			iou: { type: 'string' },
			interval: { type: 'string' },
			display: { type: 'string' },
			alerts: { type: 'string' },
			bench: { type: 'string', default: '0' },
			out: { type: 'string' },
			loop: { type: 'boolean', default: false },
		},
		strict: true,
	});

	if (!values.frames) throw new ConfigError(`--frames is required\n${USAGE}`);

	return {
		frames: path.resolve(values.frames),
		model: values.model ?? 'focusnet',
		modelDir: path.resolve(values['model-dir'] ?? 'models'),
		bench: numberFlag('bench', values.bench) ?? 0,
		out: values.out ? path.resolve(values.out) : null,
		loop: values.loop ?? false,
		overrides: {
			confidenceThreshold: numberFlag('conf', values.conf),
			iouThreshold: numberFlag('iou', values.iou),
			targetIntervalMs: numberFlag('interval', values.interval),
			displaySize: parseSize(values.display),
			alert: parseAlerts(values.alerts),
		},
	};
}
