import type { AlertSink, Detection, Logger, OverlaySink } from '@roadwatch/shared';

export function formatDetection(d: Detection): string {
	const { left, top, right, bottom } = d.box;
	return `${d.label} ${(d.score * 100).toFixed(0)}% [${left.toFixed(0)},${top.toFixed(0)},${right.toFixed(0)},${bottom.toFixed(0)}]`;
}

/** Prints what an on-screen overlay would draw. Quiet while nothing is in view. */
export class ConsoleOverlaySink implements OverlaySink {
	private lastLine = '';

	constructor(private readonly logger: Logger = console) {}

	update(detections: readonly Detection[]): void {
		const line = detections.map(formatDetection).join(' | ');
		if (line === this.lastLine) return;
		this.lastLine = line;
		this.logger.log(line ? `[overlay] ${line}` : '[overlay] clear');
	}

	release(): void {
		this.lastLine = '';
	}
}

export const SPOKEN_HISTORY = 20;

/** Logs announcements and keeps the latest few. */
export class ConsoleAlertSink implements AlertSink {
	readonly spoken: string[] = [];

	constructor(private readonly logger: Logger = console) {}

	speak(message: string): void {
		this.spoken.push(message);
		if (this.spoken.length > SPOKEN_HISTORY) this.spoken.shift();
		this.logger.log(`[alert] ${message}`);
	}
}
