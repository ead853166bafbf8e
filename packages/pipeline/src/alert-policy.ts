import type { Detection, HazardCategory } from '@roadwatch/shared';
import type { AlertPolicyConfig } from './config';

export const MULTIPLE_HAZARDS_MESSAGE = 'Multiple hazards detected';

export const HAZARD_PHRASES: Readonly<Record<HazardCategory, string>> = {
	pedestrian: 'Pedestrian ahead',
	pothole: 'Pothole ahead',
	hump: 'Speed hump ahead',
	animal: 'Animal on road',
	roadwork: 'Road work ahead',
};

export type AlertMessage = {
	text: string;
	keys: readonly string[];
	at: number;
};

type AlertState = {
	keys: ReadonlySet<string>;
	lead: string | null;
	at: number;
};

function hazardKey(d: Detection): string {
	return d.category ?? d.label;
}

function phraseFor(d: Detection): string {
	return d.category ? HAZARD_PHRASES[d.category] : `${d.label} detected`;
}

function sameKeys(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
	if (a.size !== b.size) return false;
	for (const key of a) if (!b.has(key)) return false;
	return true;
}

/**
 * Decides when and what to announce. `hazard-set` speaks when the set of
 * distinct hazards changes and the debounce window has passed; `lead-detection`
 * looks only at the first (highest score) detection and holds back a repeat of
 * the same label inside the window.
 */
export class AlertPolicy {
	private state: AlertState = { keys: new Set(), lead: null, at: Number.NEGATIVE_INFINITY };

	constructor(private readonly config: AlertPolicyConfig) {}

	evaluate(detections: readonly Detection[], now: number): AlertMessage | null {
		if (!this.config.enabled || detections.length === 0) return null;
		return this.config.strategy === 'lead-detection'
			? this.evaluateLead(detections, now)
			: this.evaluateSet(detections, now);
	}

	reset(): void {
		this.state = { keys: new Set(), lead: null, at: Number.NEGATIVE_INFINITY };
	}

	private evaluateSet(detections: readonly Detection[], now: number): AlertMessage | null {
		if (now - this.state.at < this.config.debounceMs) return null;

		const byKey = new Map<string, Detection>();
		for (const d of detections) {
			const key = hazardKey(d);
			if (!byKey.has(key)) byKey.set(key, d);
		}
		const keys = new Set(byKey.keys());
		if (sameKeys(keys, this.state.keys)) return null;

		const [first] = byKey.values();
		if (!first) return null;
		const text = keys.size > 1 ? MULTIPLE_HAZARDS_MESSAGE : phraseFor(first);

		this.state = { keys, lead: hazardKey(first), at: now };
		return { text, keys: [...keys], at: now };
	}

	private evaluateLead(detections: readonly Detection[], now: number): AlertMessage | null {
		const [lead] = detections;
		if (!lead) return null;
		const key = hazardKey(lead);
		if (key === this.state.lead && now - this.state.at < this.config.debounceMs) return null;

		this.state = { keys: new Set([key]), lead: key, at: now };
		return { text: phraseFor(lead), keys: [key], at: now };
	}
}
