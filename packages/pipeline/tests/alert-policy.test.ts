import { describe, expect, it } from 'vitest';
import { AlertPolicy, MULTIPLE_HAZARDS_MESSAGE } from '../src/alert-policy';
import type { AlertPolicyConfig } from '../src/config';
import { det } from './fixtures';

const pedestrian = det(0, 0, 10, 10, 0.9, 'pedestrian');
const pothole = det(20, 0, 30, 10, 0.8, 'pothole');
const hump = det(40, 0, 50, 10, 0.7, 'hump');

function policy(overrides: Partial<AlertPolicyConfig> = {}) {
	return new AlertPolicy({ enabled: true, strategy: 'hazard-set', debounceMs: 3000, ...overrides });
}

describe('AlertPolicy (hazard-set)', () => {
	it('announces a single hazard with its phrase', () => {
		expect(policy().evaluate([pedestrian], 0)?.text).toBe('Pedestrian ahead');
		expect(policy().evaluate([hump], 0)?.text).toBe('Speed hump ahead');
	});

	it('announces several distinct hazards generically', () => {
		const alert = policy().evaluate([pedestrian, pothole, det(0, 0, 5, 5, 0.4, 'pedestrian')], 0);
		expect(alert?.text).toBe(MULTIPLE_HAZARDS_MESSAGE);
		expect(alert?.keys).toEqual(['pedestrian', 'pothole']);
	});

	it('stays quiet for the same hazards inside the debounce window', () => {
		const p = policy();
		expect(p.evaluate([pothole], 1000)).not.toBeNull();
		expect(p.evaluate([pothole], 1200)).toBeNull();
	});

	it('speaks again once the set changes and the window has passed', () => {
		const p = policy();
		p.evaluate([pothole], 1000);
		expect(p.evaluate([pothole, pedestrian], 2000)).toBeNull();
		expect(p.evaluate([pothole, pedestrian], 4000)?.text).toBe(MULTIPLE_HAZARDS_MESSAGE);
	});

	it('does not repeat an unchanged set even after the window', () => {
		const p = policy();
		p.evaluate([pothole], 0);
		expect(p.evaluate([pothole], 10_000)).toBeNull();
	});

	it('leaves its state alone when nothing is detected', () => {
		const p = policy();
		p.evaluate([pothole], 0);
		expect(p.evaluate([], 5000)).toBeNull();
		expect(p.evaluate([pothole], 6000)).toBeNull();
		expect(p.evaluate([hump], 6000)?.text).toBe('Speed hump ahead');
	});

	it('names labels outside the hazard categories', () => {
		expect(policy().evaluate([det(0, 0, 1, 1, 0.9, null, 'debris')], 0)?.text).toBe('debris detected');
	});

	it('is silent when disabled', () => {
		expect(policy({ enabled: false }).evaluate([pedestrian], 0)).toBeNull();
	});
});

describe('AlertPolicy (lead-detection)', () => {
	it('announces only the first detection', () => {
		expect(policy({ strategy: 'lead-detection' }).evaluate([pothole, pedestrian], 0)?.text).toBe('Pothole ahead');
	});

	it('debounces a repeated label but not a new one', () => {
		const p = policy({ strategy: 'lead-detection' });
		p.evaluate([pothole], 0);
		expect(p.evaluate([pothole, pedestrian], 1000)).toBeNull();
		expect(p.evaluate([pedestrian], 1500)?.text).toBe('Pedestrian ahead');
		expect(p.evaluate([pedestrian], 4000)).toBeNull();
		expect(p.evaluate([pedestrian], 4500)?.text).toBe('Pedestrian ahead');
	});
});
