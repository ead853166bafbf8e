import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { PNG } from 'pngjs';
import type { FrameSource, RawFrame } from '@roadwatch/shared';

export type PngDirectoryOptions = {
	loop?: boolean; // start over after the last frame instead of running dry
};

/**
 * Plays the PNG files of a directory in name order, one per acquire. Stands in
 * for screen capture when replaying recorded drives.
 */
export class PngDirectoryFrameSource implements FrameSource {
	private files: string[] = [];
	private next = 0;
	private opened = false;

	constructor(
		private readonly dir: string,
		private readonly options: PngDirectoryOptions = {},
	) {}

	get exhausted(): boolean {
		return this.opened && !this.options.loop && this.next >= this.files.length;
	}

	get frameCount(): number {
		return this.files.length;
	}

	async open(): Promise<void> {
		const entries = await readdir(this.dir);
		const files = entries.filter((f) => f.toLowerCase().endsWith('.png')).sort();
		if (files.length === 0) throw new Error(`no .png frames in ${this.dir}`);
		this.files = files.map((f) => path.join(this.dir, f));
		this.next = 0;
		this.opened = true;
	}

	async acquireLatestFrame(): Promise<RawFrame | null> {
		if (!this.opened) return null;
		if (this.next >= this.files.length) {
			if (!this.options.loop) return null;
			this.next = 0;
		}
		const file = this.files[this.next++];
		const png = PNG.sync.read(await readFile(file));
		return { width: png.width, height: png.height, data: png.data };
	}

	release(): void {
		this.opened = false;
		this.files = [];
		this.next = 0;
	}
}
