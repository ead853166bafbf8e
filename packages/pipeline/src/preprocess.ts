import type { RawFrame, Size, Tensor, TensorLayout } from '@roadwatch/shared';
import type { Normalization } from './models';

export const IMAGENET_MEAN: readonly [number, number, number] = [0.485, 0.456, 0.406];
export const IMAGENET_STD: readonly [number, number, number] = [0.229, 0.224, 0.225];

const BYTES_PER_PIXEL = 4;

export type PrepareOptions = {
	normalization: Normalization;
	layout: TensorLayout;
	mean?: readonly [number, number, number];
	std?: readonly [number, number, number];
};

export type PrepareResult = { ok: true; tensor: Tensor } | { ok: false; error: string };

/**
 * Resamples an RGBA frame (possibly row-padded) to `target` with bilinear
 * interpolation on half-pixel centers and normalizes it into a float tensor,
 * [1,H,W,3] for nhwc or [1,3,H,W] for nchw.
 */
export function prepareFrame(frame: RawFrame, target: Size, options: PrepareOptions): PrepareResult {
	const { width: srcW, height: srcH, data } = frame;
	if (srcW <= 0 || srcH <= 0) return { ok: false, error: `empty frame ${srcW}x${srcH}` };
	if (target.width <= 0 || target.height <= 0) {
		return { ok: false, error: `invalid target ${target.width}x${target.height}` };
	}
	const stride = frame.rowStride ?? srcW * BYTES_PER_PIXEL;
	if (stride < srcW * BYTES_PER_PIXEL) return { ok: false, error: `row stride ${stride} shorter than a row` };
	if (data.length < stride * (srcH - 1) + srcW * BYTES_PER_PIXEL) {
		return { ok: false, error: `buffer of ${data.length} bytes too short for ${srcW}x${srcH} at stride ${stride}` };
	}

	const mean = options.normalization === 'standard' ? options.mean ?? IMAGENET_MEAN : [0, 0, 0];
	const std = options.normalization === 'standard' ? options.std ?? IMAGENET_STD : [1, 1, 1];

	const dstW = target.width;
	const dstH = target.height;
	const plane = dstW * dstH;
	const out = new Float32Array(plane * 3);
	const scaleX = srcW / dstW;
	const scaleY = srcH / dstH;

	for (let y = 0; y < dstH; y++) {
		const sy = Math.min(srcH - 1, Math.max(0, (y + 0.5) * scaleY - 0.5));
		const y0 = Math.floor(sy);
		const y1 = Math.min(srcH - 1, y0 + 1);
		const fy = sy - y0;
		for (let x = 0; x < dstW; x++) {
			const sx = Math.min(srcW - 1, Math.max(0, (x + 0.5) * scaleX - 0.5));
			const x0 = Math.floor(sx);
			const x1 = Math.min(srcW - 1, x0 + 1);
			const fx = sx - x0;

			const p00 = y0 * stride + x0 * BYTES_PER_PIXEL;
			const p01 = y0 * stride + x1 * BYTES_PER_PIXEL;
			const p10 = y1 * stride + x0 * BYTES_PER_PIXEL;
			const p11 = y1 * stride + x1 * BYTES_PER_PIXEL;
			const i = y * dstW + x;

			for (let c = 0; c < 3; c++) {
				const top = data[p00 + c] * (1 - fx) + data[p01 + c] * fx;
				const bottom = data[p10 + c] * (1 - fx) + data[p11 + c] * fx;
				const value = (top * (1 - fy) + bottom * fy) / 255;
				const normalized = (value - mean[c]) / std[c];
				if (options.layout === 'nchw') out[c * plane + i] = normalized;
				else out[i * 3 + c] = normalized;
			}
		}
	}

	const dims = options.layout === 'nchw' ? [1, 3, dstH, dstW] : [1, dstH, dstW, 3];
	return { ok: true, tensor: { data: out, dims, layout: options.layout } };
}
