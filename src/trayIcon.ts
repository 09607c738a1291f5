import * as fs from 'fs';
import * as path from 'path';
import { PNG } from 'pngjs';

import { describeError, IOError } from './errors';

/** Straight RGBA pixels, row-major, four bytes per pixel. */
export interface Bitmap {
	width: number;
	height: number;
	data: Uint8Array;
}

export const ICON_SIZE = 32;

const CHECKBOX_X = 6;
const CHECKBOX_SIZE = 3;
const CHECKBOX_SPACING = 6;
const FIRST_CHECKBOX_Y = 8;
const LINE_START_X = 12;
const LINE_LENGTH = 15;
const ROW_COUNT = 3;

/**
 * Draws the tray glyph: three hollow checkboxes stacked at x=6, each followed by a line starting at
 * x=12 on the checkbox's middle row. Everything else stays fully transparent.
 *
 * @returns A fresh 32×32 bitmap; identical on every call.
 */
export function generateIcon(): Bitmap {
	const bitmap: Bitmap = {
		width: ICON_SIZE,
		height: ICON_SIZE,
		data: new Uint8Array(ICON_SIZE * ICON_SIZE * 4),
	};

	for (let row = 0; row < ROW_COUNT; row += 1) {
		const top = FIRST_CHECKBOX_Y + row * CHECKBOX_SPACING;
		const last = CHECKBOX_SIZE - 1;
		for (let offset = 0; offset < CHECKBOX_SIZE; offset += 1) {
			setBlack(bitmap, CHECKBOX_X + offset, top);
			setBlack(bitmap, CHECKBOX_X + offset, top + last);
			setBlack(bitmap, CHECKBOX_X, top + offset);
			setBlack(bitmap, CHECKBOX_X + last, top + offset);
		}

		const lineY = top + Math.floor(CHECKBOX_SIZE / 2);
		for (let offset = 0; offset < LINE_LENGTH; offset += 1) {
			setBlack(bitmap, LINE_START_X + offset, lineY);
		}
	}
	return bitmap;
}

/**
 * Encodes a bitmap as an RGBA PNG.
 *
 * @param bitmap - Pixels to encode.
 */
export function encodeIcon(bitmap: Bitmap): Buffer {
	const png = new PNG({ width: bitmap.width, height: bitmap.height });
	png.data = Buffer.from(bitmap.data);
	return PNG.sync.write(png);
}

/**
 * Returns the absolute path of the tray icon, drawing and writing it only when the file does not
 * exist yet.
 *
 * @param iconFile - Icon location, relative to the working directory when not absolute.
 * @throws IOError when the icon has to be written and cannot be.
 */
export function ensureIconFile(iconFile: string): string {
	const absolute = path.resolve(iconFile);
	if (fs.existsSync(absolute)) {
		return absolute;
	}
	try {
		fs.writeFileSync(absolute, encodeIcon(generateIcon()));
	} catch (error) {
		throw new IOError(`Cannot write tray icon ${absolute}: ${describeError(error)}`, absolute);
	}
	return absolute;
}

function setBlack(bitmap: Bitmap, x: number, y: number): void {
	const offset = (y * bitmap.width + x) * 4;
	bitmap.data[offset] = 0;
	bitmap.data[offset + 1] = 0;
	bitmap.data[offset + 2] = 0;
	bitmap.data[offset + 3] = 255;
}
