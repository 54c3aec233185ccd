/**
 * Cell rasterization shared by every backend
 */

import type { Cell, Color, Font, Image, Size } from './types';

export const PLAIN_FONT: Font = { bold: false, underline: false };

function blankCell(bg: Color | null): Cell {
  return { char: ' ', fg: null, bg, bold: false, underline: false };
}

/**
 * Rasterize a message into a block of cells.
 * Lines split on '\n'; width is the longest line in code points and
 * shorter lines are padded with the background colour.
 */
export function rasterizeText(
  message: string,
  font: Font,
  color: Color,
  background: Color | null
): Image {
  const lines = message.split('\n').map(line => [...line]);
  const width = Math.max(0, ...lines.map(chars => chars.length));

  const cells = lines.map(chars => {
    const row: Cell[] = [];
    for (let i = 0; i < width; i++) {
      const char = chars[i];
      row.push(char === undefined
        ? blankCell(background)
        : { char, fg: color, bg: background, bold: font.bold, underline: font.underline });
    }
    return row;
  });

  return { width, height: lines.length, cells };
}

/**
 * A solid block of the given colour
 */
export function fillImage(size: Size, color: Color): Image {
  const width = Math.max(0, Math.floor(size.width));
  const height = Math.max(0, Math.floor(size.height));
  const cells: Cell[][] = [];
  for (let y = 0; y < height; y++) {
    const row: Cell[] = [];
    for (let x = 0; x < width; x++) row.push(blankCell(color));
    cells.push(row);
  }
  return { width, height, cells };
}

/**
 * Plain text of an image, one string per row (for logs and tests)
 */
export function imageText(image: Image): string[] {
  return image.cells.map(row => row.map(cell => cell.char).join(''));
}
