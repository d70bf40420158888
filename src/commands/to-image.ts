import { InvalidArgumentError } from 'commander';
import { openPDFBox, reportExit, type GlobalOptions } from './shared.js';
import type { CropBox, ToImageOptions } from '../core/pdfbox.js';

export interface ToImageCommandOptions extends GlobalOptions, Omit<ToImageOptions, 'cropbox'> {
  cropbox?: string[];
}

export function parseCropBox(values: string[]): CropBox {
  const numbers = values.map(Number);
  if (numbers.length !== 4 || numbers.some((n) => Number.isNaN(n))) {
    throw new InvalidArgumentError(`--cropbox takes four numbers, got "${values.join(' ')}".`);
  }
  const [x1, y1, x2, y2] = numbers;
  return [x1, y1, x2, y2];
}

export async function toImage(input: string, options: ToImageCommandOptions): Promise<number> {
  const cropbox = options.cropbox ? parseCropBox(options.cropbox) : undefined;
  const pdfbox = await openPDFBox(options);
  const proc = await pdfbox.toImage(input, {
    password: options.password,
    imageType: options.imageType,
    outputPrefix: options.outputPrefix,
    startPage: options.startPage,
    endPage: options.endPage,
    page: options.page,
    dpi: options.dpi,
    color: options.color,
    cropbox,
    time: options.time,
  });
  return reportExit(await proc.exited, 'PDFToImage', `Rendered ${input}`);
}
