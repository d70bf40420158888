import { openPDFBox, reportExit, type GlobalOptions } from './shared.js';
import type { SplitOptions } from '../core/pdfbox.js';

export interface SplitCommandOptions extends GlobalOptions, SplitOptions {}

export async function split(input: string, options: SplitCommandOptions): Promise<number> {
  const pdfbox = await openPDFBox(options);
  const proc = await pdfbox.splitFile(input, {
    password: options.password,
    split: options.split,
    startPage: options.startPage,
    endPage: options.endPage,
    outputPrefix: options.outputPrefix,
  });
  return reportExit(await proc.exited, 'PDFSplit', `Split ${input}`);
}
