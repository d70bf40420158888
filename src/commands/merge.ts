import { openPDFBox, reportExit, type GlobalOptions } from './shared.js';
import { icons } from '../utils/output.js';

export async function merge(target: string, sources: string[], options: GlobalOptions): Promise<number> {
  const pdfbox = await openPDFBox(options);
  const proc = await pdfbox.merge(sources, target);
  if (!proc) {
    console.error(`${icons.error} Nothing merged: give at least two source files`);
    return 1;
  }
  return reportExit(await proc.exited, 'PDFMerger', `Merged ${sources.length} files into ${target}`);
}
