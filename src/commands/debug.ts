import { openPDFBox, reportExit, type GlobalOptions } from './shared.js';
import type { DebuggerOptions } from '../core/pdfbox.js';

export interface DebugCommandOptions extends GlobalOptions, DebuggerOptions {}

export async function debugDocument(input: string, options: DebugCommandOptions): Promise<number> {
  const pdfbox = await openPDFBox(options);
  const proc = await pdfbox.pdfDebugger(input, {
    password: options.password,
    viewStructure: options.viewStructure,
  });
  return reportExit(await proc.exited, 'PDFDebugger', 'Debugger closed');
}
