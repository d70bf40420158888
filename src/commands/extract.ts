import { openPDFBox, reportExit, type GlobalOptions } from './shared.js';
import type { ExtractTextOptions } from '../core/pdfbox.js';

export interface ExtractCommandOptions extends GlobalOptions, Omit<ExtractTextOptions, 'outputPath'> {}

export async function extract(
  input: string,
  output: string | undefined,
  options: ExtractCommandOptions,
): Promise<number> {
  const pdfbox = await openPDFBox(options);
  const textOptions: Omit<ExtractTextOptions, 'outputPath'> = {
    password: options.password,
    encoding: options.encoding,
    html: options.html,
    sort: options.sort,
    ignoreBeads: options.ignoreBeads,
    startPage: options.startPage,
    endPage: options.endPage,
    alwaysNext: options.alwaysNext,
  };

  if (!output) {
    const text = await pdfbox.extractText(input, textOptions);
    process.stdout.write(text);
    return 0;
  }

  const proc = await pdfbox.extractText(input, { ...textOptions, outputPath: output });
  const exit = await proc.exited;
  if (exit.code !== 0) {
    process.stderr.write(await proc.stderr);
  }
  return reportExit(exit, 'ExtractText', `Text written to ${output}`);
}
