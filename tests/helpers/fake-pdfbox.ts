import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Stand-in for `java -jar pdfbox-app.jar`. "Documents" are UTF-8 text files
 * whose pages are separated by form feeds. Every invocation's arguments are
 * appended as a JSON line to $FAKE_PDFBOX_LOG when set.
 */
const FAKE_JAVA_SOURCE = String.raw`
const fs = require('node:fs');
const path = require('node:path');

const argv = process.argv.slice(2);
if (process.env.FAKE_PDFBOX_LOG) {
  fs.appendFileSync(process.env.FAKE_PDFBOX_LOG, JSON.stringify(argv) + '\n');
}

const jarIndex = argv.indexOf('-jar');
if (jarIndex === -1) {
  process.stderr.write('Error: Unable to access jarfile\n');
  process.exit(1);
}
const [sub, ...args] = argv.slice(jarIndex + 2);

function parse(rawArgs, valueFlags, listFlags) {
  const flags = {};
  const positionals = [];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (!arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }
    const name = arg.slice(1);
    if (listFlags && listFlags[name]) {
      flags[name] = rawArgs.slice(i + 1, i + 1 + listFlags[name]);
      i += listFlags[name];
    } else if (valueFlags.includes(name)) {
      const next = rawArgs[i + 1];
      if (next === undefined || next.startsWith('-')) {
        process.stderr.write('Error: -' + name + ' needs a value\n');
        process.exit(2);
      }
      flags[name] = next;
      i++;
    } else {
      flags[name] = true;
    }
  }
  return { flags, positionals };
}

function pages(file) {
  return fs.readFileSync(file, 'utf-8').split('\f');
}

function stem(file) {
  return path.join(path.dirname(file), path.basename(file, path.extname(file)));
}

function pageRange(flags, count) {
  const start = flags.startPage ? Number(flags.startPage) : 1;
  const end = flags.endPage ? Number(flags.endPage) : count;
  return [start, end];
}

switch (sub) {
  case 'ExtractText': {
    const { flags, positionals } = parse(args, ['password', 'encoding', 'startPage', 'endPage']);
    const [input, output] = positionals;
    const all = pages(input);
    const [start, end] = pageRange(flags, all.length);
    const text = all.slice(start - 1, end).join('');
    if (flags.console) {
      process.stdout.write(text);
    } else {
      fs.writeFileSync(output || stem(input) + '.txt', text);
    }
    break;
  }
  case 'PDFMerger': {
    const sources = args.slice(0, -1);
    const target = args[args.length - 1];
    fs.writeFileSync(target, sources.map((f) => fs.readFileSync(f, 'utf-8')).join('\f'));
    break;
  }
  case 'PDFSplit': {
    const { flags, positionals } = parse(args, ['password', 'split', 'startPage', 'endPage', 'outputPrefix']);
    const input = positionals[0];
    const all = pages(input);
    const [start, end] = pageRange(flags, all.length);
    const selected = all.slice(start - 1, end);
    const size = flags.split ? Number(flags.split) : 1;
    const prefix = flags.outputPrefix || stem(input);
    for (let i = 0; i * size < selected.length; i++) {
      fs.writeFileSync(prefix + '-' + (i + 1) + '.pdf', selected.slice(i * size, (i + 1) * size).join('\f'));
    }
    break;
  }
  case 'PDFToImage': {
    const { flags, positionals } = parse(
      args,
      ['password', 'imageType', 'outputPrefix', 'startPage', 'endPage', 'page', 'dpi', 'color'],
      { cropbox: 4 },
    );
    const input = positionals[0];
    const all = pages(input);
    let [start, end] = pageRange(flags, all.length);
    if (flags.page) {
      start = Number(flags.page);
      end = start;
    }
    const type = flags.imageType || 'jpg';
    const prefix = flags.outputPrefix || stem(input);
    for (let n = start; n <= end; n++) {
      fs.writeFileSync(prefix + n + '.' + type, 'image dpi=' + (flags.dpi || 96));
    }
    break;
  }
  case 'PDFDebugger': {
    parse(args, ['password']);
    process.stdout.write('debugger opened\n');
    break;
  }
  case 'Echo': {
    process.stdout.write(JSON.stringify(args));
    process.stderr.write('echo-stderr');
    break;
  }
  case 'Fail': {
    process.stderr.write('Error: something went wrong\n');
    process.exit(3);
    break;
  }
  default: {
    process.stderr.write('Unknown command: ' + sub + '\n');
    process.exit(1);
  }
}
`;

export interface FakeJava {
  binDir: string;
  javaPath: string;
  jarPath: string;
  logPath: string;
  env: NodeJS.ProcessEnv;
}

/** Writes `<root>/bin/java` and a placeholder jar; `env` points PDFBOX and PATH at them. */
export async function installFakeJava(root: string): Promise<FakeJava> {
  const binDir = join(root, 'bin');
  await mkdir(binDir, { recursive: true });

  const javaPath = join(binDir, 'java');
  await writeFile(javaPath, `#!${process.execPath}\n${FAKE_JAVA_SOURCE}`);
  await chmod(javaPath, 0o755);

  const jarPath = join(root, 'pdfbox-app-3.0.3.jar');
  await writeFile(jarPath, 'not a real jar');

  const logPath = join(root, 'invocations.log');

  return {
    binDir,
    javaPath,
    jarPath,
    logPath,
    env: {
      PATH: binDir,
      PDFBOX: jarPath,
      PDFBOX_CACHE_DIR: join(root, 'cache'),
      FAKE_PDFBOX_LOG: logPath,
    },
  };
}

export async function readInvocations(logPath: string): Promise<string[][]> {
  const raw = await readFile(logPath, 'utf-8');
  return raw
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): string[] => JSON.parse(line));
}
