import { readFile } from 'fs/promises';

import { parse } from '../core-parser.js';
import { getDescendants } from '../ast-traversal.js';

export interface CliIO {
  readFile(path: string): Promise<string>;
  stdout(line: string): void;
  stderr(line: string): void;
}

const USAGE = 'Usage: strict-html-ast [--json] <file...>';

const defaultIO: CliIO = {
  readFile: path => readFile(path, 'utf8'),
  stdout: line => console.log(line),
  stderr: line => console.error(line)
};

/**
 * Parse each file and report the outcome.
 * Resolves to the exit code: 0 when every file parsed, 1 on a parse error,
 * 2 on a usage or read error.
 */
export async function runCli(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let json = false;
  const files: string[] = [];

  for (const arg of args) {
    if (arg === '--json') json = true;
    else if (arg === '-h' || arg === '--help') {
      io.stdout(USAGE);
      return 0;
    }
    else if (arg.startsWith('-')) {
      io.stderr(`Unknown option ${arg}`);
      io.stderr(USAGE);
      return 2;
    }
    else files.push(arg);
  }

  if (!files.length) {
    io.stderr(USAGE);
    return 2;
  }

  let exitCode = 0;
  for (const file of files) {
    let text: string;
    try {
      text = await io.readFile(file);
    } catch (error) {
      io.stderr(`${file}: ${error instanceof Error ? error.message : String(error)}`);
      exitCode = 2;
      continue;
    }

    const result = parse(text, {
      onDiagnostic: error => io.stderr(`${file}:${error.toString()}`)
    });

    if (!result.ok) {
      exitCode = Math.max(exitCode, 1);
      continue;
    }

    if (json) io.stdout(JSON.stringify(result.document, null, 2));
    else io.stdout(`${file}: ${getDescendants(result.document).length} nodes`);
  }

  return exitCode;
}
