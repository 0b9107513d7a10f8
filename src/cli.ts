#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Session, formatOutcome } from './runtime/session';
import { SprigConfig, loadConfig, loadConfigForScript } from './runtime/config';
import { ExitSignal, SprigError, formatError } from './runtime/errors';
import { InputSource, OutputSink } from './runtime/io';
import { VERSION } from './version';

const USAGE = `
sprig - the Sprig language v${VERSION}

Usage:
  sprig                        Start an interactive session
  sprig <file.sprig>           Run a Sprig script
  sprig --parse <file.sprig>   Parse and print terms as JSON
  sprig --lex <file.sprig>     Tokenize and print tokens
  sprig --help                 Show this help message

Options:
  --trace                      Enable execution tracing
  -i, --interactive            Start a session after running the file
  --lib <file>                 Load a file before the script (repeatable)
  --config <path>              Path to sprig.config.json (auto-detected by default)

Examples:
  sprig examples/fib.sprig
  sprig --lib prelude.sprig -i examples/structs.sprig
  sprig --trace examples/macros.sprig
`;

const FLAGS_WITH_VALUES = new Set(['--lib', '--config']);

/** Where the CLI prints and reads. Tests swap these for in-memory versions. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  /** Sink for `display` and friends. */
  output?: OutputSink;
  /** Sink for `print-error`. */
  errorOutput?: OutputSink;
  /** Source for `readline` in batch mode. */
  input?: InputSource;
  /** Line stream for the interactive session. */
  stdin?: NodeJS.ReadableStream;
  /** Where the interactive prompt is echoed; omit for no prompt. */
  promptOutput?: NodeJS.WritableStream;
}

const consoleIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  stdin: process.stdin,
  promptOutput: process.stdout,
};

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function getAll(args: string[], flag: string): string[] {
  const values: string[] = [];
  args.forEach((arg, i) => {
    if (arg === flag && i + 1 < args.length) values.push(args[i + 1]);
  });
  return values;
}

/**
 * Run the CLI and resolve to the process exit status.
 */
export async function main(args: string[], io: CliIO = consoleIO): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    io.stdout(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('-')));
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('-')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  const filePath = files.length > 0 ? path.resolve(files[0]) : undefined;
  if (filePath && !fs.existsSync(filePath)) {
    io.stderr(`Error: File not found: ${filePath}`);
    return 1;
  }

  if (flags.has('--lex') || flags.has('--parse')) {
    if (!filePath) {
      io.stderr('Error: No input file specified.');
      io.stdout(USAGE);
      return 1;
    }
    return inspect(fs.readFileSync(filePath, 'utf-8'), flags.has('--lex'), io);
  }

  let session: Session;
  try {
    const explicitConfig = getArg(args, '--config');
    const config: SprigConfig = explicitConfig
      ? loadConfig(explicitConfig)
      : filePath ? loadConfigForScript(filePath) : loadConfig();

    session = new Session({
      trace: flags.has('--trace') || config.trace,
      output: io.output,
      errorOutput: io.errorOutput,
      input: io.input,
      structCapacity: config.maxStructs,
      signaturePolicy: config.signaturePolicy,
      scriptDir: filePath ? path.dirname(filePath) : process.cwd(),
      prompt: config.prompt,
    });

    const libraries = [...(config.prelude ?? []), ...getAll(args, '--lib').map(lib => path.resolve(lib))];
    for (const lib of libraries) {
      session.loadFile(lib);
    }
  } catch (e) {
    return reportFailure(e, io);
  }

  let status = 0;
  if (filePath) {
    try {
      const outcomes = session.evaluate(fs.readFileSync(filePath, 'utf-8'));
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          io.stderr(formatError(outcome.error));
          status = 1;
        }
      }
    } catch (e) {
      return reportFailure(e, io);
    }
    if (!flags.has('-i') && !flags.has('--interactive')) {
      return status;
    }
  }

  const replStatus = await repl(session, io);
  return replStatus ?? status;
}

function inspect(source: string, lexOnly: boolean, io: CliIO): number {
  try {
    const tokens = new Lexer(source).tokenize();
    if (lexOnly) {
      for (const tok of tokens) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        io.stdout(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
      return 0;
    }
    io.stdout(JSON.stringify(new Parser().parse(tokens), null, 2));
    return 0;
  } catch (e) {
    return reportFailure(e, io);
  }
}

/**
 * Interactive loop. Lines are buffered until they form complete input, then
 * evaluated. Resolves with the `exit` status, or undefined at end of input.
 */
function repl(session: Session, io: CliIO): Promise<number | undefined> {
  const input = io.stdin ?? process.stdin;
  const rl = readline.createInterface({
    input,
    output: io.promptOutput,
    terminal: false,
  });

  return new Promise(resolve => {
    let buffer = '';
    let status: number | undefined;

    rl.setPrompt(session.prompt);
    rl.prompt();

    rl.on('line', line => {
      buffer = buffer ? `${buffer}\n${line}` : line;
      if (session.isIncomplete(buffer)) {
        rl.setPrompt('... ');
        rl.prompt();
        return;
      }

      const source = buffer;
      buffer = '';
      try {
        for (const outcome of session.evaluate(source)) {
          const text = formatOutcome(outcome);
          if (text === null) continue;
          if (outcome.ok) io.stdout(text);
          else io.stderr(text);
        }
      } catch (e) {
        status = reportFailure(e, io);
        rl.close();
        return;
      }

      rl.setPrompt(session.prompt);
      rl.prompt();
    });

    rl.on('close', () => resolve(status));
  });
}

/** Turn a thrown value into a message and an exit status. */
function reportFailure(e: unknown, io: CliIO): number {
  if (e instanceof ExitSignal) return e.status;
  if (e instanceof SprigError) {
    io.stderr(formatError(e));
    return 1;
  }
  io.stderr(`fatal: ${e instanceof Error ? e.message : String(e)}`);
  return 1;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    (e: unknown) => {
      console.error(`fatal: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    },
  );
}
