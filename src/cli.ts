#!/usr/bin/env node

// CLI for regline

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { parseFunctionJson } from './ast/ast-reader';
import { formatListing } from './bytecode/disassembler';
import { generateListingWithSourceMap } from './bytecode/listing-source-map';
import { tryCompileFunction } from './compiler';
import { resolveInterpreterOptions } from './config';
import { AstFormatError, VMRuntimeError } from './errors';
import { createHostGlobals } from './interpreter/host';
import { Interpreter } from './interpreter/interpreter';
import { logger, LogLevel } from './logger';
import { toDisplayString } from './runtime/values';

// Get version from package.json
function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    } catch {
      dir = path.dirname(dir);
    }
  }
  return '0.0.0';
}

export type OutputFormat = 'listing' | 'json';

export interface CliOptions {
  input?: string;
  output?: string;
  format?: OutputFormat;
  sourceMap?: boolean;
  run?: boolean;
  maxSteps?: number;
  noSourcePositions?: boolean;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
}

function requireValue(args: string[], i: number, option: string): string {
  if (i + 1 >= args.length) {
    throw new Error(`Option ${option} requires a value`);
  }
  return args[i + 1];
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-o':
      case '--output':
        options.output = requireValue(args, i++, arg);
        break;
      case '-f':
      case '--format': {
        const format = requireValue(args, i++, arg);
        if (format !== 'listing' && format !== 'json') {
          throw new Error(`Invalid format: ${format}. Must be 'listing' or 'json'`);
        }
        options.format = format;
        break;
      }
      case '--source-map':
        options.sourceMap = true;
        break;
      case '-r':
      case '--run':
        options.run = true;
        break;
      case '--max-steps': {
        const steps = Number(requireValue(args, i++, arg));
        options.maxSteps = resolveInterpreterOptions({ maxSteps: steps }).maxSteps;
        break;
      }
      case '--no-source-positions':
        options.noSourcePositions = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (options.input) {
          throw new Error(`Unexpected extra input: ${arg}`);
        }
        options.input = arg;
        break;
    }
  }
  return options;
}

export function showHelp(): void {
  console.log(`
regline - lower resolved function trees to register-machine bytecode

Usage: regline [options] <input.json>

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -o, --output <file>     Write output to a file instead of stdout
  -f, --format <fmt>      Output format: 'listing' (default) or 'json'
  --source-map            Write <output>.map mapping listing lines to source (needs -o)
  -r, --run               Execute the compiled function and print its result
  --max-steps <n>         Step limit for --run (default: 1000000)
  --no-source-positions   Do not record source positions
  --verbose               Print debug output

Examples:
  regline sum.json
  regline -f json -o sum.bc.json sum.json
  regline -o sum.lst --source-map sum.json
  regline --run sum.json
`);
}

export function showVersion(): void {
  console.log(`regline ${getVersion()}`);
}

/**
 * Run the CLI with the given arguments. Returns the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
  const options = parseArgs(args);

  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.help) {
    showHelp();
    return 0;
  }

  if (options.version) {
    showVersion();
    return 0;
  }

  if (!options.input) {
    console.error('Error: No input file specified');
    console.error('Use --help for usage information');
    return 1;
  }

  const format = options.format ?? 'listing';
  if (options.sourceMap && (format !== 'listing' || !options.output)) {
    console.error('Error: --source-map needs listing output written with -o');
    return 1;
  }

  const inputFile = options.input;
  let text: string;
  try {
    text = await fs.readFile(inputFile, 'utf-8');
  } catch {
    console.error(`Error: Input file '${inputFile}' does not exist`);
    return 1;
  }

  try {
    const parsed = parseFunctionJson(text);
    const result = tryCompileFunction(parsed.info, { emitSourcePositions: !options.noSourcePositions });
    if (result.status === 'unsupported') {
      console.error(`${inputFile}: not yet compilable: ${result.error.message}`);
      return 1;
    }
    const bytecode = result.bytecode;

    let output: string;
    if (format === 'json') {
      output = JSON.stringify(bytecode.toJSON(), null, 2);
    } else if (options.sourceMap && options.output) {
      const mapped = generateListingWithSourceMap(bytecode, path.basename(options.output), path.basename(inputFile));
      output = mapped.listing;
      const mapFile = `${options.output}.map`;
      await fs.writeFile(mapFile, mapped.sourceMap);
      console.error(`Generated ${mapFile}`);
    } else {
      output = formatListing(bytecode);
    }

    if (options.output) {
      await fs.writeFile(options.output, output + '\n');
      console.error(`Generated ${options.output}`);
    } else {
      console.log(output);
    }

    if (options.run) {
      const globals = createHostGlobals(parsed.globals, line => console.log(line));
      const interpreter = new Interpreter(globals, { maxSteps: options.maxSteps });
      const execution = interpreter.run(bytecode);
      console.log(`=> ${toDisplayString(execution.value)}`);
      logger.info(`Completed in ${execution.steps} steps`);
    }

    return 0;
  } catch (error) {
    if (error instanceof AstFormatError || error instanceof VMRuntimeError) {
      console.error(`${inputFile}: ${error.message}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  );
}
