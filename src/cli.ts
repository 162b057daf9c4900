#!/usr/bin/env node
import { promises as fs } from 'fs';
import * as path from 'path';
import { profileLogFile } from './profiler';
import { buildReportRows, exportTraceEvents, renderTextReport, serializeTraceEvents } from './shared/report';
import { loadProfilerConfig, yearSchema } from './utils/config';
import { logError, logInfo, setTraceEnabled } from './utils/logger';

export type CliOptions = {
  logFile?: string;
  configPath: string;
  outPath: string;
  writeTrace: boolean;
  year?: number;
  verbose?: boolean;
};

export type CliParseResult = {
  options: CliOptions;
  showHelp?: boolean;
  showVersion?: boolean;
  error?: string;
};

export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_TRACE_PATH = 'trace_result.json';

export function parseArgs(argv: string[]): CliParseResult {
  const options: CliOptions = { configPath: DEFAULT_CONFIG_PATH, outPath: DEFAULT_TRACE_PATH, writeTrace: true };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';

    switch (arg) {
      case '--help':
      case '-h':
        return { options, showHelp: true };
      case '--version':
      case '-v':
        return { options, showVersion: true };
      case '--config':
      case '-c': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: `Missing value for ${arg}` };
        }
        options.configPath = value;
        index += 1;
        break;
      }
      case '--out':
      case '-o': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: `Missing value for ${arg}` };
        }
        options.outPath = value;
        index += 1;
        break;
      }
      case '--year': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: 'Missing value for --year' };
        }
        const year = /^\d{4}$/.test(value) ? yearSchema.safeParse(Number(value)) : undefined;
        if (!year?.success) {
          return { options, error: `Invalid --year: ${value} (expected 1970-9999)` };
        }
        options.year = year.data;
        index += 1;
        break;
      }
      case '--no-trace':
        options.writeTrace = false;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          return { options, error: `Unknown argument: ${arg}` };
        }
        if (options.logFile) {
          return { options, error: `Unexpected argument: ${arg}` };
        }
        options.logFile = arg;
    }
  }

  if (!options.logFile) {
    return { options, error: 'Missing <log-file> argument' };
  }
  return { options };
}

export function formatUsage(): string {
  return [
    'Usage: log-trace-profiler [options] <log-file>',
    '',
    'Options:',
    `  -c, --config <path>   Event configuration (default: ${DEFAULT_CONFIG_PATH})`,
    `  -o, --out <path>      Trace file path (default: ${DEFAULT_TRACE_PATH})`,
    '      --no-trace        Skip writing the trace file',
    '      --year <yyyy>     Year for timestamps without one (overrides config)',
    '      --verbose         Enable trace-level diagnostics on stderr',
    '  -h, --help            Show this help text',
    '  -v, --version         Show version'
  ].join('\n');
}

export function formatVersion(): string {
  const version = process.env.npm_package_version ?? '0.0.0';
  return `log-trace-profiler ${version}`;
}

export type CliDeps = {
  stdout: (text: string) => void;
  writeFile: (filePath: string, data: string) => Promise<void>;
};

const defaultDeps: CliDeps = {
  stdout: text => {
    process.stdout.write(text);
  },
  writeFile: (filePath, data) => fs.writeFile(filePath, data, 'utf8')
};

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.showHelp) {
    deps.stdout(`${formatUsage()}\n`);
    return 0;
  }

  if (parsed.showVersion) {
    deps.stdout(`${formatVersion()}\n`);
    return 0;
  }

  const { options } = parsed;
  if (parsed.error || !options.logFile) {
    logError(parsed.error ?? 'Missing <log-file> argument');
    deps.stdout(`${formatUsage()}\n`);
    return 1;
  }

  if (options.verbose) {
    setTraceEnabled(true);
  }

  try {
    // Config errors must surface before any log line is read
    const config = await loadProfilerConfig(options.configPath, { year: options.year });
    const { forest } = await profileLogFile(options.logFile, config);

    deps.stdout(renderTextReport(buildReportRows(forest, config.events)));

    if (options.writeTrace) {
      const outPath = path.resolve(options.outPath);
      await deps.writeFile(outPath, serializeTraceEvents(exportTraceEvents(forest)));
      logInfo(`Trace exported to: ${outPath} (open in chrome://tracing or ui.perfetto.dev)`);
    }
    return 0;
  } catch (error) {
    logError(error);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(error);
      process.exitCode = 1;
    });
}
