import { isLogLevelName, normalizeLogLevelName, LOG_LEVEL_NAMES } from './logger.js';
import type { LogLevelName } from './logger.js';

export interface ScrapeCliOptions {
  site?: string;
  maxPages?: number;
  headless?: boolean;
  aggressiveness?: number;
  outputDir?: string;
  logLevel?: LogLevelName;
  help?: boolean;
}

export interface ParsedArgs {
  command: string;
  options: ScrapeCliOptions;
}

export const USAGE = `Usage: scrape [options]

Options:
  --site <domain>          Listing site definition (default: wetex.ae)
  --max-pages <n>          Stop after n pages
  --headless | --headed    Run the browser hidden (default) or visible
  --aggressiveness <0-2>   Recovery strategies tried on an empty page
  --output-dir <dir>       Where CSV/JSON files are written (default: output)
  --log-level <level>      quiet | normal | verbose | debug
  -h, --help               Show this message`;

function parseInteger(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function toLogLevelName(flag: string, raw: string): LogLevelName {
  const name = normalizeLogLevelName(raw);
  if (!isLogLevelName(name)) {
    throw new Error(`${flag} expects one of ${LOG_LEVEL_NAMES.join(', ')}, got "${raw}"`);
  }
  return name;
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Flags like --headed don't take values. The first argument is the command
 * unless it starts with a dash.
 */
export function parseArgs(args: string[]): ParsedArgs {
  let start = 0;
  let command = 'scrape';
  if (args[0] !== undefined && !args[0].startsWith('-')) {
    command = args[0];
    start = 1;
  }

  const options: ScrapeCliOptions = {};

  for (let i = start; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag === arg ? undefined : arg.slice(eq + 1);

    const value = (): string => {
      if (inline !== undefined) return inline;
      if (i + 1 >= args.length) throw new Error(`${flag} requires a value`);
      return args[++i];
    };

    switch (flag) {
      case '--site':
        options.site = value().trim();
        break;
      case '--max-pages':
        options.maxPages = parseInteger(flag, value());
        break;
      case '--aggressiveness':
        options.aggressiveness = parseInteger(flag, value());
        break;
      case '--output-dir':
        options.outputDir = value();
        break;
      case '--log-level':
        options.logLevel = toLogLevelName(flag, value());
        break;
      case '--headless':
        options.headless = true;
        break;
      case '--headed':
        options.headless = false;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { command, options };
}
