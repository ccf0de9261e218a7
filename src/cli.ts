import { toLocale } from './config.js';
import {
  localizeResult,
  serializeLocalizedResult,
  type AnalysisResult,
  type Locale
} from './modules/ratios/index.js';

export const USAGE = [
  'Usage:',
  '  ratio-engine --demo',
  '  ratio-engine --metric <id> <input>=<amount> ...',
  '  ratio-engine --file <statement.json>',
  '  ratio-engine --list',
  'Options: --locale en|ar, --json'
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliArgs {
  mode?: string;
  positional: string[];
  locale?: Locale;
  json: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { positional: [], json: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--json') {
      args.json = true;
    } else if (arg === '--locale') {
      const value = argv[i + 1];
      const locale = value === undefined ? undefined : toLocale(value);
      if (!locale) {
        throw new CliUsageError(`Unsupported locale "${value ?? ''}", expected en or ar`);
      }
      args.locale = locale;
      i += 1;
    } else if (arg.startsWith('--') && !args.mode) {
      args.mode = arg;
    } else {
      args.positional.push(arg);
    }
  }
  return args;
}

/** Parses `name=amount` pairs. A blank amount is rejected rather than read as zero. */
export function parseLineItems(pairs: readonly string[]): Record<string, number> {
  const lineItems: Record<string, number> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new CliUsageError(`Expected <input>=<amount>, got "${pair}"`);
    }
    const name = pair.slice(0, separator);
    const raw = pair.slice(separator + 1);
    const amount = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(amount)) {
      throw new CliUsageError(`Expected a number for ${name}, got "${raw}"`);
    }
    lineItems[name] = amount;
  }
  return lineItems;
}

export function renderResultJson(result: AnalysisResult, locale: Locale): string {
  return JSON.stringify(serializeLocalizedResult(localizeResult(result, locale)), null, 2);
}
