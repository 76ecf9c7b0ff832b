/**
 * Command line parsing for the ingestion entry point
 */
import { isIsoDate, utcToday } from './utils/dates.js';

export interface CliOptions {
    date?: string;
    daysBack: number;
    help: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const USAGE = `Usage: unreeled [--date YYYY-MM-DD] [--days-back N]

  --date YYYY-MM-DD   Target release date (default: today, UTC)
  --days-back N       Run for N days before today (ignored when --date is given)
  --help              Show this message`;

function readValue(args: string[], index: number, flag: string): string {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${flag} needs a value`);
    }
    return value;
}

/**
 * Accepts `--flag value` and `--flag=value`
 */
export function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = { daysBack: 0, help: false };
    const args = argv.flatMap(arg => (arg.startsWith('--') && arg.includes('=') ? arg.split(/=(.*)/s, 2) : [arg]));

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === '--date') {
            const value = readValue(args, i, arg);
            if (!isIsoDate(value)) {
                throw new UsageError(`--date must be a real YYYY-MM-DD date, got ${value}`);
            }
            options.date = value;
            i++;
        } else if (arg === '--days-back') {
            const value = readValue(args, i, arg);
            if (!/^\d+$/.test(value)) {
                throw new UsageError(`--days-back must be a non-negative integer, got ${value}`);
            }
            options.daysBack = Number(value);
            i++;
        } else if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else {
            throw new UsageError(`Unknown argument: ${arg}`);
        }
    }

    return options;
}

/**
 * --date wins over --days-back
 */
export function resolveTargetDate(options: CliOptions, now: Date = new Date()): string {
    return options.date ?? utcToday(options.daysBack, now);
}
