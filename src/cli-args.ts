import { ConfigOverrides } from './config/app-config';
import { UsageError } from './errors';
import { isStagingFormat } from './save/save-codec';
import { isVerbosity } from './utils/logger';

export interface CliArgs {
    help: boolean;
    overrides: ConfigOverrides;
}

export const USAGE = `
Usage: dungeon-save-editor [options]

Pulls a save slot off the connected device, heals, repairs and restocks the hero, and pushes it back.

Options:
  -v, --verbosity <level>     quiet (default), info or debug
  -w, --workdir <path>        Working directory (default: temporary, removed afterwards)
  -n, --no-save               Apply edits and report, but do not push back; keep the staging file
  -s, --slot <n>              Save slot to edit (default: 1)
      --remove-curses         Also remove curses while repairing items
      --staging-format <fmt>  Staging file format: json (default) or yaml
  -h, --help                  Show this help
`.trim();

function parseSlot(value: string): number {
    const slot = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(slot) || slot < 1) {
        throw new UsageError(`Invalid slot '${value}' (must be a positive integer)`);
    }
    return slot;
}

export function parseCliArgs(argv: string[]): CliArgs {
    const overrides: ConfigOverrides = {};
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq >= 0 ? arg.substring(0, eq) : arg;
        const inline = eq >= 0 ? arg.substring(eq + 1) : undefined;

        const takeValue = (): string => {
            if (inline !== undefined) return inline;
            const next = argv[++i];
            if (next === undefined) {
                throw new UsageError(`Missing value for ${flag}`);
            }
            return next;
        };

        switch (flag) {
            case '-h':
            case '--help':
                help = true;
                break;
            case '-n':
            case '--no-save':
                overrides.noSave = true;
                break;
            case '--remove-curses':
                overrides.removeCurses = true;
                break;
            case '-s':
            case '--slot':
                overrides.slot = parseSlot(takeValue());
                break;
            case '-w':
            case '--workdir':
                overrides.workDir = takeValue();
                break;
            case '-v':
            case '--verbosity': {
                const level = takeValue();
                if (!isVerbosity(level)) {
                    throw new UsageError(`Invalid verbosity '${level}' (must be quiet|info|debug)`);
                }
                overrides.verbosity = level;
                break;
            }
            case '--staging-format': {
                const format = takeValue();
                if (!isStagingFormat(format)) {
                    throw new UsageError(`Invalid staging format '${format}' (must be json|yaml)`);
                }
                overrides.stagingFormat = format;
                break;
            }
            default:
                throw new UsageError(`Unknown argument: ${arg}`);
        }
    }

    return { help, overrides };
}
