/**
 * CLI Arguments
 */

export const COMMANDS = ['check', 'list', 'find', 'show', 'ref', 'stats', 'guide'] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliOptions {
  root?: string;
  json: boolean;
  strict: boolean;
  limit?: number;
  help: boolean;
}

export type ParsedArgs =
  | { ok: true; command?: CommandName; positionals: string[]; options: CliOptions }
  | { ok: false; error: string };

// [min, max] positional arguments per command
const ARITY: Record<CommandName, [number, number]> = {
  check: [0, 0],
  list: [0, 0],
  find: [1, Infinity],
  show: [1, 1],
  ref: [2, 2],
  stats: [0, 1],
  guide: [1, 2],
};

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const options: CliOptions = { json: false, strict: false, help: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--root': {
        const value = argv[++i];
        if (!value) return { ok: false, error: '--root requires a directory' };
        options.root = value;
        break;
      }
      case '--limit': {
        const value = argv[++i];
        const limit = Number(value);
        if (!value || !Number.isInteger(limit) || limit <= 0) {
          return { ok: false, error: '--limit requires a positive integer' };
        }
        options.limit = limit;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        positionals.push(arg);
    }
  }

  const [name, ...rest] = positionals;
  if (name === undefined) {
    return options.help
      ? { ok: true, positionals: [], options }
      : { ok: false, error: 'Missing command' };
  }

  if (!isCommand(name)) {
    return { ok: false, error: `Unknown command: ${name}` };
  }

  const [min, max] = ARITY[name];
  if (!options.help && (rest.length < min || rest.length > max)) {
    return { ok: false, error: `Wrong number of arguments for "${name}"` };
  }

  return { ok: true, command: name, positionals: rest, options };
}

export const USAGE = `
  skillbook - Load and validate skill corpora

  Usage: skillbook <command> [options]

  Commands:
    check                  Check registry, manifests and references
    list                   List registry entries
    find <intent...>       Rank skills for a task description
    show <skill>           Print a skill manifest
    ref <skill> <path>     Print a reference document
    stats [skill]          Reading time and level of a skill or the corpus
    guide <skill> [path]   Reading guide for a manifest or one of its references

  Options:
    --root <dir>           Corpus root (default: search up from the current directory)
    --json                 Print JSON
    --strict               check: fail on warnings too
    --limit <n>            find: maximum number of results
    -h, --help             Show this help

  Examples:
    skillbook check --strict
    skillbook find "add health checks to a spring service"
    skillbook ref api-observability references/java-spring.md
`;
