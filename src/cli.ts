import { parseArgs } from 'node:util';
import type { Note } from './types.js';
import type { Reporter } from './diagnostics.js';
import { loadConfig } from './config.js';
import { formatFieldValues, formatFields, formatNotes, isOutputFormat, type OutputFormat } from './output.js';
import { applyPredicate, createPredicate, parseFilter } from './query.js';
import { VaultError, scanVault } from './scanner.js';
import { startServer } from './server.js';

export const USAGE = `Usage: fmq <command> [vault] [options]

Commands:
  filter   List notes whose frontmatter matches every --filter
  fields   List all frontmatter fields with counts
  values   List the values of one field (--field)
  serve    Serve the query API over HTTP

Options:
  --filter key=value   Keep notes whose key contains value (repeatable)
  -i, --ignore-case    Match keys and values case-insensitively
  -f, --format <fmt>   filter output: table, paths or json (default: table)
  --field <name>       Field to list values for (values)
  -p, --port <n>       Port to listen on (serve)
  -v, --verbose        Show warnings and progress
  -s, --silent         Hide the scan summary
  --strict             Do not repair frontmatter with colons in values
  -h, --help           Show this help`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Thrown for malformed command lines
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CommonOptions {
  vault: string;
  filters: Array<[string, string]>;
  ignoreCase: boolean;
  verbose: boolean;
  silent: boolean;
  strict: boolean;
}

export type CliCommand =
  | { name: 'help' }
  | { name: 'filter'; options: CommonOptions; format: string }
  | { name: 'fields'; options: CommonOptions }
  | { name: 'values'; options: CommonOptions; field: string }
  | { name: 'serve'; options: CommonOptions; port?: number };

const COMMANDS = ['filter', 'fields', 'values', 'serve'] as const;
type CommandName = typeof COMMANDS[number];

function isCommandName(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

function parseFilters(raw: string[] | undefined): Array<[string, string]> {
  return (raw ?? []).map(text => {
    const filter = parseFilter(text);
    if (!filter) {
      throw new UsageError(`Invalid filter format: '${text}'. Use field=value`);
    }
    return filter;
  });
}

function parseOptions(command: CommandName, args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      options: {
        filter: { type: 'string', multiple: true },
        'ignore-case': { type: 'boolean', short: 'i' },
        format: { type: 'string', short: 'f' },
        field: { type: 'string' },
        port: { type: 'string', short: 'p' },
        verbose: { type: 'boolean', short: 'v' },
        silent: { type: 'boolean', short: 's' },
        strict: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (err) {
    throw new UsageError(`${command}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Parse a command line (without the node and script entries).
 */
export function parseCommand(argv: string[]): CliCommand {
  const [name, ...rest] = argv;
  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    return { name: 'help' };
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command: ${name}`);
  }

  const { values, positionals } = parseOptions(name, rest);
  if (values.help) {
    return { name: 'help' };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }

  const only = (option: string, allowed: CommandName) => {
    if (name !== allowed) throw new UsageError(`--${option} is only valid for ${allowed}`);
  };
  if (values.format !== undefined) only('format', 'filter');
  if (values.field !== undefined) only('field', 'values');
  if (values.port !== undefined) only('port', 'serve');

  const options: CommonOptions = {
    vault: positionals[0] ?? '.',
    filters: parseFilters(values.filter),
    ignoreCase: values['ignore-case'] ?? false,
    verbose: values.verbose ?? false,
    silent: values.silent ?? false,
    strict: values.strict ?? false
  };

  switch (name) {
    case 'filter':
      return { name, options, format: values.format ?? 'table' };
    case 'fields':
      return { name, options };
    case 'values':
      if (!values.field) {
        throw new UsageError('values requires --field <name>');
      }
      return { name, options, field: values.field };
    case 'serve': {
      if (values.port === undefined) {
        return { name, options };
      }
      const port = Number(values.port);
      if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new UsageError(`Invalid port: ${values.port}`);
      }
      return { name, options, port };
    }
  }
}

function selectNotes(notes: readonly Note[], options: CommonOptions): Note[] {
  const predicate = createPredicate(options.filters, { caseSensitive: !options.ignoreCase });
  return applyPredicate(predicate, notes);
}

/**
 * Run a command line and return the process exit code.
 */
export async function runCli(argv: string[], reporter: Reporter = console): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      reporter.error(`Error: ${err.message}`);
      reporter.error(USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (command.name === 'help') {
    reporter.log(USAGE);
    return EXIT_OK;
  }

  const { options } = command;
  const config = await loadConfig();

  let format: OutputFormat = 'table';
  if (command.name === 'filter') {
    if (isOutputFormat(command.format)) {
      format = command.format;
    } else {
      reporter.error(`Unknown format: ${command.format}. Using table format.`);
    }
  }

  let notes: Note[];
  try {
    ({ notes } = await scanVault(options.vault, {
      verbose: options.verbose,
      // JSON output must stay parseable
      silent: options.silent || (command.name === 'filter' && format === 'json'),
      lenient: config.lenient && !options.strict,
      concurrency: config.concurrency,
      extensions: config.extensions,
      includeHidden: config.includeHidden,
      reporter
    }));
  } catch (err) {
    if (err instanceof VaultError) {
      reporter.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  // Scan order depends on read completion
  notes.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const selected = selectNotes(notes, options);

  if (command.name === 'serve') {
    startServer(selected, { port: command.port ?? config.port, verbose: options.verbose });
    return EXIT_OK;
  }

  render(command, selected, format).forEach(line => reporter.log(line));
  return EXIT_OK;
}

function render(
  command: Extract<CliCommand, { name: 'filter' | 'fields' | 'values' }>,
  notes: readonly Note[],
  format: OutputFormat
): string[] {
  switch (command.name) {
    case 'filter':
      return formatNotes(notes, format);
    case 'fields':
      return formatFields(notes);
    case 'values':
      return formatFieldValues(notes, command.field, !command.options.ignoreCase);
  }
}
