import { readFile } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';
import fg from 'fast-glob';
import { z } from 'zod';
import type { LayoutNode, LayoutResult, LayoutWarning } from '@folio/contracts';
import {
  MISSING_BINARY,
  collectBinaryReferences,
  formatWarning,
  layoutPrepared,
  prepareDocument,
  type BinaryPayload,
} from '@folio/layout-bridge';
import { paintHtml } from '@folio/painter-html';
import { CliError, toCliError } from './lib/errors.js';

export const HELP = `
folio: lay out page markup from your terminal

Commands:
  layout <file>        Print the positioned layout tree
  check <files...>     Parse and build files, reporting errors and warnings
  html <file>          Print the laid out document as an HTML page

Options:
  --width <px>     Viewport width (default 800)
  --height <px>    Viewport height (default 600)
  --dpi <n>        Screen resolution (default 96)
  --assets <dir>   Directory holding binary payloads, looked up by name
  --json           Machine-readable output
  --help           Show this message

Examples:
  folio layout ./page.fm --width 1024
  folio check "./pages/**/*.fm"
  folio html ./page.fm --assets ./images > page.html
`;

export type CliIo = {
  stdout(message: string): void;
  stderr(message: string): void;
};

const VALUE_FLAGS = ['width', 'height', 'dpi', 'assets'] as const;
const BOOLEAN_FLAGS = ['json', 'help'] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];
type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

const isValueFlag = (name: string): name is ValueFlag => VALUE_FLAGS.some((flag) => flag === name);
const isBooleanFlag = (name: string): name is BooleanFlag => BOOLEAN_FLAGS.some((flag) => flag === name);

const dimension = (flag: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `--${flag} must be a number` })
    .finite()
    .positive({ message: `--${flag} must be greater than 0` })
    .default(fallback);

export const cliOptionsSchema = z.object({
  width: dimension('width', 800),
  height: dimension('height', 600),
  dpi: dimension('dpi', 96),
  assets: z.string().min(1).optional(),
  json: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

type ParsedArgs = {
  positionals: string[];
  options: CliOptions;
};

/**
 * Splits arguments into positionals and flags. Value flags take the next
 * argument or an inline `--flag=value`.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values: Partial<Record<ValueFlag, string>> = {};
  const switches: Partial<Record<BooleanFlag, boolean>> = {};

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '-h') {
      switches.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = arg.slice(2, eq === -1 ? undefined : eq);
    if (isBooleanFlag(name)) {
      if (eq !== -1) throw new CliError('INVALID_ARGUMENT', `--${name} does not take a value`);
      switches[name] = true;
    } else if (isValueFlag(name)) {
      const value = eq === -1 ? args[i + 1] : arg.slice(eq + 1);
      if (value === undefined || (eq === -1 && value.startsWith('--'))) {
        throw new CliError('MISSING_REQUIRED', `--${name} needs a value`);
      }
      if (eq === -1) i += 1;
      values[name] = value;
    } else {
      throw new CliError('INVALID_ARGUMENT', `unknown option: ${arg}`);
    }
  }

  const parsed = cliOptionsSchema.safeParse({ ...values, ...switches });
  if (!parsed.success) {
    throw new CliError('INVALID_ARGUMENT', parsed.error.issues.map((issue) => issue.message).join('; '), {
      issues: parsed.error.issues,
    });
  }
  return { positionals, options: parsed.data };
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');

async function readMarkup(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError('FILE_READ_ERROR', `cannot read ${path}: ${reason}`, { path });
  }
}

/**
 * Reads each referenced binary from the assets directory. Names that are
 * missing, or that would leave the directory, resolve to {@link MISSING_BINARY}.
 */
export async function loadBinaries(dir: string | undefined, names: readonly string[]): Promise<Map<string, BinaryPayload>> {
  const payloads = new Map<string, BinaryPayload>();
  if (dir === undefined) return payloads;

  const root = resolve(dir);
  for (const name of names) {
    const path = resolve(root, name);
    const inside = relative(root, path);
    if (inside === '' || inside.startsWith('..')) {
      payloads.set(name, MISSING_BINARY);
      continue;
    }
    try {
      payloads.set(name, new Uint8Array(await readFile(path)));
    } catch (error) {
      if (!isNotFound(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CliError('FILE_READ_ERROR', `cannot read binary ${name}: ${reason}`, { path });
      }
      payloads.set(name, MISSING_BINARY);
    }
  }
  return payloads;
}

/** Expands glob patterns; plain paths pass through so unreadable files are reported. */
async function expandGlobs(patterns: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (fg.isDynamicPattern(pattern)) {
      const matches = await fg(pattern, { onlyFiles: true });
      for (const match of matches.sort()) files.push(match);
    } else {
      files.push(pattern);
    }
  }
  return files;
}

function describeNode(node: LayoutNode): string {
  const head = `${node.id} ${node.kind} ${node.x},${node.y} ${node.width}x${node.height}`;
  switch (node.kind) {
    case 'text':
      return `${head} ${JSON.stringify(node.lines.map((line) => line.text).join('\n'))}`;
    case 'link':
      return `${head} ${node.url} ${JSON.stringify(node.text)}`;
    case 'binary':
      return node.resolved ? `${head} ${node.name}` : `${head} ${node.name} (alt ${JSON.stringify(node.altText)})`;
    case 'anchor':
      return `${head} #${node.name}`;
    case 'placeholder':
      return `${head} (${node.reason})`;
    case 'box':
    case 'vbox':
    case 'inline':
      return head;
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

/** One line per node, indented by depth, parents before children. */
export function formatLayoutTree(root: LayoutNode): string {
  const lines: string[] = [];
  const stack: Array<{ node: LayoutNode; depth: number }> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;
    lines.push(`${'  '.repeat(item.depth)}${describeNode(item.node)}`);
    if ('children' in item.node) {
      for (let i = item.node.children.length - 1; i >= 0; i -= 1) {
        stack.push({ node: item.node.children[i], depth: item.depth + 1 });
      }
    }
  }
  return lines.join('\n');
}

const layoutToJson = (result: LayoutResult) => ({ ...result, anchors: Object.fromEntries(result.anchors) });

const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? '' : 's'}`;

async function layoutFile(path: string, options: CliOptions): Promise<LayoutResult> {
  const prepared = prepareDocument(await readMarkup(path));
  const binaries = await loadBinaries(options.assets, collectBinaryReferences(prepared.document));
  return layoutPrepared(prepared, {
    viewportWidth: options.width,
    viewportHeight: options.height,
    dpi: options.dpi,
    binaries,
    logWarnings: false,
  });
}

function reportWarnings(io: CliIo, warnings: readonly LayoutWarning[]): void {
  for (const warning of warnings) {
    io.stderr(`warning: ${formatWarning(warning)}\n`);
  }
}

type CheckReport = {
  path: string;
  ok: boolean;
  warnings: LayoutWarning[];
  error?: { code: string; message: string };
};

async function checkFile(path: string): Promise<CheckReport> {
  try {
    const { warnings } = prepareDocument(await readMarkup(path));
    return { path, ok: true, warnings };
  } catch (error) {
    const cliError = toCliError(error);
    if (cliError.code === 'COMMAND_FAILED') throw cliError;
    return { path, ok: false, warnings: [], error: { code: cliError.code, message: cliError.message } };
  }
}

function formatCheckReport(report: CheckReport): string {
  if (report.error) return `${report.path}: ${report.error.code}: ${report.error.message}`;
  if (report.warnings.length === 0) return `${report.path}: ok`;
  return [
    `${report.path}: ${plural(report.warnings.length, 'warning')}`,
    ...report.warnings.map((warning) => `  ${formatWarning(warning)}`),
  ].join('\n');
}

function requireFile(positionals: readonly string[], usage: string): string {
  const [file] = positionals;
  if (file === undefined) throw new CliError('MISSING_REQUIRED', `Usage: ${usage}`);
  return file;
}

/**
 * Runs one command line and returns its exit code. Output goes through `io`
 * so callers can capture it.
 */
export async function run(args: readonly string[], io: CliIo): Promise<number> {
  const jsonOutput = args.includes('--json');

  try {
    const { positionals, options } = parseArgs(args);
    const [command, ...rest] = positionals;

    if (command === undefined || options.help) {
      io.stdout(`${HELP.trim()}\n`);
      return 0;
    }

    switch (command) {
      case 'layout': {
        const result = await layoutFile(requireFile(rest, 'folio layout <file>'), options);
        if (options.json) {
          io.stdout(`${JSON.stringify(layoutToJson(result), null, 2)}\n`);
        } else {
          reportWarnings(io, result.warnings);
          io.stdout(`${formatLayoutTree(result.root)}\n`);
        }
        return 0;
      }

      case 'html': {
        const result = await layoutFile(requireFile(rest, 'folio html <file>'), options);
        const assets = options.assets;
        reportWarnings(io, result.warnings);
        io.stdout(paintHtml(result, { binaryUrl: assets === undefined ? undefined : (name) => join(assets, name) }));
        return 0;
      }

      case 'check': {
        if (rest.length === 0) throw new CliError('MISSING_REQUIRED', 'Usage: folio check <files...>');
        const files = await expandGlobs(rest);
        if (files.length === 0) throw new CliError('MISSING_REQUIRED', 'No files found matching the pattern');

        const reports: CheckReport[] = [];
        for (const file of files) {
          reports.push(await checkFile(file));
        }
        if (options.json) {
          io.stdout(`${JSON.stringify({ files: reports }, null, 2)}\n`);
        } else {
          io.stdout(`${reports.map(formatCheckReport).join('\n')}\n`);
        }
        return reports.every((report) => report.ok) ? 0 : 1;
      }

      default:
        throw new CliError('UNKNOWN_COMMAND', `Unknown command: ${command}`);
    }
  } catch (error) {
    const cliError = toCliError(error);
    if (jsonOutput) {
      io.stderr(`${JSON.stringify({ ok: false, error: { code: cliError.code, message: cliError.message } })}\n`);
    } else {
      io.stderr(`Error [${cliError.code}]: ${cliError.message}\n`);
    }
    return cliError.exitCode;
  }
}

export { CliError, toCliError, type CliErrorCode } from './lib/errors.js';
