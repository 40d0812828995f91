/**
 * media-sniff CLI: report the encryption scheme and content format of files
 *
 * Features:
 *  • Single files and directories (optionally recursive)
 *  • Include / exclude globs, encrypted-only filter
 *  • Concurrency control
 *  • JSON output and JSON report file
 */

import { readFileSync } from 'node:fs';
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import pc from 'picocolors';
import { MediaSniffError } from './errors.js';
import { scanDir, scanFiles } from './operations/scan.js';
import type { ScanEntry, ScanOptions, ScanReport } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * `scheme=qmc audio=flac`, or '' when nothing was recognised
 */
export function describeEntry(entry: ScanEntry): string {
  const parts: string[] = [];
  if (entry.scheme)      parts.push(`scheme=${entry.scheme}`);
  if (entry.audioFormat) parts.push(`audio=${entry.audioFormat}`);
  if (entry.imageMime)   parts.push(`image=${entry.imageMime}`);
  return parts.join(' ');
}

function mergeReports(reports: ScanReport[]): ScanReport {
  return {
    timestamp:    reports[0]?.timestamp ?? new Date().toISOString(),
    totalFiles:   reports.reduce((s, r) => s + r.totalFiles, 0),
    recognized:   reports.reduce((s, r) => s + r.recognized, 0),
    unrecognized: reports.reduce((s, r) => s + r.unrecognized, 0),
    failed:       reports.reduce((s, r) => s + r.failed, 0),
    entries:      reports.flatMap(r => r.entries),
  };
}

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
media-sniff <file|dir...> [options]

Report the encryption scheme (from the file name) and the audio/image
format (from the leading bytes) of media files.

OPTIONS
  -r, --recursive             Recurse into directories
  -q, --quiet                 Only print errors
  --json                      Print the scan report as JSON
  --encrypted-only            In directories, only files with a known scheme
  --include <globs>           In directories, only names matching (comma-separated)
  --exclude <globs>           In directories, skip names matching (comma-separated)
  --concurrency <N>           Max files read in parallel (default: 4)
  --report <file.json>        Write the JSON scan report to a file
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

class UsageError extends MediaSniffError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CliArgs {
  files: string[];
  recursive: boolean;
  quiet: boolean;
  json: boolean;
  encryptedOnly: boolean;
  include?: string[];
  exclude?: string[];
  concurrency: number;
  report?: string;
}

function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = {
    files: [],
    recursive: false,
    quiet: false,
    json: false,
    encryptedOnly: false,
    concurrency: 4,
  };

  const take = (i: number, flag: string): [number, string] => {
    const val = raw[i + 1];
    if (val === undefined || val.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };
  const list = (v: string): string[] => v.split(',').map(s => s.trim()).filter(s => s.length > 0);

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i] ?? '';
    switch (a) {
      case '-r': case '--recursive':  args.recursive = true; break;
      case '-q': case '--quiet':      args.quiet = true; break;
      case '--json':                  args.json = true; break;
      case '--encrypted-only':        args.encryptedOnly = true; break;

      case '--include': {
        const [ni, v] = take(i, a); i = ni; args.include = list(v); break;
      }
      case '--exclude': {
        const [ni, v] = take(i, a); i = ni; args.exclude = list(v); break;
      }
      case '--concurrency': {
        const [ni, v] = take(i, a); i = ni;
        const n = parseInt(v, 10);
        if (isNaN(n) || n < 1) {
          throw new UsageError('--concurrency must be a positive integer');
        }
        args.concurrency = n;
        break;
      }
      case '--report': {
        const [ni, v] = take(i, a); i = ni; args.report = v; break;
      }
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        args.files.push(a);
    }
  }

  return args;
}

// ─── Input classification ─────────────────────────────────────────────────────

async function classifyInputs(
  inputs: string[]
): Promise<{ files: string[]; dirs: string[]; missing: string[] }> {
  const files: string[] = [];
  const dirs: string[] = [];
  const missing: string[] = [];

  for (const p of inputs) {
    try {
      const s = await stat(resolve(p));
      if (s.isDirectory()) dirs.push(resolve(p));
      else files.push(resolve(p));
    } catch {
      missing.push(p);
    }
  }

  return { files, dirs, missing };
}

// ─── Main ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Colourise output (default: terminal support) */
  color?: boolean;
}

/**
 * Run the CLI with `argv` (without the node / script entries).
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const c = pc.createColors(options.color ?? pc.isColorSupported);

  if (argv.length === 0 || argv.includes('-h') || argv.includes('--help')) {
    console.log(HELP);
    return 0;
  }
  if (argv.includes('-v') || argv.includes('--version')) {
    console.log(getVersion());
    return 0;
  }

  let a: CliArgs;
  try {
    a = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(c.red(`Error: ${err.message}`));
      return 1;
    }
    throw err;
  }
  if (a.files.length === 0) {
    console.error(c.red('Error: No input files or directories specified'));
    return 1;
  }

  const { files, dirs, missing } = await classifyInputs(a.files);
  for (const p of missing) {
    console.error(c.red(`  ✗ ${p}: cannot access`));
  }

  const scanOpts: ScanOptions = {
    recursive: a.recursive,
    encryptedOnly: a.encryptedOnly,
    concurrency: a.concurrency,
    ...(a.include !== undefined && { include: a.include }),
    ...(a.exclude !== undefined && { exclude: a.exclude }),
  };

  const reports: ScanReport[] = [];
  for (const dir of dirs) {
    reports.push(await scanDir(dir, scanOpts));
  }
  if (files.length > 0) {
    reports.push(await scanFiles(files, scanOpts));
  }
  const report = mergeReports(reports);

  if (a.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const entry of report.entries) {
      if (!entry.success) {
        console.error(c.red(`  ✗ ${entry.file}: ${entry.error ?? 'unknown error'}`));
        continue;
      }
      if (a.quiet) continue;

      const desc = describeEntry(entry);
      console.log(desc ? `  ${c.green('✓')} ${entry.file}  ${desc}` : `  ${c.dim('-')} ${entry.file}  ${c.dim('unsupported')}`);
    }
    if (!a.quiet) {
      console.log(
        c.bold(`\n  ${report.recognized} recognized, ${report.unrecognized} unsupported, ${report.failed} failed`)
      );
    }
  }

  if (a.report) {
    await mkdir(dirname(resolve(a.report)), { recursive: true });
    await writeFile(a.report, JSON.stringify(report, null, 2));
    if (!a.quiet && !a.json) console.log(`\n  Report written to ${a.report}`);
  }

  return report.failed > 0 || missing.length > 0 ? 1 : 0;
}
