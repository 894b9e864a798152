#!/usr/bin/env node
/**
 * svgpack: files embedded in an SVG host document.
 *
 *   svgpack import <container.svg> <paths...> [--overwrite] [--preserve] [--strategy s]
 *   svgpack export <container.svg> [out-dir] [--tar out.tar.gz] [--names a,b] [--remove]
 *   svgpack list <container.svg> [--type image/*] [--pattern p] [--json]
 *   svgpack exclude <container.svg> <paths...>
 *   svgpack meta <container.svg> show|set k=v...|remove k...|clean|clear
 *   svgpack changelog <container.svg> [--format markdown|json|xml]
 *   svgpack serve <container.svg> --token <secret> [--port 9474]
 */

import { basename, join } from 'node:path';
import { runBatch } from './batch.js';
import { CHANGELOG_FORMATS, type ChangelogFormat, type ChangelogTracker } from './changelog.js';
import { loadConfig } from './config.js';
import { InvalidOptionsError } from './errors.js';
import { stripExtension } from './logical-path.js';
import {
  cleanMetadata,
  clearMetadata,
  excludeEntries,
  exportEntries,
  importFiles,
  listEntries,
  loadChangelog,
  openContainer,
  persistChangelog,
  readMetadata,
  removeMetadata,
  renameEntry,
  updateMetadata,
  verifyContainer,
  type ContainerHandle,
  type ExportResult,
  type ImportResult,
  type MetadataResult,
} from './operations.js';
import { createContainerServer } from './server.js';
import { DirectorySink, TarSink, type ExportSink } from './sinks.js';
import { resolveSources } from './sources.js';
import { MERGE_STRATEGIES, type MergeStrategy } from './structure.js';

/** Flags that take a value */
const VALUE_FLAGS = new Set([
  '--strategy', '--names', '--pattern', '--type', '--tar', '--format', '--token', '--port', '--host', '--concurrency',
]);

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.has(args[i])) {
      i++;
    } else if (!args[i].startsWith('--')) {
      out.push(args[i]);
    }
  }
  return out;
}

function usage(text: string): never {
  console.error(`Usage: svgpack ${text}`);
  process.exit(1);
}

function parseStrategy(value: string): MergeStrategy {
  const found = MERGE_STRATEGIES.find(s => s === value);
  if (!found) throw new InvalidOptionsError('strategy', [`expected one of ${MERGE_STRATEGIES.join(', ')}, got "${value}"`]);
  return found;
}

function parseFormat(value: string): ChangelogFormat {
  const found = CHANGELOG_FORMATS.find(f => f === value);
  if (!found) throw new InvalidOptionsError('format', [`expected one of ${CHANGELOG_FORMATS.join(', ')}, got "${value}"`]);
  return found;
}

function kb(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}

/**
 * Run a mutation with changelog tracking when `--changelog` is given,
 * then persist the log into the container.
 */
async function tracked<T>(handle: ContainerHandle, args: string[], run: (tracker?: ChangelogTracker) => Promise<T>): Promise<T> {
  if (!args.includes('--changelog')) return run(undefined);
  const tracker = await loadChangelog(handle);
  tracker.startTracking();
  const result = await run(tracker);
  await persistChangelog(handle, tracker);
  return result;
}

function printImport(result: ImportResult): void {
  for (const o of result.outcomes) {
    if (o.status === 'added') console.log(`  ✓ added       ${o.path}`);
    else if (o.status === 'overwritten') console.log(`  ✓ overwritten ${o.path}`);
    else if (o.status === 'skipped-duplicate') console.log(`  ↷ skipped     ${o.path}: ${o.reason}`);
    else console.log(`  ✗ failed      ${o.path || o.source}: ${o.reason}`);
  }
  console.log(`${result.added} added, ${result.overwritten} overwritten, ${result.skipped} skipped, ${result.failed} failed`);
  if (result.cancelled) console.log('Cancelled: remaining files were not imported');
  if (result.aborted) console.log('Aborted on first failure: container unchanged');
  console.log(`Files in container: ${result.filesCount}`);
}

function printExport(result: ExportResult): void {
  for (const o of result.outcomes) {
    if (o.status === 'exported') console.log(`  ✓ ${o.path} (${kb(o.size ?? 0)} KB)`);
    else console.log(`  ✗ ${o.path}: ${o.reason}`);
  }
  console.log(`${result.exported} exported, ${result.failed} failed`);
  if (result.removed.length > 0) console.log(`Removed from container: ${result.removed.length}`);
}

function printMetadata(result: MetadataResult): void {
  console.log(result.changedKeys.length > 0 ? `✓ Changed: ${result.changedKeys.join(', ')}` : '✓ No changes');
}

// ── Commands ──────────────────────────────────────────────

async function importCmd(args: string[]): Promise<void> {
  const [containerPath, ...paths] = positionals(args);
  if (!containerPath || paths.length === 0) {
    usage('import <container.svg> <paths...> [--overwrite] [--preserve] [--strategy preserve|flat|nested|by-source] [--compress] [--unpack] [--stop-on-error] [--changelog]');
  }

  const config = await loadConfig();
  const handle = openContainer(containerPath);
  const sources = await resolveSources(paths, { exclude: config.exclude, unpackArchives: args.includes('--unpack') });
  if (sources.length === 0) throw new Error('No files found to import');

  const strategyFlag = getFlag(args, '--strategy');
  console.log(`📦 Importing ${sources.length} files into ${containerPath}...`);
  const result = await tracked(handle, args, tracker =>
    importFiles(handle, sources, {
      overwrite: args.includes('--overwrite'),
      preserveStructure: args.includes('--preserve') ? true : undefined,
      strategy: strategyFlag ? parseStrategy(strategyFlag) : config.strategy,
      compress: args.includes('--compress') || config.compress,
      continueOnError: !args.includes('--stop-on-error'),
      maxFileSize: config.maxFileSize,
      maxTotalSize: config.maxTotalSize,
      tracker,
    }),
  );

  if (config.creator && result.added > 0) {
    const metadata = await readMetadata(handle);
    if (metadata['creator'] === undefined) await updateMetadata(handle, { creator: config.creator });
  }

  printImport(result);
  if (result.failed > 0) process.exitCode = 1;
}

async function exportCmd(args: string[]): Promise<void> {
  const [containerPath, outDir] = positionals(args);
  const tarPath = getFlag(args, '--tar');
  if (!containerPath || (!outDir && !tarPath)) {
    usage('export <container.svg> [out-dir] [--tar out.tar.gz] [--names a,b] [--pattern p] [--type t] [--remove] [--overwrite] [--changelog]');
  }

  const handle = openContainer(containerPath);
  const names = getFlag(args, '--names');
  const sink: ExportSink = tarPath ? new TarSink(tarPath) : new DirectorySink(outDir, { overwrite: args.includes('--overwrite') });

  console.log(`📤 Exporting from ${containerPath} to ${tarPath ?? outDir}...`);
  const result = await tracked(handle, args, tracker =>
    exportEntries(
      handle,
      {
        names: names ? names.split(',').map(n => n.trim()).filter(Boolean) : undefined,
        pattern: getFlag(args, '--pattern'),
        mediaType: getFlag(args, '--type'),
      },
      sink,
      { removeFromContainer: args.includes('--remove'), tracker },
    ),
  );

  printExport(result);
  if (result.failed > 0) process.exitCode = 1;
}

async function list(args: string[]): Promise<void> {
  const [containerPath] = positionals(args);
  if (!containerPath) usage('list <container.svg> [--type t] [--pattern p] [--json]');

  const entries = await listEntries(openContainer(containerPath), {
    mediaType: getFlag(args, '--type'),
    pattern: getFlag(args, '--pattern'),
  });

  if (args.includes('--json')) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }
  if (entries.length === 0) {
    console.log('(no entries)');
    return;
  }
  for (const e of entries) {
    console.log(`  ${e.path.padEnd(40)} ${kb(e.size).padStart(8)} KB  ${e.mediaType.padEnd(24)} ${e.encoding}`);
  }
  console.log(`${entries.length} entries`);
}

async function exclude(args: string[]): Promise<void> {
  const [containerPath, ...paths] = positionals(args);
  if (!containerPath || paths.length === 0) usage('exclude <container.svg> <paths...> [--changelog]');

  const handle = openContainer(containerPath);
  const result = await tracked(handle, args, tracker => excludeEntries(handle, paths, { tracker }));
  for (const path of result.removed) console.log(`  ✓ removed ${path}`);
  console.log(`Files in container: ${result.filesCount}`);
}

async function rename(args: string[]): Promise<void> {
  const [containerPath, oldPath, newPath] = positionals(args);
  if (!containerPath || !oldPath || !newPath) usage('rename <container.svg> <old-path> <new-path>');

  const info = await renameEntry(openContainer(containerPath), oldPath, newPath);
  console.log(`✓ Renamed ${oldPath} → ${info.path}`);
}

async function meta(args: string[]): Promise<void> {
  const [containerPath, action = 'show', ...rest] = positionals(args);
  if (!containerPath) usage('meta <container.svg> show|set k=v...|remove k...|clean|clear [--changelog]');

  const handle = openContainer(containerPath);
  switch (action) {
    case 'show': {
      console.log(JSON.stringify(await readMetadata(handle), null, 2));
      return;
    }
    case 'set': {
      const patch: Record<string, string> = {};
      for (const pair of rest) {
        const eq = pair.indexOf('=');
        if (eq <= 0) throw new InvalidOptionsError('metadata', [`expected key=value, got "${pair}"`]);
        patch[pair.slice(0, eq)] = pair.slice(eq + 1);
      }
      printMetadata(await tracked(handle, args, tracker => updateMetadata(handle, patch, { tracker })));
      return;
    }
    case 'remove':
      printMetadata(await tracked(handle, args, tracker => removeMetadata(handle, rest, { tracker })));
      return;
    case 'clean':
      printMetadata(await tracked(handle, args, tracker => cleanMetadata(handle, { tracker })));
      return;
    case 'clear':
      printMetadata(await tracked(handle, args, tracker => clearMetadata(handle, { tracker })));
      return;
    default:
      usage('meta <container.svg> show|set k=v...|remove k...|clean|clear [--changelog]');
  }
}

async function changelog(args: string[]): Promise<void> {
  const [containerPath] = positionals(args);
  if (!containerPath) usage('changelog <container.svg> [--format markdown|json|xml]');

  const tracker = await loadChangelog(openContainer(containerPath));
  console.log(tracker.generate(parseFormat(getFlag(args, '--format') ?? 'markdown')));
}

async function verify(args: string[]): Promise<void> {
  const [containerPath] = positionals(args);
  if (!containerPath) usage('verify <container.svg>');

  console.log(`🔍 Verifying ${containerPath}...`);
  const report = await verifyContainer(openContainer(containerPath));
  for (const e of report.entries) {
    if (!e.ok) console.error(`  ✗ ${e.path}: ${e.reason}`);
  }
  if (!report.ok) {
    console.error(`✗ Integrity check FAILED (${report.entries.filter(e => !e.ok).length} of ${report.filesCount} entries)`);
    process.exit(1);
  }
  console.log('✓ Container integrity verified');
  console.log(`  Files: ${report.filesCount}`);
  console.log(`  Checksum: ${report.checksum.slice(0, 16)}...`);
}

async function batchExport(args: string[]): Promise<void> {
  const [outDir, ...containers] = positionals(args);
  if (!outDir || containers.length === 0) usage('batch-export <out-dir> <containers...> [--concurrency 4]');

  const concurrency = parseInt(getFlag(args, '--concurrency') || '4', 10);
  const results = await runBatch(
    containers,
    container =>
      exportEntries(openContainer(container), {}, new DirectorySink(join(outDir, stripExtension(basename(container))))),
    { concurrency },
  );

  let failed = 0;
  for (const r of results) {
    if (r.status === 'fulfilled') {
      console.log(`  ✓ ${r.item}: ${r.value.exported} exported, ${r.value.failed} failed`);
      if (r.value.failed > 0) failed++;
    } else if (r.status === 'rejected') {
      console.error(`  ✗ ${r.item}: ${r.reason}`);
      failed++;
    }
  }
  if (failed > 0) process.exitCode = 1;
}

async function serve(args: string[]): Promise<void> {
  const [containerPath] = positionals(args);
  const token = getFlag(args, '--token');
  const port = parseInt(getFlag(args, '--port') || '9474', 10);

  if (!containerPath || !token) usage('serve <container.svg> --token <secret> [--port 9474] [--host 127.0.0.1]');

  const config = await loadConfig();
  const server = createContainerServer({
    port,
    host: getFlag(args, '--host'),
    handle: openContainer(containerPath),
    token,
    maxFileSize: config.maxFileSize,
    compress: config.compress,
  });
  await server.listen();
}

// ── Main ──────────────────────────────────────────────────

const [command, ...args] = process.argv.slice(2);

const commands: Record<string, (args: string[]) => Promise<void>> = {
  import: importCmd,
  export: exportCmd,
  list,
  exclude,
  rename,
  meta,
  changelog,
  verify,
  'batch-export': batchExport,
  serve,
};

if (!command || !commands[command]) {
  console.log(`svgpack: files embedded in an SVG host document

Container:
  svgpack import <container.svg> <paths...> [--overwrite] [--preserve] [--strategy s]
                 [--compress] [--unpack] [--stop-on-error] [--changelog]
  svgpack export <container.svg> [out-dir] [--tar out.tar.gz] [--names a,b]
                 [--pattern p] [--type t] [--remove] [--overwrite] [--changelog]
  svgpack list <container.svg> [--type image/*] [--pattern p] [--json]
  svgpack exclude <container.svg> <paths...> [--changelog]
  svgpack rename <container.svg> <old-path> <new-path>
  svgpack meta <container.svg> show|set k=v...|remove k...|clean|clear
  svgpack changelog <container.svg> [--format markdown|json|xml]
  svgpack verify <container.svg>

Many containers:
  svgpack batch-export <out-dir> <containers...> [--concurrency 4]

HTTP API:
  svgpack serve <container.svg> --token <secret> [--port 9474]

Settings are read from svgpack.config.json (or $SVGPACK_CONFIG).`);
  process.exit(command ? 1 : 0);
}

commands[command](args).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
