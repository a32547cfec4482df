#!/usr/bin/env node
/**
 * datasafe: local repository for research datasets
 *
 * Server:
 *   datasafe serve [--port 8000] [--root <dir>]
 *
 * Datasets (local storage, a server with --server <url>, or the
 * DATASAFE_URL server with --remote):
 *   datasafe check <loi>
 *   datasafe create <loi>
 *   datasafe manifest [--path <dir>] [--filename <prefix>]
 *   datasafe upload <loi> [--path <dir>] [--filename <prefix>]
 *   datasafe update <loi> [--path <dir>] [--filename <prefix>]
 *   datasafe download <loi>
 *   datasafe verify <dir>
 *   datasafe index
 */

import { join } from 'node:path';
import { Backend } from './backend.js';
import { Client, HttpClient, LocalClient } from './client.js';
import { loadConfig, type DatasafeConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { checkLoi } from './loi-checker.js';
import { Manifest } from './manifest.js';
import { createHttpServer } from './server.js';
import { StorageBackend } from './storage.js';

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function configure(): Readonly<DatasafeConfig> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}

function serverUrl(args: string[], config: Readonly<DatasafeConfig>): string | undefined {
  return getFlag(args, '--server') ?? (args.includes('--remote') ? config.serverUrl : undefined);
}

function localBackend(config: Readonly<DatasafeConfig>, args: string[]): Backend {
  return new Backend(
    new StorageBackend({
      rootDirectory: getFlag(args, '--root') ?? config.rootDirectory,
      manifestFilename: config.manifestFilename,
    })
  );
}

function clientFor(args: string[]): Client {
  const config = configure();
  const options = {
    manifestFilename: config.manifestFilename,
    algorithm: config.checksumAlgorithm,
  };
  const server = serverUrl(args, config);
  if (server) return new HttpClient({ baseUrl: server, ...options });
  return new LocalClient(localBackend(config, args), options);
}

function usage(command: string): never {
  console.error(`Usage: datasafe ${command}`);
  process.exit(1);
}

function printReport(report: { data: boolean; all: boolean }): void {
  console.log(`  Data:              ${report.data ? '✓' : '✗'}`);
  console.log(`  Data and metadata: ${report.all ? '✓' : '✗'}`);
}

// ── Server ──────────────────────────────────────────────────

async function serve(args: string[]): Promise<void> {
  const config = configure();
  const portFlag = getFlag(args, '--port');
  const port = portFlag ? parseInt(portFlag, 10) : config.port;
  if (Number.isNaN(port)) usage('serve [--port 8000] [--root <dir>]');

  const server = createHttpServer({ port, backend: localBackend(config, args) });
  const bound = await server.listen();
  console.log(`Datasafe listening on port ${bound}`);
}

// ── Datasets ────────────────────────────────────────────────

async function check(args: string[]): Promise<void> {
  const loi = args[0];
  if (!loi) usage('check <loi>');

  if (checkLoi(loi)) {
    console.log(`✓ ${loi} is a valid LOI`);
  } else {
    console.error(`✗ ${loi} is not a valid LOI`);
    process.exit(1);
  }
}

async function create(args: string[]): Promise<void> {
  const loi = args[0];
  if (!loi) usage('create <loi> [--server <url>]');

  const created = await clientFor(args).create(loi);
  console.log(`✓ Created ${created}`);
}

async function manifest(args: string[]): Promise<void> {
  const written = await clientFor(args).createManifest({
    path: getFlag(args, '--path'),
    filename: getFlag(args, '--filename'),
  });
  console.log(`✓ Manifest written: ${written.path}`);
  console.log(`  Data:     ${written.dataFilenames.join(', ')} (${written.dataFormat})`);
  console.log(`  Metadata: ${written.metadataFilenames.join(', ')}`);
  console.log(`  Checksum: ${written.checksum}`);
}

async function upload(args: string[]): Promise<void> {
  const loi = args[0];
  if (!loi) usage('upload <loi> [--path <dir>] [--filename <prefix>] [--server <url>]');

  console.log(`⬆  Uploading to ${loi}...`);
  const report = await clientFor(args).upload(loi, {
    path: getFlag(args, '--path'),
    filename: getFlag(args, '--filename'),
  });
  printReport(report);
}

async function update(args: string[]): Promise<void> {
  const loi = args[0];
  if (!loi) usage('update <loi> [--path <dir>] [--filename <prefix>] [--server <url>]');

  console.log(`⬆  Updating ${loi}...`);
  const report = await clientFor(args).update(loi, {
    path: getFlag(args, '--path'),
    filename: getFlag(args, '--filename'),
  });
  printReport(report);
}

async function download(args: string[]): Promise<void> {
  const loi = args[0];
  if (!loi) usage('download <loi> [--server <url>]');

  console.log(`⬇  Downloading ${loi}...`);
  const result = await clientFor(args).download(loi);
  console.log(`✓ Saved to ${result.directory}`);
  if (result.warning) console.warn(`⚠  ${result.warning}`);
}

async function verify(args: string[]): Promise<void> {
  const directory = args[0];
  if (!directory) usage('verify <dir>');

  const config = configure();
  const loaded = await Manifest.fromFile(join(directory, config.manifestFilename));
  const report = await loaded.checkIntegrity();
  console.log(`${report.all ? '✓' : '✗'} ${loaded.loi || directory}`);
  printReport(report);
  if (!report.all) process.exit(1);
}

async function index(args: string[]): Promise<void> {
  const config = configure();
  const server = serverUrl(args, config);
  const paths = server
    ? await new HttpClient({ baseUrl: server }).index()
    : await localBackend(config, args).index();
  for (const path of paths) console.log(path);
}

// ── Main ────────────────────────────────────────────────────

const [command, ...args] = process.argv.slice(2);

const commands: Record<string, (args: string[]) => Promise<void>> = {
  serve,
  check, create, manifest, upload, update, download, verify, index,
};

if (!command || !commands[command]) {
  console.log(`datasafe: local repository for research datasets

Server:
  datasafe serve [--port 8000] [--root <dir>]

Datasets (add --server <url>, or --remote for DATASAFE_URL, to use a remote datasafe):
  datasafe check <loi>
  datasafe create <loi>
  datasafe manifest [--path <dir>] [--filename <prefix>]
  datasafe upload <loi> [--path <dir>] [--filename <prefix>]
  datasafe update <loi> [--path <dir>] [--filename <prefix>]
  datasafe download <loi>
  datasafe verify <dir>
  datasafe index`);
  process.exit(command ? 1 : 0);
}

commands[command](args).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
