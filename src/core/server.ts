#!/usr/bin/env node
/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args → command and transport mode
 *   3. Load session config (config/settings.json + env + CLI overrides)
 *   4. Initialise the logger
 *   5. Load and validate the tweak catalog
 *   6. Load the applied-tweaks record
 *   7. Build the engine
 *   8. Run the one-shot command, or start the selected transport
 *
 * Exit codes: 0 every requested tweak went through, 1 at least one did not,
 * 2 startup or usage failure.
 */

import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';

// .env beside the compiled tree first, then the working directory
const possibleEnvPaths = [
  path.resolve(__dirname, '..', '..', '.env'),     // Relative to dist/core/
  path.resolve(process.cwd(), '.env')
];
const envPath = possibleEnvPaths.find(p => fs.existsSync(p));
if (envPath) {
  dotenv.config({ path: envPath });
}

import type { Server } from 'http';
import { initLogger, scopedLogger } from './logger';
import { CliOptions, loadSessionConfig, parseCli } from './config';
import { CatalogLoader } from './catalog_loader';
import { FileStateStore } from './state_store';
import { WindowsPrivilegeGate } from './privilege';
import { TweakEngine } from './engine';
import { TweakBaseError, errorMessage } from './errors';
import { PowerShellExecutor } from '../tools/powershell_executor';
import { RpcDispatcher } from '../transports/rpc';
import { startStdioTransport } from '../transports/stdio';
import { createHttpTransport } from '../transports/http';
import {
  formatApplyReport,
  formatCatalog,
  formatPlan,
  formatRestoreReport,
  formatStatus
} from './summary';
import { TweakResult } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_STARTUP = 2;

export const USAGE = [
  'Usage: perf-tweaks <command> [--json]',
  '',
  'Commands:',
  '  list                  Show the catalog and what is applied',
  '  status                Show elevation and record status',
  '  apply <id...>         Apply the named tweaks',
  '  apply --all           Apply every tweak in the catalog',
  '  restore               Undo every recorded tweak',
  '  plan                  Show what restore would do',
  '',
  'Long-running transports:',
  '  --transport stdio     JSON-RPC on stdin/stdout',
  '  --transport http      HTTP API (--port N, default 3000)'
].join('\n');

// ---------------------------------------------------------------------------
// One-shot commands
// ---------------------------------------------------------------------------

export interface CommandIo {
  out(text: string): void;
  err(text: string): void;
}

function hasFailures(results: Array<TweakResult<string>>): boolean {
  return results.some(r => r.outcome === 'failed' || r.outcome === 'not_found');
}

/** Run one CLI command against the engine and return the exit code. */
export async function runCommand(
  engine: TweakEngine,
  cli: CliOptions,
  io: CommandIo,
  signal?: AbortSignal
): Promise<number> {
  const print = (value: unknown, text: () => string) =>
    io.out(cli.json ? JSON.stringify(value, null, 2) : text());

  const progress = (result: TweakResult<string>) => {
    if (!cli.json) io.err(`  ... ${result.id}: ${result.outcome}`);
  };

  switch (cli.command) {
    case 'list': {
      const tweaks = engine.describe();
      print(tweaks, () => formatCatalog(tweaks));
      return EXIT_OK;
    }

    case 'status': {
      const status = engine.status();
      print(status, () => formatStatus(status));
      return EXIT_OK;
    }

    case 'plan': {
      const plan = engine.planRestore();
      print(plan, () => formatPlan(plan));
      return EXIT_OK;
    }

    case 'apply': {
      if (cli.all === (cli.ids.length > 0)) {
        io.err('apply needs either tweak ids or --all\n\n' + USAGE);
        return EXIT_STARTUP;
      }
      const ids = cli.all ? engine.catalog.list().map(t => t.id) : cli.ids;
      const report = await engine.apply(ids, { onProgress: progress, signal });
      print(report, () => formatApplyReport(report));
      return hasFailures(report.results) ? EXIT_FAILED : EXIT_OK;
    }

    case 'restore': {
      const report = await engine.restore({ onProgress: progress, signal });
      print(report, () => formatRestoreReport(report));
      return hasFailures(report.results) ? EXIT_FAILED : EXIT_OK;
    }

    default:
      io.err(cli.command === undefined ? USAGE : `Unknown command "${cli.command}"\n\n${USAGE}`);
      return EXIT_STARTUP;
  }
}

// ---------------------------------------------------------------------------
// Main boot sequence
// ---------------------------------------------------------------------------

let serverInstance: Server | null = null;

function shutdownHttp(signal: string): void {
  const log = scopedLogger('core/server');
  log.info({ signal }, 'Received shutdown signal, closing HTTP server');
  if (!serverInstance) process.exit(EXIT_OK);
  serverInstance?.close(() => {
    log.info('HTTP server closed');
    process.exit(EXIT_OK);
  });
  // connections that never drain do not hold the process open
  setTimeout(() => process.exit(EXIT_OK), 5000).unref();
}

async function main(): Promise<number | undefined> {
  const cli = parseCli(process.argv.slice(2));
  const sessionConfig = loadSessionConfig({ cli });

  initLogger(sessionConfig);
  const log = scopedLogger('core/server');
  log.info(
    { transport: sessionConfig.transportMode, stateFile: sessionConfig.stateFile, catalog: sessionConfig.catalogFile },
    'perf-tweaks starting'
  );

  const catalog = new CatalogLoader(sessionConfig.catalogFile).load();
  const store = new FileStateStore(sessionConfig.stateFile);
  await store.load();

  const engine = new TweakEngine({
    catalog,
    store,
    executor: new PowerShellExecutor(sessionConfig.powershellTimeoutMs),
    privilege: new WindowsPrivilegeGate()
  });

  switch (sessionConfig.transportMode) {
    case 'cli': {
      const controller = new AbortController();
      process.once('SIGINT', () => {
        log.warn('Interrupted — stopping after the current tweak');
        controller.abort();
      });
      return runCommand(engine, cli, {
        out: text => process.stdout.write(text + '\n'),
        err: text => process.stderr.write(text + '\n')
      }, controller.signal);
    }

    case 'stdio': {
      startStdioTransport(new RpcDispatcher(engine), { onClose: () => process.exit(EXIT_OK) });
      return undefined;
    }

    case 'http': {
      const app = createHttpTransport(engine, new RpcDispatcher(engine));
      serverInstance = app.listen(sessionConfig.port, () => {
        log.info({ port: sessionConfig.port }, 'HTTP server listening');
      });
      process.on('SIGTERM', () => shutdownHttp('SIGTERM'));
      process.on('SIGINT', () => shutdownHttp('SIGINT'));
      return undefined;
    }

    default: {
      const unreachable: never = sessionConfig.transportMode;
      throw new Error(`Unknown transport mode: ${String(unreachable)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

if (require.main === module) {
  main()
    .then(code => {
      if (code !== undefined) process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error('Fatal error during startup:', errorMessage(e));
      if (e instanceof TweakBaseError && e.details) {
        console.error(JSON.stringify({ code: e.code, ...e.details }, null, 2));
      } else if (e instanceof Error && e.stack) {
        console.error(e.stack);
      }
      process.exitCode = EXIT_STARTUP;
    });
}
