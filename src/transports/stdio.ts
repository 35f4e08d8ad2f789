/**
 * transports/stdio.ts
 *
 * JSON-RPC 2.0 over stdin/stdout, for a front end that spawns the engine as
 * a child process and talks to it through pipes.
 *
 * Protocol:
 *   Client sends:  { "jsonrpc": "2.0", "id": N, "method": "tweaks/apply", "params": {...} }
 *   Server sends:  { "jsonrpc": "2.0", "id": N, "result": {...} }
 *                  or { "jsonrpc": "2.0", "id": N, "error": { "code": N, "message": "..." } }
 *
 * Input is newline-delimited JSON (one complete JSON object per line).
 * Logs never go to stdout in this mode; see core/logger.ts.
 */

import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { RpcDispatcher, JsonRpcResponse, RPC_PARSE_ERROR, rpcError } from './rpc';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/stdio');

export interface StdioOptions {
  input?: Readable;
  output?: Writable;
  /** Called once stdin has closed and every in-flight request has answered. */
  onClose?: () => void;
}

export function startStdioTransport(dispatcher: RpcDispatcher, options: StdioOptions = {}): readline.Interface {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const inFlight = new Set<Promise<void>>();

  log.info('Stdio transport started — listening on stdin');

  const send = (response: JsonRpcResponse): void => {
    output.write(JSON.stringify(response) + '\n');
  };

  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (!trimmed) return;

    let message: unknown;
    try {
      message = JSON.parse(trimmed);
    } catch (e) {
      log.warn({ raw: trimmed, error: errorMessage(e) }, 'Failed to parse JSON-RPC request');
      send(rpcError(null, RPC_PARSE_ERROR, 'Parse error'));
      return;
    }

    const response = await dispatcher.handle(message);
    if (response) send(response);
  };

  const rl = readline.createInterface({ input, terminal: false });

  rl.on('line', (line: string) => {
    const pending: Promise<void> = handleLine(line)
      .catch(e => {
        // dispatcher.handle answers every error itself; this only sees a broken output stream
        log.error({ error: errorMessage(e) }, 'Critical error in stdio line handler');
      })
      .finally(() => inFlight.delete(pending));
    inFlight.add(pending);
  });

  rl.on('close', () => {
    log.info({ inFlight: inFlight.size }, 'Stdin closed — shutting down stdio transport');
    Promise.all(Array.from(inFlight))
      .then(() => options.onClose?.())
      .catch(e => log.error({ error: errorMessage(e) }, 'Error while draining stdio requests'));
  });

  return rl;
}
