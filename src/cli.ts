#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { recordCommand } from './commands/record.js';
import { replayCommand } from './commands/replay.js';
import { sessionsCommand } from './commands/sessions.js';
import { diffCommand } from './commands/diff.js';
import { loadConfig, parsePort } from './config.js';
import { startServer } from './server/index.js';
import { logger, setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('mcp-tape')
  .description('Record MCP server sessions and replay them as a deterministic mock server')
  .version('0.1.0');

program
  .command('record')
  .description('Run a target MCP server through the recording proxy and append the session to a trace')
  .requiredOption('-t, --target <command>', 'Target MCP server command to record')
  .option('--trace <path>', 'Trace file to append to (default: $MCP_TAPE_TRACE or ./traces/sessions.jsonl)')
  .option('--calls <path>', 'JSON file listing the calls to make (default: one sample call per tool)')
  .option('--events <path>', 'Also stream one NDJSON line per request and response to this file')
  .option('-l, --label <label>', 'Label stored in the session metadata')
  .option('--debug', 'Enable debug logging')
  .action(recordCommand);

program
  .command('replay')
  .description('Serve recorded sessions as a mock MCP server on stdio')
  .option('--trace <path>', 'Trace file to replay')
  .option('-s, --session <id>', 'Replay a single session instead of the whole file')
  .option('--debug', 'Enable debug logging')
  .action(replayCommand);

program
  .command('sessions')
  .description('List the sessions in a trace file')
  .option('--trace <path>', 'Trace file to read')
  .action(sessionsCommand);

program
  .command('diff')
  .description('Compare the latest sessions of two traces for regressions')
  .requiredOption('-b, --baseline <path>', 'Path to baseline trace')
  .requiredOption('-c, --current <path>', 'Path to current trace')
  .option('-o, --output <path>', 'Path to save diff report', './reports/diff.md')
  .action(diffCommand);

program
  .command('serve')
  .description('Start the HTTP API for inspecting and replaying a trace')
  .option('--trace <path>', 'Trace file to serve')
  .option('-p, --port <port>', 'Port to listen on', (value: string) => {
    const port = parsePort(value);
    if (port === undefined) {
      throw new InvalidArgumentError('Not a port number.');
    }
    return port;
  })
  .action(async (options: { trace?: string; port?: number }) => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    await startServer({ port: options.port ?? config.port, traceFile: options.trace ?? config.traceFile });
  });

program.parseAsync().catch((err: unknown) => {
  logger.error('Command failed', { error: err });
  process.exit(1);
});
