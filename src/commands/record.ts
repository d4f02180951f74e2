import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { CaptureController } from '../capture/controller.js';
import { EventLog } from '../capture/events.js';
import { describeCall, loadCallPlan, planSampleCalls, runPlannedCall, type PlannedCall } from '../capture/plan.js';
import { SdkSession } from '../capture/session.js';
import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { TraceWriter } from '../tracer/store.js';
import { splitCommandLine } from '../utils/command.js';
import { logger, setLogLevel } from '../utils/logger.js';

interface RecordOptions {
  target: string;
  trace?: string;
  calls?: string;
  events?: string;
  label?: string;
  debug?: boolean;
}

export async function recordCommand(options: RecordOptions): Promise<void> {
  const config = loadConfig();
  setLogLevel(options.debug ? 'debug' : config.logLevel);

  const { command: targetCmd, args: targetArgs } = splitCommandLine(options.target);
  if (!targetCmd) {
    logger.error('No command specified in target');
    process.exit(1);
  }

  let plan: PlannedCall[] | undefined;
  if (options.calls) {
    try {
      plan = loadCallPlan(options.calls);
      logger.info('Loaded call plan', { path: options.calls, calls: plan.length });
    } catch (err) {
      logger.error('Failed to load call plan', { path: options.calls, error: errorMessage(err) });
      process.exit(1);
    }
  }

  const tracePath = options.trace ?? config.traceFile;
  const controller = new CaptureController({ writer: new TraceWriter(tracePath), graceMs: config.graceMs });

  logger.info('Starting target MCP server', { cmd: targetCmd, args: targetArgs });
  const transport = new StdioClientTransport({ command: targetCmd, args: targetArgs, stderr: 'inherit' });
  const live = new SdkSession(new Client({ name: 'mcp-tape', version: '0.1.0' }), transport);
  const session = controller.attach(live);
  if (options.events) {
    new EventLog(options.events).attachTo(session);
    logger.info('Streaming call events', { path: options.events });
  }

  controller.startCapture(
    { command: targetCmd, args: targetArgs },
    { target: options.target, ...(options.label ? { label: options.label } : {}) }
  );

  try {
    const handshake = await session.initialize();
    logger.info('Connected', { server: handshake.serverInfo.name, version: handshake.serverInfo.version });

    const { tools } = handshake.capabilities.tools ? await session.listTools() : { tools: [] };
    logger.info(`Found ${tools.length} tools`);

    if (handshake.capabilities.resources) {
      const { resources } = await session.listResources();
      logger.info(`Found ${resources.length} resources`);
    }
    if (handshake.capabilities.prompts) {
      const { prompts } = await session.listPrompts();
      logger.info(`Found ${prompts.length} prompts`);
    }

    for (const call of plan ?? planSampleCalls(tools)) {
      try {
        await runPlannedCall(session, call);
        logger.debug('Call succeeded', { call: describeCall(call) });
      } catch (err) {
        // failures are recorded like any other answer
        logger.warn('Call failed', { call: describeCall(call), error: errorMessage(err) });
      }
    }
  } catch (err) {
    logger.error('Recording aborted', { error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    controller.detach();
    try {
      const recorded = controller.finishCapture();
      console.error(`\nrecorded ${recorded.calls.length} calls to ${tracePath} (session ${recorded.sessionId})`);
    } finally {
      await live.close();
    }
  }
}
