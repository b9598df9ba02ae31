#!/usr/bin/env node
/**
 * provider-invoke CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import { abortOnShutdown } from './runtime/shutdown-abort.js';
import type { ConfigOverrides, ValidatedConfig } from './config/app-config.js';
import { loadConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { createBootstrapLogger, parseLogLevel } from './core/logging/index.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import type { InvokeHandlerUseCase } from './application/use-cases/invoke-handler.js';
import { createLoadRequestFileUseCase } from './application/use-cases/load-request-file.js';
import { parseJson } from './domain/invocation/json-codec.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure, misuse } from './cli/types/cli-result.js';
import { increaseVerbosity, levelForVerbosity } from './cli/verbosity.js';
import { executeActionsCommand, executeInvokeCommand, executeValidateEventCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// SHARED WIRING
// ═══════════════════════════════════════════════════════════════════════════

const loadJsonFile = createLoadRequestFileUseCase({
  resolvePath: path.resolve,
  existsSync: fs.existsSync,
  readFileSyncUtf8: (resolvedPath: string) => fs.readFileSync(resolvedPath, 'utf-8'),
  parseJson,
});

interface InvokeCliOptions {
  readonly endpoint?: string;
  readonly functionName?: string;
  readonly region?: string;
  readonly maxReinvoke?: string;
  readonly timeout?: string;
  readonly verbose: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('provider-invoke')
  .description('Drive resource provider handlers through a full lifecycle operation')
  .version('0.1.0');

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (pure filesystem operations)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('actions')
  .description('List the lifecycle actions a handler can be invoked with')
  .action(() => {
    interpretCliResultWithoutDI(executeActionsCommand());
  });

program
  .command('validate-event <event-file>')
  .description('Check a saved handler response against the progress event contract')
  .action((filePath: string) => {
    interpretCliResultWithoutDI(executeValidateEventCommand(filePath, { loadEventFile: loadJsonFile }));
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI (need services)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('invoke <action> <request-file>')
  .description('Invoke a handler and re-invoke it until it reports SUCCESS or FAILED')
  .option('--endpoint <url>', 'Lambda-compatible endpoint (env PROVIDER_INVOKE_ENDPOINT)')
  .option('--function-name <name>', 'Function to invoke (env PROVIDER_INVOKE_FUNCTION_NAME)')
  .option('--region <region>', 'Region for the Lambda client (env PROVIDER_INVOKE_REGION)')
  .option('--max-reinvoke <count>', 'Maximum re-invocations after the first call (env PROVIDER_INVOKE_MAX_REINVOKE)')
  .option('--timeout <seconds>', 'Per-invocation deadline (env PROVIDER_INVOKE_TIMEOUT_SECONDS)')
  .option('-v, --verbose', 'Log to stderr; repeat for per-invocation detail', increaseVerbosity, 0)
  .action(async (action: string, requestFile: string, options: InvokeCliOptions) => {
    const overrides: ConfigOverrides = {
      endpoint: options.endpoint,
      functionName: options.functionName,
      region: options.region,
      maxReinvoke: options.maxReinvoke,
      timeoutSeconds: options.timeout,
    };
    const configResult = loadConfig({ env: process.env, overrides });
    if (configResult.isErr()) {
      interpretCliResultWithoutDI(misuse(formatAppError(configResult.error)));
      return;
    }
    const config = configResult.value;

    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
    await initializeContainer({ runtimeMode: { kind: 'cli' } });

    const loggers = container.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
    loggers.setLevel(levelForVerbosity(options.verbose, parseLogLevel(loggers.root.level) ?? 'silent'));

    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const invokeHandler = container.resolve<InvokeHandlerUseCase>(DI.Invocation.InvokeHandler);

    const shutdown = abortOnShutdown(container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals));
    const result = await executeInvokeCommand(
      { action, requestFile, target: config.target, budget: config.budget, signal: shutdown.signal },
      { loadRequestFile: loadJsonFile, invokeHandler }
    );
    shutdown.dispose();

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  createBootstrapLogger('cli').fatal({ err: error }, 'Unhandled error');
  interpretCliResultWithoutDI(
    failure(formatAppError(Err.unexpected('Unexpected error', error)), { exitCode: { kind: 'unhandled' } })
  );
});
