import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ProcessLifecyclePolicy, RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { HandlerClient } from '../ports/handler-client.port.js';
import type { Sleeper } from '../ports/sleeper.port.js';
import type { BearerTokenSource } from '../ports/bearer-token.port.js';
import { LambdaHandlerClient, createPooledLambdaInvoker } from '../infrastructure/lambda/lambda-handler-client.js';
import { NodeSleeper } from '../infrastructure/time/node-sleeper.js';
import { NodeBearerTokenSource } from '../infrastructure/ids/node-bearer-token-source.js';
import { ReinvocationLoop } from '../application/services/reinvocation-loop.js';
import { createInvokeHandlerUseCase } from '../application/use-cases/invoke-handler.js';
import type { InvokeHandlerUseCase } from '../application/use-cases/invoke-handler.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // The CLI (and tests) register a validated config before initialization;
  // only fall back to the environment when nothing was provided.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) {
    throw new Error(formatAppError(configResult.error));
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions = {}): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// INVOCATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Ports are only registered when missing so tests can substitute fakes
 * (scripted handler, recording sleeper) before initialization.
 */
function registerInvocation(): void {
  if (!container.isRegistered(DI.Infra.LoggerFactory)) {
    container.register(DI.Infra.LoggerFactory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Invocation.HandlerClient)) {
    container.register<HandlerClient>(DI.Invocation.HandlerClient, {
      useFactory: instanceCachingFactory((c: DependencyContainer) => {
        const config = c.resolve<ValidatedConfig>(DI.Config.App);
        const loggers = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
        return new LambdaHandlerClient({
          timeoutMs: config.invocationTimeoutMs,
          logger: loggers.root,
          invoke: createPooledLambdaInvoker({ region: config.region }),
        });
      }),
    });
  }

  if (!container.isRegistered(DI.Invocation.Sleeper)) {
    container.register<Sleeper>(DI.Invocation.Sleeper, {
      useFactory: instanceCachingFactory(() => new NodeSleeper()),
    });
  }

  if (!container.isRegistered(DI.Invocation.BearerTokens)) {
    container.register<BearerTokenSource>(DI.Invocation.BearerTokens, {
      useFactory: instanceCachingFactory(() => new NodeBearerTokenSource()),
    });
  }

  container.register<ReinvocationLoop>(DI.Invocation.Loop, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const loggers = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
      return new ReinvocationLoop({
        client: c.resolve<HandlerClient>(DI.Invocation.HandlerClient),
        sleeper: c.resolve<Sleeper>(DI.Invocation.Sleeper),
        logger: loggers.create('ReinvocationLoop'),
      });
    }),
  });

  container.register<InvokeHandlerUseCase>(DI.Invocation.InvokeHandler, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createInvokeHandlerUseCase({
        tokens: c.resolve<BearerTokenSource>(DI.Invocation.BearerTokens),
        loop: c.resolve<ReinvocationLoop>(DI.Invocation.Loop),
      })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Idempotent: concurrent and repeated calls share the same initialization.
 * Fail-fast: a failed initialization is not retried; restart the process.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return Promise.resolve();
  if (initializationPromise) return initializationPromise;

  initializationPromise = Promise.resolve().then(() => {
    try {
      registerRuntime(options);
      registerConfig();
      registerInvocation();
      initialized = true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`[DI] Container initialization failed: ${message}`);
    }
  });
  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
