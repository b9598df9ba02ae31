// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export { DI } from './di/tokens.js';

// Domain
export * from './domain/invocation/index.js';

// Public API exports
export { ReinvocationLoop, type ReinvocationLoopDeps, type RunOptions } from './application/services/reinvocation-loop.js';
export {
  createInvokeHandlerUseCase,
  type InvokeHandlerDeps,
  type InvokeHandlerInput,
  type InvokeHandlerResult,
  type InvokeHandlerUseCase,
} from './application/use-cases/invoke-handler.js';
export type { HandlerClient, InvokeOptions, RawResponse } from './ports/handler-client.port.js';
export type { Sleeper } from './ports/sleeper.port.js';
export type { BearerTokenSource } from './ports/bearer-token.port.js';

// Configuration
export { loadConfig, createValidatedConfig, type AppConfig, type ConfigOverrides, type ValidatedConfig } from './config/app-config.js';

// Infrastructure exports
export {
  LambdaHandlerClient,
  createPooledLambdaInvoker,
  type LambdaInvokeFn,
  type LambdaHandlerClientOptions,
} from './infrastructure/lambda/lambda-handler-client.js';
export { NodeSleeper } from './infrastructure/time/node-sleeper.js';
export { NodeBearerTokenSource } from './infrastructure/ids/node-bearer-token-source.js';
