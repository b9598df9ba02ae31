import { describe, it, expect, afterEach } from 'vitest';
import { DI } from '../../src/di/tokens.js';
import { isInitialized, resetContainer } from '../../src/di/container.js';
import type { InvokeHandlerUseCase } from '../../src/application/use-cases/invoke-handler.js';
import type { HandlerClient } from '../../src/ports/handler-client.port.js';
import type { ProcessTerminator } from '../../src/runtime/ports/process-terminator.js';
import type { ProcessLifecyclePolicy } from '../../src/runtime/runtime-mode.js';
import { LambdaHandlerClient } from '../../src/infrastructure/lambda/lambda-handler-client.js';
import { ThrowingProcessTerminator } from '../../src/runtime/adapters/throwing-process-terminator.js';
import { RecordingSleeper, ScriptedHandlerClient } from '../fakes/invocation/index.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { TEST_APP_CONFIG, setupTest, teardownTest } from '../di/test-container.js';
import { expectOk } from '../helpers/result-helpers.js';

describe('DI container', () => {
  afterEach(() => {
    teardownTest();
    resetContainer();
  });

  it('wires the invoke use case to the registered ports', async () => {
    const client = ScriptedHandlerClient.respondingWith(
      { status: 'IN_PROGRESS', callbackContext: { step: 1 }, callbackDelaySeconds: 2 },
      { status: 'SUCCESS' }
    );
    const sleeper = new RecordingSleeper();
    const loggers = new FakeLoggerFactory();
    const container = await setupTest({ handlerClient: client, sleeper, loggerFactory: loggers });

    const invokeHandler = container.resolve<InvokeHandlerUseCase>(DI.Invocation.InvokeHandler);
    const outcome = expectOk(
      await invokeHandler({
        action: 'UPDATE',
        body: { id: 'r-1' },
        target: TEST_APP_CONFIG.target,
        budget: TEST_APP_CONFIG.budget,
      }),
      'invoke through container'
    );

    expect(outcome).toMatchObject({ kind: 'succeeded', invocations: 2, bearerToken: 'token-1' });
    expect(sleeper.waits).toEqual([2000]);
    expect(loggers.getLogger('ReinvocationLoop')?.hasEntry('info', 'Run finished')).toBe(true);
  });

  it('uses the Lambda adapter when no handler client is given', async () => {
    const container = await setupTest();
    expect(container.resolve<HandlerClient>(DI.Invocation.HandlerClient)).toBeInstanceOf(LambdaHandlerClient);
  });

  it('installs test runtime adapters', async () => {
    const container = await setupTest();

    expect(isInitialized()).toBe(true);
    expect(container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator)).toBeInstanceOf(ThrowingProcessTerminator);
    expect(container.resolve<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy)).toEqual({
      kind: 'no_signal_handlers',
    });
  });
});
