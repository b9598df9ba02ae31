import { describe, it, expect } from 'vitest';
import { ReinvocationLoop } from '../../../src/application/services/reinvocation-loop.js';
import { LambdaHandlerClient } from '../../../src/infrastructure/lambda/lambda-handler-client.js';
import type { LambdaInvokeFn, LambdaInvokeInput, LambdaInvokeOutput } from '../../../src/infrastructure/lambda/lambda-handler-client.js';
import { RecordingSleeper } from '../../fakes/invocation/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { makePlan, makeRequest, TEST_TARGET } from '../../helpers/invocation-fixtures.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function payload(text: string): Uint8Array {
  return encoder.encode(text);
}

function clientWith(invoke: LambdaInvokeFn, timeoutMs = 1000): LambdaHandlerClient {
  return new LambdaHandlerClient({ timeoutMs, logger: new FakeLogger().asLogger(), invoke });
}

function respondWith(output: LambdaInvokeOutput): LambdaInvokeFn {
  return async () => output;
}

const hangUntilAborted: LambdaInvokeFn = (_target, _input, abortSignal) =>
  new Promise((_resolve, reject) => {
    abortSignal.addEventListener('abort', () => reject(abortSignal.reason), { once: true });
  });

const neverSettles: LambdaInvokeFn = () => new Promise(() => {});

describe('LambdaHandlerClient', () => {
  it('sends the wire payload to the configured function', async () => {
    const sent: LambdaInvokeInput[] = [];
    const client = clientWith(async (_target, input) => {
      sent.push(input);
      return { StatusCode: 200, Payload: payload('{"status":"SUCCESS"}') };
    });

    const response = expectOk(await client.invoke(TEST_TARGET, makeRequest()), 'invoke');

    expect(response).toEqual({ status: 'SUCCESS' });
    expect(sent).toHaveLength(1);
    expect(sent[0]?.FunctionName).toBe('TestEntrypoint');
    expect(JSON.parse(decoder.decode(sent[0]?.Payload))).toEqual({
      action: 'CREATE',
      bearerToken: 'token-1',
      resourceRequest: { name: 'x' },
      callbackContext: {},
    });
  });

  describe('protocol errors', () => {
    it('rejects a function error', async () => {
      const client = clientWith(respondWith({ StatusCode: 200, FunctionError: 'Unhandled', Payload: payload('{"errorMessage":"boom"}') }));

      const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'function error');

      expect(error).toEqual({
        code: 'PROTOCOL_ERROR',
        message: 'Handler function raised an error (Unhandled) instead of returning a progress event',
        raw: '{"errorMessage":"boom"}',
      });
    });

    it('rejects an empty payload', async () => {
      const error = expectErr(await clientWith(respondWith({ StatusCode: 200 })).invoke(TEST_TARGET, makeRequest()), 'empty');
      expect(error).toEqual({ code: 'PROTOCOL_ERROR', message: 'Handler returned an empty payload', raw: '' });
    });

    it('rejects a payload that is not JSON', async () => {
      const client = clientWith(respondWith({ Payload: payload('not json') }));

      const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'not json');

      expect(error.code).toBe('PROTOCOL_ERROR');
      expect(error.message.startsWith('Handler payload is not valid JSON: ')).toBe(true);
    });

    it('rejects a JSON payload that is not an object', async () => {
      const client = clientWith(respondWith({ Payload: payload('[1,2]') }));

      const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'array');

      expect(error).toEqual({ code: 'PROTOCOL_ERROR', message: 'Handler payload is not a JSON object', raw: '[1,2]' });
    });

    it('reports an endpoint that answered with a service error', async () => {
      const serviceError = Object.assign(new Error('Function not found: TestEntrypoint'), {
        name: 'ResourceNotFoundException',
        $metadata: { httpStatusCode: 404 },
      });
      const client = clientWith(() => Promise.reject(serviceError));

      const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'service error');

      expect(error).toEqual({
        code: 'PROTOCOL_ERROR',
        message: 'Endpoint rejected the invocation: ResourceNotFoundException: Function not found: TestEntrypoint',
      });
    });
  });

  it('reports an unreachable endpoint as a connection error', async () => {
    const client = clientWith(() => Promise.reject(new Error('connect ECONNREFUSED 127.0.0.1:3001')));

    const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'refused');

    expect(error).toEqual({
      code: 'CONNECTION_ERROR',
      message: 'Could not reach http://127.0.0.1:3001: Error: connect ECONNREFUSED 127.0.0.1:3001',
      endpoint: 'http://127.0.0.1:3001',
    });
  });

  it('gives up after the per-invocation timeout', async () => {
    const client = clientWith(hangUntilAborted, 20);

    const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'timeout');

    expect(error).toEqual({ code: 'TIMEOUT', message: 'Handler did not respond within 20ms', timeoutMs: 20 });
  });

  it('times out an invoke function that ignores its abort signal', async () => {
    const client = clientWith(neverSettles, 20);

    const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'ignored signal');

    expect(error).toEqual({ code: 'TIMEOUT', message: 'Handler did not respond within 20ms', timeoutMs: 20 });
  });

  it('classifies a synchronous throw from the invoke function', async () => {
    const client = clientWith(() => {
      throw new Error('socket hang up');
    });

    const error = expectErr(await client.invoke(TEST_TARGET, makeRequest()), 'sync throw');

    expect(error).toEqual({
      code: 'CONNECTION_ERROR',
      message: 'Could not reach http://127.0.0.1:3001: Error: socket hang up',
      endpoint: 'http://127.0.0.1:3001',
    });
  });

  describe('callback context fidelity', () => {
    it('echoes the context text exactly on the next invocation', async () => {
      const sent: string[] = [];
      const responses = [
        '{"status":"IN_PROGRESS","callbackContext":{"id":12345678901234567890,"__proto__":{"x":1}}}',
        '{"status":"SUCCESS"}',
      ];
      const client = clientWith(async (_target, input) => {
        sent.push(decoder.decode(input.Payload));
        return { StatusCode: 200, Payload: payload(responses[sent.length - 1] ?? '{"status":"SUCCESS"}') };
      });
      const loop = new ReinvocationLoop({ client, sleeper: new RecordingSleeper(), logger: new FakeLogger().asLogger() });

      const state = await loop.run(makePlan('CREATE', { name: 'x' }), { budget: { kind: 'unbounded' } });

      expect(state.status.kind).toBe('done_success');
      expect(sent).toEqual([
        '{"action":"CREATE","bearerToken":"token-1","resourceRequest":{"name":"x"},"callbackContext":{}}',
        '{"action":"CREATE","bearerToken":"token-1","resourceRequest":{"name":"x"},"callbackContext":{"id":12345678901234567890,"__proto__":{"x":1}}}',
      ]);
    });
  });

  describe('cancellation', () => {
    it('aborts an in-flight call', async () => {
      const controller = new AbortController();
      const client = clientWith(hangUntilAborted);

      const pending = client.invoke(TEST_TARGET, makeRequest(), { signal: controller.signal });
      controller.abort('interrupted');

      const error = expectErr(await pending, 'aborted');
      expect(error).toEqual({ code: 'CANCELLED', message: 'Invocation cancelled: interrupted', reason: 'interrupted' });
    });

    it('cancels even when the invoke function ignores its abort signal', async () => {
      const controller = new AbortController();
      const client = clientWith(neverSettles);

      const pending = client.invoke(TEST_TARGET, makeRequest(), { signal: controller.signal });
      controller.abort('interrupted');

      const error = expectErr(await pending, 'ignored abort');
      expect(error).toEqual({ code: 'CANCELLED', message: 'Invocation cancelled: interrupted', reason: 'interrupted' });
    });

    it('does not call the function when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort('interrupted');
      let called = false;
      const client = clientWith(async () => {
        called = true;
        return { Payload: payload('{"status":"SUCCESS"}') };
      });

      const error = expectErr(await client.invoke(TEST_TARGET, makeRequest(), { signal: controller.signal }), 'pre-aborted');

      expect(error.code).toBe('CANCELLED');
      expect(called).toBe(false);
    });
  });
});
