import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = expectOk(loadConfig({ env: {} }), 'defaults');

    expect(config.target).toEqual({ endpoint: 'http://127.0.0.1:3001', functionIdentity: 'TestEntrypoint' });
    expect(config.region).toBe('us-east-1');
    expect(config.budget).toEqual({ kind: 'unbounded' });
    expect(config.invocationTimeoutMs).toBe(30_000);
  });

  it('reads the environment', () => {
    const config = expectOk(
      loadConfig({
        env: {
          PROVIDER_INVOKE_ENDPOINT: 'http://localhost:9001',
          PROVIDER_INVOKE_FUNCTION_NAME: 'BucketHandler',
          PROVIDER_INVOKE_REGION: 'eu-west-1',
          PROVIDER_INVOKE_MAX_REINVOKE: '3',
          PROVIDER_INVOKE_TIMEOUT_SECONDS: '5',
        },
      }),
      'env'
    );

    expect(config.target).toEqual({ endpoint: 'http://localhost:9001', functionIdentity: 'BucketHandler' });
    expect(config.region).toBe('eu-west-1');
    expect(config.budget).toEqual({ kind: 'bounded', maxReinvoke: 3 });
    expect(config.invocationTimeoutMs).toBe(5000);
  });

  it('lets CLI overrides win over the environment', () => {
    const config = expectOk(
      loadConfig({
        env: { PROVIDER_INVOKE_MAX_REINVOKE: '3', PROVIDER_INVOKE_FUNCTION_NAME: 'FromEnv' },
        overrides: { maxReinvoke: '0', functionName: 'FromFlag' },
      }),
      'overrides'
    );

    expect(config.budget).toEqual({ kind: 'bounded', maxReinvoke: 0 });
    expect(config.target.functionIdentity).toBe('FromFlag');
  });

  it('treats a blank re-invoke limit as unbounded', () => {
    expect(expectOk(loadConfig({ env: { PROVIDER_INVOKE_MAX_REINVOKE: '' } }), 'blank').budget).toEqual({
      kind: 'unbounded',
    });
  });

  it.each([
    ['abc', 'Max re-invoke must be a number'],
    ['1.5', 'Max re-invoke must be an integer'],
    ['-1', 'Max re-invoke cannot be negative'],
  ])('rejects max re-invoke %s', (value, message) => {
    const error = expectErr(loadConfig({ env: { PROVIDER_INVOKE_MAX_REINVOKE: value } }), 'bad max re-invoke');

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([{ path: 'PROVIDER_INVOKE_MAX_REINVOKE (--max-reinvoke)', message }]);
  });

  it.each([
    ['0', 'Timeout must be at least 1 second'],
    ['901', 'Timeout cannot exceed 900 seconds'],
  ])('rejects timeout %s', (value, message) => {
    const error = expectErr(loadConfig({ env: {}, overrides: { timeoutSeconds: value } }), 'bad timeout');
    expect(error.issues).toEqual([{ path: 'PROVIDER_INVOKE_TIMEOUT_SECONDS (--timeout)', message }]);
  });

  it('reports every invalid field', () => {
    const error = expectErr(
      loadConfig({ env: { PROVIDER_INVOKE_ENDPOINT: 'not a url', PROVIDER_INVOKE_FUNCTION_NAME: '' } }),
      'two bad fields'
    );

    expect(error.issues).toEqual([
      { path: 'PROVIDER_INVOKE_ENDPOINT (--endpoint)', message: 'Endpoint must be a URL' },
      { path: 'PROVIDER_INVOKE_FUNCTION_NAME (--function-name)', message: 'Function name cannot be empty' },
    ]);
  });
});
