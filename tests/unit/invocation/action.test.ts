import { describe, it, expect } from 'vitest';
import { ACTIONS, parseAction } from '../../../src/domain/invocation/action.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('parseAction', () => {
  it.each(ACTIONS)('accepts %s', (action) => {
    expect(expectOk(parseAction(action), action)).toBe(action);
  });

  it('rejects lower-case names', () => {
    const error = expectErr(parseAction('create'), 'lower-case action');
    expect(error).toEqual({
      code: 'INVALID_ACTION',
      message: "Unknown action 'create'. Expected one of: CREATE, READ, UPDATE, DELETE, LIST",
      value: 'create',
    });
  });

  it('rejects unknown actions', () => {
    expect(expectErr(parseAction('PATCH'), 'unknown action').code).toBe('INVALID_ACTION');
    expect(expectErr(parseAction(''), 'empty action').value).toBe('');
  });
});
