import { bestEffort, failOpen } from './policies';

describe('failOpen', () => {
  it('returns the gate answer when it succeeds', async () => {
    expect(await failOpen('gate', async () => false, true)).toBe(false);
  });

  it('lets the request through when the gate errors', async () => {
    const result = await failOpen('gate', async (): Promise<boolean> => {
      throw new Error('upstream down');
    }, true);
    expect(result).toBe(true);
  });
});

describe('bestEffort', () => {
  it('wraps the value on success', async () => {
    expect(await bestEffort('side effect', async () => 42)).toEqual({ ok: true, value: 42 });
  });

  it('reports the failure instead of throwing', async () => {
    const outcome = await bestEffort('side effect', async () => {
      throw new Error('disk full');
    });
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? null : outcome.error.message).toBe('disk full');
  });

  it('turns thrown non-errors into errors', async () => {
    const outcome = await bestEffort('side effect', () => Promise.reject('plain string'));
    expect(outcome.ok ? null : outcome.error.message).toBe('plain string');
  });
});
