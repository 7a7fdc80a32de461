import { afterEach, describe, expect, it, vi } from 'vitest';
import { engineError } from './errors';
import { BattleshipError } from './games/battleship';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('engineError', () => {
  it('passes client errors through with their code and status', async () => {
    const res = engineError(new BattleshipError('B2 has already been fired at', 'ALREADY_FIRED', 409), 'Turn failed');
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'B2 has already been fired at', code: 'ALREADY_FIRED' });
  });

  it('hides invariant violations behind a 500 and logs them', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const err = new BattleshipError('Every cell has been fired at', 'NO_TARGETS', 500);

    const res = engineError(err, 'Turn failed in game ABCDEF');
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Something went wrong', code: 'INTERNAL_ERROR' });
    expect(log).toHaveBeenCalledWith('Turn failed in game ABCDEF:', err);
  });

  it('treats unknown errors as internal', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const res = engineError(new Error('boom'), 'Game setup failed');
    expect(res.status).toBe(500);
  });
});
