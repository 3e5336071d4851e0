import { describe, expect, it } from 'vitest';
import { makeSession, spawnAt } from '../__test__/session-helper.ts';
import { orbAt } from '../pools.ts';
import { updateDanger } from './danger.ts';

describe('updateDanger', () => {
  it('消費できないオーブが警告距離内に入ると通知し、状態が変わらなければ再通知しない', () => {
    const { s, sink } = makeSession();
    const i = spawnAt(s, 200, 0, 50, 2);
    updateDanger(s);
    expect(orbAt(s.orbs, i).danger).toBe(true);
    expect(sink.onDangerChanged).toHaveBeenCalledWith(expect.objectContaining({ id: 1 }), true);
    updateDanger(s);
    expect(sink.onDangerChanged).toHaveBeenCalledTimes(1);
  });

  it('コレクターが大きくなれば解除される', () => {
    const { s, sink } = makeSession();
    const i = spawnAt(s, 200, 0, 50, 2);
    updateDanger(s);
    s.collector.diameter = 60;
    updateDanger(s);
    expect(orbAt(s.orbs, i).danger).toBe(false);
    expect(sink.onDangerChanged).toHaveBeenLastCalledWith(expect.objectContaining({ id: 1 }), false);
  });

  it('消費できるオーブや遠いオーブは対象外', () => {
    const { s, sink } = makeSession();
    spawnAt(s, 100, 0, 30, 1);
    spawnAt(s, 400, 0, 80, 2);
    updateDanger(s);
    expect(sink.onDangerChanged).not.toHaveBeenCalled();
  });
});
