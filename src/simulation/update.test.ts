import { describe, expect, it } from 'vitest';
import { makeSession, spawnAt } from '../__test__/session-helper.ts';
import { orbAt } from '../pools.ts';
import { activatePowerUp } from './power-up.ts';
import { deflect } from './orbital.ts';
import { setCollectorTarget } from './spawn.ts';
import { pause, resume, update } from './update.ts';

describe('update', () => {
  it('1 tick で追従・接触・解決・解放まで進む', () => {
    const { s, sink } = makeSession({ targetClass: 0 });
    const i = spawnAt(s, 100, 0, 20, 0);
    setCollectorTarget(s, 100, 0);
    update(s, 1 / 60, 1);
    expect(s.collector.x).toBe(100);
    expect(sink.onOrbConsumed).toHaveBeenCalledWith(expect.objectContaining({ id: 1 }), true);
    expect(orbAt(s.orbs, i).alive).toBe(false);
    expect(s.orbs.count).toBe(0);
    expect(s.score).toBe(50);
  });

  it('基準ステップを超える dt はサブステップに分割され、合計時間は変わらない', () => {
    const { s } = makeSession();
    update(s, 0.2, 1);
    expect(s.stats.playTime).toBeCloseTo(0.2, 10);
  });

  it('1フレームの dt は MAX_STEPS_PER_FRAME / REF_FPS で頭打ち', () => {
    const { s } = makeSession();
    update(s, 1, 1);
    expect(s.stats.playTime).toBeCloseTo(8 / 30, 10);
  });

  it('dt スパイクのフレームでは受動縮小をサブステップごと捨てる', () => {
    const { s } = makeSession({ config: { passiveShrinkRate: 1 } });
    update(s, 2, 2);
    expect(s.collector.diameter).toBe(40);
    update(s, 0.1, 2.1);
    expect(s.collector.diameter).toBeCloseTo(39.9, 10);
  });

  it('接触で終了した tick では範囲外除去と警告を通知しない', () => {
    const { s, sink } = makeSession();
    spawnAt(s, 10, 0, 50, 2);
    spawnAt(s, 1500, 0, 20, 0);
    spawnAt(s, 200, 0, 60, 2);
    update(s, 1 / 60, 1);
    expect(s.terminal).toBe('destabilized');
    expect(sink.onOrbRemoved).toHaveBeenCalledTimes(1);
    expect(sink.onOrbRemoved).toHaveBeenCalledWith(expect.objectContaining({ id: 1 }), 'consumed');
    expect(sink.onDangerChanged).not.toHaveBeenCalled();
  });

  it('重力でオーブがコレクターへ近づく', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 200, 0, 20, 1);
    update(s, 1 / 60, 1);
    const o = orbAt(s.orbs, i);
    expect(o.vx).toBeLessThan(0);
    expect(o.x).toBeLessThan(200);
  });

  it('Freeze 中はオーブが動かない', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 200, 0, 20, 1, 30, 0);
    activatePowerUp(s, 'freeze', 0);
    update(s, 1 / 60, 1);
    const o = orbAt(s.orbs, i);
    expect(o.x).toBe(200);
    expect(o.vx).toBe(30);
  });

  it('受動縮小で minDiameter に達すると collapsed で終了する', () => {
    const { s, sink } = makeSession({ config: { passiveShrinkRate: 1000 } });
    update(s, 1 / 60, 1);
    expect(s.collector.diameter).toBe(30);
    expect(s.terminal).toBe('collapsed');
    expect(sink.onGameOver).toHaveBeenCalledWith('collapsed');
    update(s, 1 / 60, 2);
    expect(sink.onGameOver).toHaveBeenCalledTimes(1);
  });

  it('終了後は何も進まない', () => {
    const { s } = makeSession();
    s.terminal = 'too-small';
    update(s, 1 / 60, 1);
    expect(s.stats.playTime).toBe(0);
  });
});

describe('pause / resume', () => {
  it('一時停止中の update は何もしない', () => {
    const { s, sink } = makeSession();
    activatePowerUp(s, 'rainbow', 0);
    pause(s, 1);
    update(s, 1 / 60, 100);
    expect(s.stats.playTime).toBe(0);
    expect(s.powerUp.kind).toBe('rainbow');
    expect(sink.onPowerUpExpired).not.toHaveBeenCalled();
  });

  it('再開時に保持中の時刻を停止時間だけずらす', () => {
    const { s } = makeSession();
    const large = spawnAt(s, 500, 0, 60, 1);
    const small = spawnAt(s, 545, 0, 40, 1);
    deflect(s, large, small, 1);
    activatePowerUp(s, 'rainbow', 0);
    s.lastConsumeAt = 1.5;
    s.ledger.lastMergeTimestamp = 1;
    pause(s, 2);
    resume(s, 12);
    expect(s.pausedAt).toBeNull();
    expect(s.powerUp.expiresAt).toBe(15);
    expect(s.lastConsumeAt).toBe(11.5);
    expect(s.ledger.lastMergeTimestamp).toBe(11);
    expect(orbAt(s.orbs, small).orbitalUntil).toBeCloseTo(11.4, 10);
  });

  it('再開直後のフレームは停止中の経過を物理に持ち込まない', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 0, 600, 20, 1, 0, 50);
    pause(s, 1);
    resume(s, 301);
    update(s, 300, 301);
    const dt = 1 / 30;
    expect(orbAt(s.orbs, i).y).toBeCloseTo(600 + (50 / (1 + 0.3 * dt)) * dt, 10);
    expect(s.stats.playTime).toBeCloseTo(dt, 10);
    expect(s.resumePending).toBe(false);

    update(s, 0.2, 301.2);
    expect(s.stats.playTime).toBeCloseTo(dt + 0.2, 10);
  });

  it('停止していなければ resume は何もしない', () => {
    const { s } = makeSession();
    activatePowerUp(s, 'freeze', 0);
    resume(s, 50);
    expect(s.powerUp.expiresAt).toBe(6);
  });

  it('未合体の lastMergeTimestamp は -Infinity のまま', () => {
    const { s } = makeSession();
    pause(s, 0);
    resume(s, 5);
    expect(s.ledger.lastMergeTimestamp).toBe(Number.NEGATIVE_INFINITY);
  });
});
