import { MAX_STEPS_PER_FRAME, REF_FPS } from '../constants.ts';
import { devLog } from '../dev-log.ts';
import { orbAt } from '../pools.ts';
import type { Session } from '../session.ts';
import { endSession } from '../session.ts';
import type { Contact } from './collision.ts';
import { resolveContacts } from './collision.ts';
import { detectContacts } from './contacts.ts';
import { updateDanger } from './danger.ts';
import { applyGravity } from './gravity.ts';
import { passiveShrink } from './growth.ts';
import { integrate } from './integrate.ts';
import { updateOrbitals } from './orbital.ts';
import { updatePowerUp } from './power-up.ts';
import { pruneOutOfRange } from './prune.ts';
import { followTarget } from './spawn.ts';

const _contacts: Contact[] = [];

function applyPassiveShrink(s: Session, dt: number) {
  const c = s.collector;
  const before = c.diameter;
  c.diameter = passiveShrink(before, dt, s.config);
  if (c.diameter === before) return;
  if (c.diameter <= s.config.minDiameter) endSession(s, 'collapsed');
}

function stepOnce(s: Session, dt: number, now: number, shrinkAllowed: boolean) {
  followTarget(s);
  updatePowerUp(s, now);
  updateOrbitals(s, now);
  applyGravity(s);
  integrate(s, dt);
  if (shrinkAllowed) applyPassiveShrink(s, dt);
  if (s.terminal !== null) return;
  detectContacts(s, _contacts);
  resolveContacts(s, _contacts, now);
  _contacts.length = 0;
  if (s.terminal !== null) return;
  pruneOutOfRange(s);
  updateDanger(s);
  s.stats.playTime += dt;
}

/**
 * 1フレーム分進める。rawDt は MAX_STEPS_PER_FRAME / REF_FPS で頭打ちにし、
 * 基準ステップ（1/REF_FPS）を超える分は等分したサブステップに分割する。
 * 各サブステップには経過に合わせた時刻を渡す。一時停止中・終了後は何もしない
 */
export function update(s: Session, rawDt: number, now: number) {
  if (s.pausedAt !== null || s.terminal !== null) return;
  if (!(rawDt > 0)) return;
  const maxStep = 1 / REF_FPS;
  // 受動縮小のスパイク判定はサブステップではなくフレーム全体の dt で行う
  const shrinkAllowed = rawDt <= s.config.maxPassiveShrinkDt;
  let frameDt = Math.min(rawDt, MAX_STEPS_PER_FRAME * maxStep);
  if (s.resumePending) {
    s.resumePending = false;
    frameDt = Math.min(frameDt, maxStep);
  }
  if (frameDt <= maxStep) {
    stepOnce(s, frameDt, now, shrinkAllowed);
    return;
  }
  const steps = Math.min(Math.ceil(frameDt / maxStep), MAX_STEPS_PER_FRAME);
  const dt = frameDt / steps;
  const start = now - frameDt;
  for (let k = 0; k < steps; k++) {
    stepOnce(s, dt, start + dt * (k + 1), shrinkAllowed);
    if (s.terminal !== null) return;
  }
}

export function pause(s: Session, now: number) {
  if (s.pausedAt !== null || s.terminal !== null) return;
  s.pausedAt = now;
  devLog(`paused at t=${now.toFixed(2)}`);
}

/** 停止していた時間だけ保持中の時刻をすべて後ろへずらし、停止中の経過がタイマーに届かないようにする */
export function resume(s: Session, now: number) {
  const pausedAt = s.pausedAt;
  if (pausedAt === null) return;
  s.pausedAt = null;
  s.resumePending = true;
  const shift = now - pausedAt;
  if (!(shift > 0)) return;
  if (s.powerUp.kind !== 'none') s.powerUp.expiresAt += shift;
  s.ledger.lastMergeTimestamp += shift;
  s.lastConsumeAt += shift;
  const pool = s.orbs;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (o.orbital) o.orbitalUntil += shift;
  }
  devLog(`resumed after ${shift.toFixed(2)}s`);
}
