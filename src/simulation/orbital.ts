import { orbMass } from '../orb-classes.ts';
import { orbAt, snapshotOrb } from '../pools.ts';
import type { Session } from '../session.ts';
import type { Orb, OrbIndex } from '../types.ts';
import { NO_ORB } from '../types.ts';

// 合体を見送った衝突は、小さい方を大きい方の周りに短時間だけ回してから外へ弾き出す。
// 軌道中はコレクター重力とパートナーとの接触判定から外れる。

/** 2体間の軸。距離 0 のときは x 軸を使い、距離は両半径の和で代用する */
function pairAxis(small: Orb, large: Orb, out: { nx: number; ny: number; d: number }) {
  const dx = small.x - large.x,
    dy = small.y - large.y;
  const d = Math.sqrt(dx * dx + dy * dy);
  if (d === 0) {
    out.nx = 1;
    out.ny = 0;
    out.d = (small.diameter + large.diameter) / 2;
    return;
  }
  out.nx = dx / d;
  out.ny = dy / d;
  out.d = d;
}

const _axis = { nx: 0, ny: 0, d: 0 };

/** 同径のときは2つ目（ib）を小さい方とみなす */
export function smallerOf(s: Session, ia: OrbIndex, ib: OrbIndex): { small: OrbIndex; large: OrbIndex } {
  const a = orbAt(s.orbs, ia);
  const b = orbAt(s.orbs, ib);
  return a.diameter < b.diameter ? { small: ia, large: ib } : { small: ib, large: ia };
}

export function orbitalSpeed(s: Session, largerMass: number, d: number): number {
  return Math.sqrt((s.config.gravitationalConstant * largerMass) / d) * s.config.orbitalSpeedMultiplier;
}

export function escapeSpeed(s: Session, largerMass: number, d: number): number {
  return Math.sqrt((2 * s.config.gravitationalConstant * largerMass) / d) * s.config.escapeSpeedMultiplier;
}

/**
 * 小さい方のオーブを軌道状態にする。既に軌道中なら何もせず false。
 * 接線の向きは大きい方に対する現在の相対速度に合わせる
 */
export function deflect(s: Session, ia: OrbIndex, ib: OrbIndex, now: number): boolean {
  const { small, large } = smallerOf(s, ia, ib);
  const sm = orbAt(s.orbs, small);
  const lg = orbAt(s.orbs, large);
  if (sm.orbital) return false;

  pairAxis(sm, lg, _axis);
  const tx = -_axis.ny,
    ty = _axis.nx;
  const rvx = sm.vx - lg.vx,
    rvy = sm.vy - lg.vy;
  const sign = rvx * tx + rvy * ty < 0 ? -1 : 1;
  const speed = orbitalSpeed(s, orbMass(lg.diameter, lg.cls), _axis.d);
  const inherit = s.config.orbitalVelocityInheritance;
  sm.vx = tx * sign * speed + lg.vx * inherit;
  sm.vy = ty * sign * speed + lg.vy * inherit;
  sm.orbital = true;
  sm.orbitPartner = large;
  sm.orbitalUntil = now + s.config.orbitalDuration;
  s.stats.deflections++;
  s.sink.onOrbitalStarted(snapshotOrb(small, sm), snapshotOrb(large, lg));
  return true;
}

/** 期限切れの軌道を解除し、パートナーが残っていれば外向きに脱出速度を加える */
export function endOrbital(s: Session, i: OrbIndex) {
  const o = orbAt(s.orbs, i);
  if (!o.orbital) return;
  const pi = o.orbitPartner;
  if (pi !== NO_ORB) {
    const p = orbAt(s.orbs, pi);
    if (p.alive && !p.processed) {
      pairAxis(o, p, _axis);
      const v = escapeSpeed(s, orbMass(p.diameter, p.cls), _axis.d);
      o.vx += _axis.nx * v;
      o.vy += _axis.ny * v;
    }
  }
  o.orbital = false;
  o.orbitPartner = NO_ORB;
  o.orbitalUntil = 0;
  s.sink.onOrbitalEnded(snapshotOrb(i, o));
}

export function updateOrbitals(s: Session, now: number) {
  const pool = s.orbs;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (o.processed || !o.orbital) continue;
    if (now >= o.orbitalUntil) endOrbital(s, i as OrbIndex);
  }
}
