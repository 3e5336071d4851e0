import { devLog } from '../dev-log.ts';
import type { Session } from '../session.ts';
import type { PowerUpKind } from '../types.ts';

// 状態遷移: none → rainbow | freeze（取得時）、有効中に再取得で種類・タイマーとも置き換え、
// 期限到達で none に戻る。タイマーは持たず、毎 tick expiresAt と now を比較する。

export function powerUpDuration(s: Session, kind: PowerUpKind): number {
  switch (kind) {
    case 'rainbow':
      return s.config.rainbowDuration;
    case 'freeze':
      return s.config.freezeDuration;
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

export function isRainbow(s: Session): boolean {
  return s.powerUp.kind === 'rainbow';
}

/** Freeze 中はオーブへの力の適用と速度積分が止まる（速度自体は保持される） */
export function isFrozen(s: Session): boolean {
  return s.powerUp.kind === 'freeze';
}

export function remainingTime(s: Session, now: number): number {
  if (s.powerUp.kind === 'none') return 0;
  return Math.max(0, s.powerUp.expiresAt - now);
}

export function activatePowerUp(s: Session, kind: PowerUpKind, now: number) {
  const prev = s.powerUp.kind;
  // 別種への置き換えは旧効果の終了として通知する（音声ループの停止など）
  if (prev !== 'none' && prev !== kind) s.sink.onPowerUpExpired(prev);
  s.powerUp.kind = kind;
  s.powerUp.expiresAt = now + powerUpDuration(s, kind);
  devLog(`power-up ${kind} active until t=${s.powerUp.expiresAt.toFixed(2)}`);
  s.sink.onPowerUpActivated(kind);
}

export function updatePowerUp(s: Session, now: number) {
  const kind = s.powerUp.kind;
  if (kind === 'none' || now < s.powerUp.expiresAt) return;
  s.powerUp.kind = 'none';
  s.powerUp.expiresAt = 0;
  s.sink.onPowerUpExpired(kind);
}
