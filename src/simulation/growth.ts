import type { SimConfig } from '../config.ts';
import { DEFAULT_CONFIG } from '../config.ts';

/** サイズ判定。クラスやレインボー状態に関係なく、コレクターより小さいものだけ消費できる */
export function canConsume(collectorDiameter: number, orbDiameter: number): boolean {
  return orbDiameter < collectorDiameter;
}

/**
 * 消費による成長。相対サイズが大きいほど伸び、コレクターが大きいほど伸び率は逓減する。
 * relativeSize < 1 はサイズ判定で保証されている
 */
export function grow(collectorDiameter: number, orbDiameter: number, cfg: Readonly<SimConfig> = DEFAULT_CONFIG): number {
  const relativeSize = orbDiameter / collectorDiameter;
  const baseGrowth = cfg.growthBase + relativeSize * cfg.growthRelativeCoeff;
  const sizePenalty = 1 / (1 + collectorDiameter / cfg.growthPenaltyScale);
  return collectorDiameter * (1 + baseGrowth * sizePenalty);
}

/** 誤クラス消費による縮小。大きいほど縮小が緩い（forgiveness は forgivenessCap で頭打ち） */
export function shrink(
  collectorDiameter: number,
  baseMultiplier: number = DEFAULT_CONFIG.shrinkMultiplier,
  cfg: Readonly<SimConfig> = DEFAULT_CONFIG,
): number {
  const forgivenessFactor = Math.min(collectorDiameter / cfg.forgivenessScale, cfg.forgivenessCap);
  const adjustedMultiplier = baseMultiplier + cfg.forgivenessWeight * forgivenessFactor;
  return Math.max(cfg.minDiameter, collectorDiameter * adjustedMultiplier);
}

/**
 * 時間経過による受動縮小。バックグラウンド復帰直後などの dt スパイクは
 * 1フレームでの大幅縮小を避けるため丸ごと捨てる
 */
export function passiveShrink(collectorDiameter: number, dt: number, cfg: Readonly<SimConfig> = DEFAULT_CONFIG): number {
  if (cfg.passiveShrinkRate <= 0) return collectorDiameter;
  if (!(dt > 0) || dt > cfg.maxPassiveShrinkDt) return collectorDiameter;
  return Math.max(cfg.minDiameter, collectorDiameter - cfg.passiveShrinkRate * dt);
}

export function sizeMultiplier(collectorDiameter: number, cfg: Readonly<SimConfig> = DEFAULT_CONFIG): number {
  return Math.max(1, Math.floor(collectorDiameter / cfg.scoreSizeStep));
}
