import type { SimConfig } from './config.ts';
import { createConfig } from './config.ts';
import { ORB_CLASS_COUNT } from './constants.ts';
import { devLog } from './dev-log.ts';
import type { EventSink } from './events.ts';
import { createEventSink } from './events.ts';
import type { OrbPool, PickupPool } from './pools.ts';
import { createOrbPool, createPickupPool } from './pools.ts';
import type { Collector, GameOverReason, MergeLedger, OrbClassId, PowerUpEffect } from './types.ts';

export interface SessionStats {
  /** クラス別の消費数（インデックス = OrbClassId） */
  readonly consumedByClass: number[];
  correct: number;
  wrong: number;
  forgiven: number;
  merges: number;
  deflections: number;
  playTime: number;
}

/**
 * 1ゲーム分のシミュレーション状態。simulation/ の各関数はこれを引数で受け取り、
 * モジュールレベルの状態は持たない。リスタートは新しいセッションを作ること。
 */
export interface Session {
  readonly config: Readonly<SimConfig>;
  readonly sink: EventSink;
  readonly collector: Collector;
  readonly orbs: OrbPool;
  readonly pickups: PickupPool;
  readonly ledger: MergeLedger;
  readonly powerUp: PowerUpEffect;
  readonly stats: SessionStats;
  score: number;
  /** 直近の正しい消費時刻（猶予期間の判定用） */
  lastConsumeAt: number;
  terminal: GameOverReason | null;
  pausedAt: number | null;
  /** 再開直後の1フレーム。停止中の経過を含む rawDt を基準ステップに切り詰める */
  resumePending: boolean;
  nextId: number;
}

export interface SessionOptions {
  config?: Partial<SimConfig>;
  sink?: EventSink;
  targetClass?: OrbClassId;
  x?: number;
  y?: number;
  orbCapacity?: number;
  pickupCapacity?: number;
}

export function createSession(opts: SessionOptions = {}): Session {
  const config = createConfig(opts.config);
  const x = opts.x ?? 0;
  const y = opts.y ?? 0;
  return {
    config,
    sink: opts.sink ?? createEventSink(),
    collector: {
      x,
      y,
      targetX: x,
      targetY: y,
      diameter: config.initialDiameter,
      targetClass: opts.targetClass ?? 0,
    },
    orbs: createOrbPool(opts.orbCapacity),
    pickups: createPickupPool(opts.pickupCapacity),
    ledger: { activeMergedCount: 0, lastMergeTimestamp: Number.NEGATIVE_INFINITY },
    powerUp: { kind: 'none', expiresAt: 0 },
    stats: {
      consumedByClass: new Array<number>(ORB_CLASS_COUNT).fill(0),
      correct: 0,
      wrong: 0,
      forgiven: 0,
      merges: 0,
      deflections: 0,
      playTime: 0,
    },
    score: 0,
    lastConsumeAt: Number.NEGATIVE_INFINITY,
    terminal: null,
    pausedAt: null,
    resumePending: false,
    nextId: 1,
  };
}

export function isTerminal(s: Session): boolean {
  return s.terminal !== null;
}

/** 終端遷移。一度だけ onGameOver を通知し、以降の接触・成長・合体はすべて止まる */
export function endSession(s: Session, reason: GameOverReason) {
  if (s.terminal !== null) return;
  s.terminal = reason;
  devLog(`game over: ${reason} (diameter=${s.collector.diameter.toFixed(1)}, score=${s.score})`);
  s.sink.onGameOver(reason);
}

/** スコアは 0 未満にならない。実際に変化した量を通知する */
export function addScore(s: Session, delta: number) {
  const next = Math.max(0, s.score + delta);
  const applied = next - s.score;
  s.score = next;
  if (applied !== 0) s.sink.onScoreChanged(next, applied);
}

export function allocId(s: Session): number {
  return s.nextId++;
}
