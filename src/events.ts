import type { GameOverReason, OrbClassId, OrbRemovalCause, OrbSnapshot, PowerUpKind } from './types.ts';

/**
 * シミュレーションから外部（描画・音声・HUD・スコア保存）への通知口。
 * セッション生成時に注入する。コアはグローバルなマネージャーを一切参照しない。
 */
export interface EventSink {
  onOrbConsumed(orb: OrbSnapshot, correct: boolean): void;
  onMergeSucceeded(parentA: OrbSnapshot, parentB: OrbSnapshot, result: OrbSnapshot): void;
  onGameOver(reason: GameOverReason): void;
  onPowerUpActivated(kind: PowerUpKind): void;
  onPowerUpExpired(kind: PowerUpKind): void;
  onPowerUpCollected(kind: PowerUpKind): void;
  onCollectorGrown(before: number, after: number): void;
  onCollectorShrunk(before: number, after: number): void;
  onScoreChanged(score: number, delta: number): void;
  onOrbitalStarted(orb: OrbSnapshot, partner: OrbSnapshot): void;
  onOrbitalEnded(orb: OrbSnapshot): void;
  onOrbRemoved(orb: OrbSnapshot, cause: OrbRemovalCause): void;
  onDangerChanged(orb: OrbSnapshot, inDanger: boolean): void;
  onTargetClassChanged(cls: OrbClassId): void;
}

const noop = () => undefined;

/** 必要なハンドラだけ渡せば残りは no-op で埋める */
export function createEventSink(handlers: Partial<EventSink> = {}): EventSink {
  return {
    onOrbConsumed: handlers.onOrbConsumed ?? noop,
    onMergeSucceeded: handlers.onMergeSucceeded ?? noop,
    onGameOver: handlers.onGameOver ?? noop,
    onPowerUpActivated: handlers.onPowerUpActivated ?? noop,
    onPowerUpExpired: handlers.onPowerUpExpired ?? noop,
    onPowerUpCollected: handlers.onPowerUpCollected ?? noop,
    onCollectorGrown: handlers.onCollectorGrown ?? noop,
    onCollectorShrunk: handlers.onCollectorShrunk ?? noop,
    onScoreChanged: handlers.onScoreChanged ?? noop,
    onOrbitalStarted: handlers.onOrbitalStarted ?? noop,
    onOrbitalEnded: handlers.onOrbitalEnded ?? noop,
    onOrbRemoved: handlers.onOrbRemoved ?? noop,
    onDangerChanged: handlers.onDangerChanged ?? noop,
    onTargetClassChanged: handlers.onTargetClassChanged ?? noop,
  };
}

type Unsubscribe = () => void;

export interface EventHub {
  readonly sink: EventSink;
  /** 購読を登録し、登録解除用の unsubscribe 関数を返す。呼び出し元がライフサイクルを管理すること */
  subscribe(handlers: Partial<EventSink>): Unsubscribe;
  readonly size: number;
}

/** 複数の購読者（音声・HUD・統計など）へファンアウトする EventSink */
export function createEventHub(): EventHub {
  const subscribers: Partial<EventSink>[] = [];
  // 通知中の購読解除で走査がずれないようスナップショットを回す
  const each = (fn: (s: Partial<EventSink>) => void) => {
    const snap = subscribers.slice();
    for (const s of snap) fn(s);
  };
  const sink: EventSink = {
    onOrbConsumed: (orb, correct) => each((s) => s.onOrbConsumed?.(orb, correct)),
    onMergeSucceeded: (a, b, result) => each((s) => s.onMergeSucceeded?.(a, b, result)),
    onGameOver: (reason) => each((s) => s.onGameOver?.(reason)),
    onPowerUpActivated: (kind) => each((s) => s.onPowerUpActivated?.(kind)),
    onPowerUpExpired: (kind) => each((s) => s.onPowerUpExpired?.(kind)),
    onPowerUpCollected: (kind) => each((s) => s.onPowerUpCollected?.(kind)),
    onCollectorGrown: (before, after) => each((s) => s.onCollectorGrown?.(before, after)),
    onCollectorShrunk: (before, after) => each((s) => s.onCollectorShrunk?.(before, after)),
    onScoreChanged: (score, delta) => each((s) => s.onScoreChanged?.(score, delta)),
    onOrbitalStarted: (orb, partner) => each((s) => s.onOrbitalStarted?.(orb, partner)),
    onOrbitalEnded: (orb) => each((s) => s.onOrbitalEnded?.(orb)),
    onOrbRemoved: (orb, cause) => each((s) => s.onOrbRemoved?.(orb, cause)),
    onDangerChanged: (orb, inDanger) => each((s) => s.onDangerChanged?.(orb, inDanger)),
    onTargetClassChanged: (cls) => each((s) => s.onTargetClassChanged?.(cls)),
  };
  return {
    sink,
    subscribe(handlers) {
      subscribers.push(handlers);
      return () => {
        const idx = subscribers.indexOf(handlers);
        if (idx !== -1) subscribers.splice(idx, 1);
      };
    },
    get size() {
      return subscribers.length;
    },
  };
}
