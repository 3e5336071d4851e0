import { vi } from 'vitest';
import type { EventSink } from '../events.ts';
import type { Session, SessionOptions } from '../session.ts';
import { createSession } from '../session.ts';
import { spawnOrb, spawnPickup } from '../simulation/spawn.ts';
import type { OrbClassId, OrbIndex, PickupIndex, PowerUpKind } from '../types.ts';
import { NO_ORB, NO_PICKUP } from '../types.ts';

export function createMockSink() {
  return {
    onOrbConsumed: vi.fn<EventSink['onOrbConsumed']>(),
    onMergeSucceeded: vi.fn<EventSink['onMergeSucceeded']>(),
    onGameOver: vi.fn<EventSink['onGameOver']>(),
    onPowerUpActivated: vi.fn<EventSink['onPowerUpActivated']>(),
    onPowerUpExpired: vi.fn<EventSink['onPowerUpExpired']>(),
    onPowerUpCollected: vi.fn<EventSink['onPowerUpCollected']>(),
    onCollectorGrown: vi.fn<EventSink['onCollectorGrown']>(),
    onCollectorShrunk: vi.fn<EventSink['onCollectorShrunk']>(),
    onScoreChanged: vi.fn<EventSink['onScoreChanged']>(),
    onOrbitalStarted: vi.fn<EventSink['onOrbitalStarted']>(),
    onOrbitalEnded: vi.fn<EventSink['onOrbitalEnded']>(),
    onOrbRemoved: vi.fn<EventSink['onOrbRemoved']>(),
    onDangerChanged: vi.fn<EventSink['onDangerChanged']>(),
    onTargetClassChanged: vi.fn<EventSink['onTargetClassChanged']>(),
  } satisfies EventSink;
}

export type MockSink = ReturnType<typeof createMockSink>;

/** 全イベントを vi.fn で記録するセッション。受動縮小は既定で無効（個別テストで有効化する） */
export function makeSession(opts: SessionOptions = {}): { s: Session; sink: MockSink } {
  const sink = createMockSink();
  const s = createSession({ ...opts, config: { passiveShrinkRate: 0, ...opts.config }, sink });
  return { s, sink };
}

export function spawnAt(
  s: Session,
  x: number,
  y: number,
  diameter: number,
  cls: OrbClassId = 0,
  vx = 0,
  vy = 0,
): OrbIndex {
  const i = spawnOrb(s, { x, y, diameter, cls, vx, vy });
  if (i === NO_ORB) throw new Error('orb arena full');
  return i;
}

export function spawnPickupAt(s: Session, kind: PowerUpKind, x: number, y: number): PickupIndex {
  const i = spawnPickup(s, { kind, x, y });
  if (i === NO_PICKUP) throw new Error('pickup arena full');
  return i;
}
