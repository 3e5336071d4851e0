import { describe, expect, it, vi } from 'vitest';
import { createEventHub, createEventSink } from './events.ts';

describe('createEventSink', () => {
  it('渡さなかったハンドラは no-op', () => {
    const onGameOver = vi.fn();
    const sink = createEventSink({ onGameOver });
    sink.onPowerUpActivated('rainbow');
    sink.onGameOver('collapsed');
    expect(onGameOver).toHaveBeenCalledWith('collapsed');
  });
});

describe('createEventHub', () => {
  it('全購読者にファンアウトし、unsubscribe で外れる', () => {
    const hub = createEventHub();
    const a = vi.fn();
    const b = vi.fn();
    const unsubA = hub.subscribe({ onTargetClassChanged: a });
    hub.subscribe({ onTargetClassChanged: b });
    expect(hub.size).toBe(2);

    hub.sink.onTargetClassChanged(2);
    unsubA();
    hub.sink.onTargetClassChanged(3);
    expect(a.mock.calls).toEqual([[2]]);
    expect(b.mock.calls).toEqual([[2], [3]]);
    expect(hub.size).toBe(1);
  });

  it('通知中の購読解除でも残りの購読者に届く', () => {
    const hub = createEventHub();
    const later = vi.fn();
    const unsubs: (() => void)[] = [];
    unsubs.push(
      hub.subscribe({
        onGameOver: () => {
          for (const fn of unsubs) fn();
        },
      }),
    );
    unsubs.push(hub.subscribe({ onGameOver: later }));
    hub.sink.onGameOver('destabilized');
    expect(later).toHaveBeenCalledTimes(1);
    expect(hub.size).toBe(0);
  });

  it('unsubscribe は2回呼んでも安全', () => {
    const hub = createEventHub();
    const unsub = hub.subscribe({});
    unsub();
    unsub();
    expect(hub.size).toBe(0);
  });
});
