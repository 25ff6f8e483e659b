import { describe, expect, it, vi } from 'vitest';
import { createEventEmitter } from './events.js';

type Events = {
  changed: { value: number };
  closed: undefined;
};

describe('createEventEmitter', () => {
  it('delivers payloads to every handler of an event', () => {
    const emitter = createEventEmitter<Events>();
    const first = vi.fn();
    const second = vi.fn();
    const other = vi.fn();
    emitter.on('changed', first);
    emitter.on('changed', second);
    emitter.on('closed', other);

    emitter.emit('changed', { value: 1 });

    expect(first).toHaveBeenCalledWith({ value: 1 });
    expect(second).toHaveBeenCalledWith({ value: 1 });
    expect(other).not.toHaveBeenCalled();
  });

  it('keeps notifying after a handler throws', () => {
    const emitter = createEventEmitter<Events>();
    const after = vi.fn();
    emitter.on('changed', () => {
      throw new Error('handler failed');
    });
    emitter.on('changed', after);

    expect(() => emitter.emit('changed', { value: 2 })).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('removes handlers', () => {
    const emitter = createEventEmitter<Events>();
    const handler = vi.fn();
    emitter.on('closed', handler);
    emitter.off('closed', handler);

    emitter.emit('closed', undefined);

    expect(handler).not.toHaveBeenCalled();
  });
});
