import type { Logger } from '@plinth/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type StreamEvent, StreamHub, type StreamWriter } from './stream-hub.js';

type RecordingWriter = StreamWriter & {
  events: StreamEvent[];
  comments: string[];
  closed: boolean;
};

const createWriter = (send?: (event: StreamEvent) => Promise<void>): RecordingWriter => {
  const writer: RecordingWriter = {
    events: [],
    comments: [],
    closed: false,
    send: async (event) => {
      if (send) {
        await send(event);
      }
      writer.events.push(event);
    },
    comment: async (text) => {
      writer.comments.push(text);
    },
    close: async () => {
      writer.closed = true;
    }
  };
  return writer;
};

const createMockLogger = (): Logger => ({
  level: 'debug',
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn()
});

describe('StreamHub', () => {
  let logger: Logger;
  let hub: StreamHub;

  beforeEach(() => {
    logger = createMockLogger();
    hub = new StreamHub({ logger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should send the opening event before broadcasts', async () => {
    const writer = createWriter();
    const connecting = hub.connect(writer, { event: 'open', data: '{}' });
    void hub.broadcast('{"n":1}');
    await connecting;
    await hub.whenIdle();

    expect(writer.events).toEqual([
      { event: 'open', data: '{}' },
      { event: 'message', data: '{"n":1}' }
    ]);
  });

  it('should deliver identical messages to every client', async () => {
    const first = createWriter();
    const second = createWriter();
    await hub.connect(first, { event: 'open', data: '{}' });
    await hub.connect(second, { event: 'endpoint', data: '/mcp' });

    await hub.broadcast('{"jsonrpc":"2.0","id":1,"result":{}}');
    await hub.whenIdle();

    expect(first.events[1]).toEqual({ event: 'message', data: '{"jsonrpc":"2.0","id":1,"result":{}}' });
    expect(second.events[1]).toEqual(first.events[1]);
    expect(await hub.countClients()).toBe(2);
  });

  it('should keep per-client order', async () => {
    const writer = createWriter();
    await hub.connect(writer, { event: 'open', data: '{}' });

    await Promise.all([hub.broadcast('1'), hub.broadcast('2'), hub.broadcast('3')]);
    await hub.whenIdle();

    expect(writer.events.map((e) => e.data)).toEqual(['{}', '1', '2', '3']);
  });

  it('should evict a client whose write fails without failing the broadcast', async () => {
    const healthy = createWriter();
    const broken = createWriter(async (event) => {
      if (event.event === 'message') {
        throw new Error('socket closed');
      }
    });
    const onClose = vi.fn();
    await hub.connect(healthy, { event: 'open', data: '{}' });
    await hub.connect(broken, { event: 'open', data: '{}' }, { onClose });

    await expect(hub.broadcast('{"a":1}')).resolves.toBeUndefined();
    await hub.whenIdle();
    await hub.whenIdle();

    expect(await hub.countClients()).toBe(1);
    expect(healthy.events).toHaveLength(2);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should not block the broadcaster on a slow client', async () => {
    let unblock: () => void = () => {};
    const slow = createWriter(
      (event) =>
        new Promise<void>((resolve) => {
          if (event.event === 'message') {
            unblock = resolve;
          } else {
            resolve();
          }
        })
    );
    const fast = createWriter();
    await hub.connect(slow, { event: 'open', data: '{}' });
    await hub.connect(fast, { event: 'open', data: '{}' });
    await hub.whenIdle();

    await hub.broadcast('x');
    await vi.waitFor(() => expect(fast.events).toHaveLength(2));
    expect(slow.events).toHaveLength(1);

    unblock();
    await hub.whenIdle();
    expect(slow.events).toHaveLength(2);
  });

  it('should stop writing to disconnected clients', async () => {
    const writer = createWriter();
    const id = await hub.connect(writer, { event: 'open', data: '{}' });

    expect(await hub.disconnect(id)).toBe(true);
    expect(await hub.disconnect(id)).toBe(false);
    await hub.broadcast('late');
    await hub.whenIdle();

    expect(writer.events).toEqual([{ event: 'open', data: '{}' }]);
  });

  it('should serialise notifications as message events', async () => {
    const writer = createWriter();
    await hub.connect(writer, { event: 'open', data: '{}' });

    await hub.notify({ jsonrpc: '2.0', method: 'notifications/progress', params: { progress: 1 } });
    await hub.whenIdle();

    expect(writer.events[1]).toEqual({
      event: 'message',
      data: '{"jsonrpc":"2.0","method":"notifications/progress","params":{"progress":1}}'
    });
  });

  it('should send keep-alive comments on the interval', async () => {
    vi.useFakeTimers();
    const keepAliveHub = new StreamHub({ logger, keepAliveMs: 1000 });
    const writer = createWriter();
    await keepAliveHub.connect(writer, { event: 'open', data: '{}' });

    await vi.advanceTimersByTimeAsync(2500);
    await keepAliveHub.whenIdle();

    expect(writer.comments).toEqual(['keepalive', 'keepalive']);
    await keepAliveHub.closeAll();
  });

  it('should apply a keep-alive interval set after construction', async () => {
    vi.useFakeTimers();
    hub.setKeepAlive(500);
    const writer = createWriter();
    await hub.connect(writer, { event: 'open', data: '{}' });

    await vi.advanceTimersByTimeAsync(1200);
    await hub.whenIdle();

    expect(writer.comments).toEqual(['keepalive', 'keepalive']);
    await hub.closeAll();
  });

  it('should flush and close every stream', async () => {
    const writer = createWriter();
    const onClose = vi.fn();
    await hub.connect(writer, { event: 'open', data: '{}' }, { onClose });
    void hub.broadcast('last');

    await hub.closeAll();

    expect(writer.events.map((e) => e.data)).toEqual(['{}', 'last']);
    expect(writer.closed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(await hub.countClients()).toBe(0);
  });
});
