/**
 * Stream Hub - open event-stream connections and the broadcast fan-out
 *
 * The client map is the only mutable state shared between requests and is
 * touched under a single mutex. Writes never happen under that lock: each
 * client owns a promise chain, so its opening event lands before any
 * broadcast and a stalled client only delays itself.
 */

import { createSilentLogger, type JsonRpcNotification, type Logger, toErrorMessage } from '@plinth/core';
import { createMutex } from '@plinth/runtime';

export type StreamEvent = {
  event: string;
  data: string;
};

/**
 * Transport-side handle of one open stream
 */
export type StreamWriter = {
  send(event: StreamEvent): Promise<void>;
  /** Write an SSE comment line (keep-alive) */
  comment(text: string): Promise<void>;
  close(): Promise<void>;
};

type StreamClient = {
  id: string;
  writer: StreamWriter;
  queue: Promise<void>;
  closed: boolean;
  keepAliveTimer?: ReturnType<typeof setInterval>;
  onClose?: () => void;
};

export type StreamHubOptions = {
  logger?: Logger;
  /** Keep-alive comment interval; 0 or undefined disables */
  keepAliveMs?: number;
};

export type ConnectOptions = {
  /** Called once the client leaves the hub, for any reason */
  onClose?: () => void;
};

export class StreamHub {
  private readonly clients = new Map<string, StreamClient>();
  private readonly mutex = createMutex();
  private readonly logger: Logger;
  private keepAliveMs: number;
  private sequence = 0;

  constructor(options: StreamHubOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.keepAliveMs = options.keepAliveMs ?? 0;
  }

  /** Applies to clients that connect afterwards */
  setKeepAlive(ms: number): void {
    this.keepAliveMs = ms;
  }

  /**
   * Add a client and queue its opening event
   * @returns the client id
   */
  async connect(writer: StreamWriter, opening: StreamEvent, options: ConnectOptions = {}): Promise<string> {
    const client: StreamClient = {
      id: `stream-${++this.sequence}`,
      writer,
      queue: Promise.resolve(),
      closed: false,
      onClose: options.onClose
    };

    await this.mutex.runExclusive(() => {
      this.clients.set(client.id, client);
      // Queued under the lock so no broadcast can slip in ahead of it
      this.enqueue(client, () => writer.send(opening));
    });

    if (this.keepAliveMs > 0) {
      client.keepAliveTimer = setInterval(() => {
        this.enqueue(client, () => writer.comment('keepalive'));
      }, this.keepAliveMs);
    }

    this.logger.debug({ clientId: client.id, event: opening.event }, '[StreamHub] Client connected');
    return client.id;
  }

  /**
   * Remove a client (peer went away). Pending writes are skipped.
   */
  async disconnect(clientId: string): Promise<boolean> {
    const client = await this.mutex.runExclusive(() => this.detach(clientId));
    if (!client) {
      return false;
    }
    this.logger.debug({ clientId }, '[StreamHub] Client disconnected');
    return true;
  }

  /**
   * Queue `data` for every open client. Resolves once queued; delivery
   * failures evict the client and never reach the caller.
   */
  async broadcast(data: string, event = 'message'): Promise<void> {
    try {
      await this.mutex.runExclusive(() => {
        for (const client of this.clients.values()) {
          this.enqueue(client, () => client.writer.send({ event, data }));
        }
      });
    } catch (error) {
      this.logger.error({ event, error: toErrorMessage(error) }, '[StreamHub] Broadcast failed');
    }
  }

  notify(notification: JsonRpcNotification): Promise<void> {
    return this.broadcast(JSON.stringify(notification));
  }

  countClients(): Promise<number> {
    return this.mutex.runExclusive(() => this.clients.size);
  }

  /**
   * Resolves when every write queued so far has settled
   */
  async whenIdle(): Promise<void> {
    const queues = await this.mutex.runExclusive(() =>
      Array.from(this.clients.values(), (client) => client.queue)
    );
    await Promise.all(queues);
  }

  /**
   * Flush and close every stream; used on shutdown
   */
  async closeAll(): Promise<void> {
    const clients = await this.mutex.runExclusive(() => {
      const all = Array.from(this.clients.values());
      this.clients.clear();
      return all;
    });

    await Promise.all(
      clients.map(async (client) => {
        if (client.keepAliveTimer) {
          clearInterval(client.keepAliveTimer);
        }
        await client.queue;
        this.stop(client);
        try {
          await client.writer.close();
        } catch (error) {
          this.logger.debug({ clientId: client.id, error: toErrorMessage(error) }, '[StreamHub] Close failed');
        }
      })
    );
    if (clients.length > 0) {
      this.logger.debug({ count: clients.length }, '[StreamHub] All clients closed');
    }
  }

  private enqueue(client: StreamClient, write: () => Promise<void>): void {
    client.queue = client.queue.then(async () => {
      if (client.closed) {
        return;
      }
      try {
        await write();
      } catch (error) {
        await this.evict(client, error);
      }
    });
  }

  private async evict(client: StreamClient, error: unknown): Promise<void> {
    const removed = await this.mutex.runExclusive(() => this.detach(client.id));
    if (removed) {
      this.logger.warn({ clientId: client.id, error: toErrorMessage(error) }, '[StreamHub] Write failed, client evicted');
    }
  }

  /** Must be called with the lock held */
  private detach(clientId: string): StreamClient | undefined {
    const client = this.clients.get(clientId);
    if (!client) {
      return undefined;
    }
    this.clients.delete(clientId);
    this.stop(client);
    return client;
  }

  private stop(client: StreamClient): void {
    if (client.closed) {
      return;
    }
    client.closed = true;
    if (client.keepAliveTimer) {
      clearInterval(client.keepAliveTimer);
    }
    client.onClose?.();
  }
}
