/**
 * hono SSE streams bound to the StreamHub
 */

import { type Logger, toErrorMessage } from '@plinth/core';
import type { Context } from 'hono';
import { type SSEStreamingApi, streamSSE } from 'hono/streaming';
import type { StreamEvent, StreamHub, StreamWriter } from '../stream-hub.js';

/**
 * Adapt a hono SSE stream to the hub's writer contract.
 * Writes to a closed stream fail so the hub evicts the client.
 */
export function createStreamWriter(stream: SSEStreamingApi): StreamWriter {
  const ensureOpen = (): void => {
    if (stream.closed || stream.aborted) {
      throw new Error('Stream closed');
    }
  };

  return {
    async send(event) {
      ensureOpen();
      await stream.writeSSE({ event: event.event, data: event.data });
    },
    async comment(text) {
      ensureOpen();
      await stream.write(`: ${text}\n\n`);
    },
    async close() {
      await stream.close();
    }
  };
}

/**
 * Open a stream that stays registered with the hub until the peer goes
 * away or the hub closes it
 */
export function openStream(c: Context, hub: StreamHub, opening: StreamEvent, logger: Logger): Response {
  return streamSSE(
    c,
    async (stream) => {
      let release: () => void = () => {};
      const closed = new Promise<void>((resolve) => {
        release = resolve;
      });

      const connected = hub.connect(createStreamWriter(stream), opening, { onClose: () => release() });
      stream.onAbort(() => {
        void connected.then((clientId) => hub.disconnect(clientId));
      });

      await connected;
      await closed;
    },
    async (error) => {
      logger.warn({ error: toErrorMessage(error) }, '[SSE] Stream failed');
    }
  );
}
