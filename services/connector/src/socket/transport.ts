import WebSocket from 'ws';

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: Buffer, isBinary: boolean): void;
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
  /** Upgrade refused with an HTTP status (401/403 mean the token was rejected). */
  onRejected(statusCode: number): void;
}

export interface Transport {
  send(data: string): void;
  close(): void;
  terminate(): void;
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => Transport;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export const wsTransport: TransportFactory = (url, h) => {
  const ws = new WebSocket(url, { handshakeTimeout: 10_000 });

  ws.on('open', () => h.onOpen());
  ws.on('message', (data, isBinary) => h.onMessage(toBuffer(data), isBinary));
  ws.on('close', (code, reason) => h.onClose(code, reason.toString()));
  ws.on('error', (err) => h.onError(err));
  ws.on('unexpected-response', (req, res) => {
    h.onRejected(res.statusCode ?? 0);
    req.destroy();
  });

  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    terminate: () => ws.terminate(),
  };
};
