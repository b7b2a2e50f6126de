import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ChannelClosedError } from '../utils/errors.js';
import { WebSocketChannel } from './WebSocketChannel.js';

class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  readonly sent: Array<{ data: string | Buffer; binary: boolean }> = [];
  readonly closeCalls: Array<[number | undefined, string | undefined]> = [];
  sendError: Error | null = null;

  send(data: string | Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void {
    if (this.sendError) {
      cb(this.sendError);
      return;
    }
    this.sent.push({ data, binary: options.binary });
    cb();
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push([code, reason]);
    this.peerClosed();
  }

  peerClosed(): void {
    this.readyState = WebSocket.CLOSED;
    this.emit('close');
  }
}

describe('WebSocketChannel', () => {
  let socket: FakeSocket;
  let channel: WebSocketChannel;

  beforeEach(() => {
    socket = new FakeSocket();
    channel = new WebSocketChannel(socket);
  });

  describe('receive', () => {
    it('returns frames that arrived earlier, in order', async () => {
      socket.emit('message', Buffer.from('{"type":"input"}'), false);
      socket.emit('message', Buffer.from([1, 2]), true);

      await expect(channel.receive()).resolves.toBe('{"type":"input"}');
      await expect(channel.receive()).resolves.toEqual(Buffer.from([1, 2]));
    });

    it('waits for the next frame', async () => {
      const next = channel.receive();

      socket.emit('message', Buffer.from('later'), false);

      await expect(next).resolves.toBe('later');
    });

    it('joins fragmented frames', async () => {
      socket.emit('message', [Buffer.from('par'), Buffer.from('ts')], false);

      await expect(channel.receive()).resolves.toBe('parts');
    });

    it('resolves null once the peer has gone', async () => {
      const pending = channel.receive();

      socket.peerClosed();

      await expect(pending).resolves.toBeNull();
      await expect(channel.receive()).resolves.toBeNull();
      expect(channel.isOpen).toBe(false);
    });
  });

  describe('send', () => {
    it('sends text as text and buffers as binary', async () => {
      await channel.send('{"type":"connected"}');
      await channel.send(Buffer.from('out'));

      expect(socket.sent).toEqual([
        { data: '{"type":"connected"}', binary: false },
        { data: Buffer.from('out'), binary: true },
      ]);
    });

    it('rejects when the socket reports a failure', async () => {
      socket.sendError = new Error('write EPIPE');

      await expect(channel.send('x')).rejects.toThrow(new ChannelClosedError('Client send failed: write EPIPE'));
    });

    it('rejects once the socket is closed', async () => {
      socket.peerClosed();

      await expect(channel.send('x')).rejects.toBeInstanceOf(ChannelClosedError);
      expect(socket.sent).toEqual([]);
    });
  });

  describe('close', () => {
    it('closes the socket once with the given code and reason', () => {
      channel.close(1011, 'start-failed');
      channel.close();

      expect(socket.closeCalls).toEqual([[1011, 'start-failed']]);
      expect(channel.isOpen).toBe(false);
    });

    it('notifies close listeners once', () => {
      const listener = vi.fn();
      channel.onClose(listener);

      socket.peerClosed();
      socket.emit('error', new Error('reset'));

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('calls late listeners straight away', () => {
      socket.peerClosed();
      const listener = vi.fn();

      channel.onClose(listener);

      expect(listener).toHaveBeenCalledTimes(1);
    });
  });
});
