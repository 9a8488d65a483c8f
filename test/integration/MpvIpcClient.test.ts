/**
 * Integration tests for MpvIpcClient over a mocked UNIX socket
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('net', () => import('../mocks/net'));

import { MpvIpcClient } from '../../src/host/MpvIpcClient';
import { HostEvent, HostEventType } from '../../src/host/HostBus';
import { BridgeErrorCode } from '../../src/types/BridgeState';
import { MockSocket, createConnection, getCreatedSockets, resetMocks } from '../mocks/net';
import { mpvLine } from '../helpers/protocol';

const SOCKET_PATH = '/tmp/mpv-test.sock';

function lastSocket(): MockSocket {
  const sockets = getCreatedSockets();
  const socket = sockets[sockets.length - 1];
  if (!socket) {
    throw new Error('no socket was created');
  }
  return socket;
}

function writtenMessages(socket: MockSocket): unknown[] {
  return socket.write.mock.calls.map(([data]) => JSON.parse(String(data)));
}

async function connectClient(): Promise<{ client: MpvIpcClient; socket: MockSocket }> {
  const client = new MpvIpcClient(SOCKET_PATH);
  const connecting = client.connect();
  const socket = lastSocket();
  socket.simulateConnect();
  await connecting;
  return { client, socket };
}

describe('MpvIpcClient', () => {
  beforeEach(() => {
    resetMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('connect', () => {
    it('should connect to the configured socket', async () => {
      const { client } = await connectClient();

      expect(createConnection).toHaveBeenCalledWith(SOCKET_PATH);
      expect(client.connected).toBe(true);
    });

    it('should reject when the socket cannot be reached', async () => {
      const client = new MpvIpcClient(SOCKET_PATH);
      const connecting = client.connect();

      lastSocket().simulateError(new Error('ENOENT'));

      await expect(connecting).rejects.toMatchObject({
        code: BridgeErrorCode.CONNECT_FAILED,
        message: `Failed to connect to host IPC at ${SOCKET_PATH}: ENOENT`,
      });
      expect(client.connected).toBe(false);
    });

    it('should reject a second connect', async () => {
      const { client } = await connectClient();

      await expect(client.connect()).rejects.toThrow('Host IPC is already connected');
    });
  });

  describe('requests', () => {
    it('should write newline-terminated commands with request ids', async () => {
      const { client, socket } = await connectClient();

      void client.getProperty('osd-dimensions').catch(() => {});
      void client.setProperty('force-media-title', 'Remote desktop').catch(() => {});

      expect(socket.write).toHaveBeenNthCalledWith(
        1,
        '{"command":["get_property","osd-dimensions"],"request_id":1}\n'
      );
      expect(writtenMessages(socket)[1]).toEqual({
        command: ['set_property', 'force-media-title', 'Remote desktop'],
        request_id: 2,
      });
    });

    it('should resolve requests by request id', async () => {
      const { client, socket } = await connectClient();

      const first = client.getProperty('video-params');
      const second = client.getProperty('osd-dimensions');
      socket.simulateData(mpvLine({ request_id: 2, error: 'success', data: { w: 1920 } }));
      socket.simulateData(mpvLine({ request_id: 1, error: 'success', data: { w: 1280 } }));

      await expect(first).resolves.toEqual({ w: 1280 });
      await expect(second).resolves.toEqual({ w: 1920 });
    });

    it('should reject requests that fail on the host', async () => {
      const { client, socket } = await connectClient();

      const request = client.setProperty('clipboard/text', 'hello');
      socket.simulateData(mpvLine({ request_id: 1, error: 'property unavailable' }));

      await expect(request).rejects.toMatchObject({
        code: BridgeErrorCode.HOST_REQUEST_FAILED,
        message: 'set_property failed: property unavailable',
      });
    });

    it('should reject requests when not connected', async () => {
      const client = new MpvIpcClient(SOCKET_PATH);

      await expect(client.getProperty('mouse-pos')).rejects.toThrow('Host IPC is not connected');
    });

    it('should read lines split across chunks', async () => {
      const { client, socket } = await connectClient();

      const request = client.getProperty('wayland-remote-input-forwarding');
      const line = mpvLine({ request_id: 1, error: 'success', data: true });
      socket.simulateData(line.slice(0, 10));
      socket.simulateData(line.slice(10));

      await expect(request).resolves.toBe(true);
    });

    it('should skip malformed lines', async () => {
      const { client, socket } = await connectClient();

      const request = client.getProperty('mouse-pos');
      socket.simulateData('not json\n' + mpvLine({ request_id: 1, error: 'success', data: 1 }));

      await expect(request).resolves.toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        '[MpvIpcClient] Dropping malformed line:',
        'not json'
      );
    });
  });

  describe('property observation', () => {
    it('should observe by name and forward changes', async () => {
      const { client, socket } = await connectClient();
      const events: HostEvent[] = [];
      client.onEvent = (event) => events.push(event);

      const observing = client.observeProperty('mouse-pos');
      socket.simulateData(mpvLine({ request_id: 1, error: 'success' }));
      await observing;
      socket.simulateData(
        mpvLine({ event: 'property-change', id: 1, name: 'mouse-pos', data: { x: 3, y: 4 } })
      );

      expect(writtenMessages(socket)[0]).toEqual({
        command: ['observe_property', 1, 'mouse-pos'],
        request_id: 1,
      });
      expect(events).toEqual([
        {
          type: HostEventType.PROPERTY_CHANGE,
          payload: { name: 'mouse-pos', data: { x: 3, y: 4 } },
        },
      ]);
    });

    it('should not observe the same property twice', async () => {
      const { client, socket } = await connectClient();

      const observing = client.observeProperty('mouse-pos');
      socket.simulateData(mpvLine({ request_id: 1, error: 'success' }));
      await observing;
      await client.observeProperty('mouse-pos');

      expect(socket.write).toHaveBeenCalledTimes(1);
    });

    it('should unobserve by the assigned id and drop later changes', async () => {
      const { client, socket } = await connectClient();
      const onEvent = vi.fn();
      client.onEvent = onEvent;

      const observingText = client.observeProperty('clipboard/text');
      const observingPrimary = client.observeProperty('clipboard/text-primary');
      socket.simulateData(
        mpvLine({ request_id: 1, error: 'success' }) + mpvLine({ request_id: 2, error: 'success' })
      );
      await Promise.all([observingText, observingPrimary]);

      const unobserving = client.unobserveProperty('clipboard/text-primary');
      socket.simulateData(mpvLine({ request_id: 3, error: 'success' }));
      await unobserving;
      socket.simulateData(
        mpvLine({ event: 'property-change', id: 2, name: 'clipboard/text-primary', data: 'x' })
      );

      expect(writtenMessages(socket)[2]).toEqual({
        command: ['unobserve_property', 2],
        request_id: 3,
      });
      expect(onEvent).not.toHaveBeenCalled();
    });

    it('should forget a property whose observation failed', async () => {
      const { client, socket } = await connectClient();

      const observing = client.observeProperty('video-params');
      socket.simulateData(mpvLine({ request_id: 1, error: 'invalid parameter' }));
      await expect(observing).rejects.toThrow('observe_property failed: invalid parameter');

      void client.observeProperty('video-params').catch(() => {});

      expect(writtenMessages(socket)[1]).toEqual({
        command: ['observe_property', 2, 'video-params'],
        request_id: 2,
      });
    });

    it('should report the shutdown event', async () => {
      const { client, socket } = await connectClient();
      const onEvent = vi.fn();
      client.onEvent = onEvent;

      socket.simulateData(mpvLine({ event: 'shutdown' }));

      expect(onEvent).toHaveBeenCalledWith({ type: HostEventType.SHUTDOWN });
    });
  });

  describe('connection loss', () => {
    it('should report a closed connection and reject pending requests', async () => {
      const { client, socket } = await connectClient();
      const onError = vi.fn();
      client.onError = onError;

      const request = client.getProperty('mouse-pos');
      socket.simulateClose();

      await expect(request).rejects.toThrow('Host IPC connection closed');
      expect(onError).toHaveBeenCalledWith('Host IPC connection closed');
      expect(client.connected).toBe(false);
    });

    it('should not report its own disconnect', async () => {
      const { client, socket } = await connectClient();
      const onError = vi.fn();
      client.onError = onError;

      const request = client.getProperty('mouse-pos');
      client.disconnect();
      socket.simulateClose();

      await expect(request).rejects.toThrow('Host IPC disconnected');
      expect(socket.end).toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
