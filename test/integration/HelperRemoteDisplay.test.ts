/**
 * Integration tests for HelperRemoteDisplay with a mocked helper process
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('child_process', () => import('../mocks/child_process'));

import { HelperRemoteDisplay } from '../../src/remote/HelperRemoteDisplay';
import { BridgeMessageType, HelperMessageType } from '../../src/remote/HelperProtocol';
import { RemoteCapabilities } from '../../src/remote/RemoteDisplay';
import { BridgeErrorCode } from '../../src/types/BridgeState';
import { RemoteEventType } from '../../src/types/RemoteEvents';
import { MockChildProcess, getLastMockProcess, resetMocks, spawn } from '../mocks/child_process';
import {
  createEventMessage,
  createHelloMessage,
  createHelperMessage,
  createTransferDataMessage,
  createTransferEndMessage,
  createTransferErrorMessage,
  parseFrames,
} from '../helpers/protocol';

const HELPER_PATH = '/opt/bin/remote-helper';

const ALL_CAPABILITIES: RemoteCapabilities = {
  virtualPointer: true,
  toplevelManagement: true,
  dataControl: true,
};

function currentProcess(): MockChildProcess {
  const helper = getLastMockProcess();
  if (!helper) {
    throw new Error('helper was not spawned');
  }
  return helper;
}

function writtenFrames(helper: MockChildProcess) {
  const written = helper.stdin.write.mock.calls.map(([data]) =>
    typeof data === 'string' ? Buffer.from(data) : data
  );
  return parseFrames(Buffer.concat(written));
}

function writtenRequests(helper: MockChildProcess): unknown[] {
  return writtenFrames(helper)
    .filter((frame) => frame.type === BridgeMessageType.REQUEST)
    .map((frame) => JSON.parse(frame.payload.toString('utf8')));
}

async function connectDisplay(
  capabilities: RemoteCapabilities = ALL_CAPABILITIES
): Promise<{ display: HelperRemoteDisplay; helper: MockChildProcess }> {
  const display = new HelperRemoteDisplay(HELPER_PATH);
  const connecting = display.connect('wayland-test');
  const helper = currentProcess();
  helper.simulateStdout(createHelloMessage(capabilities));
  await connecting;
  return { display, helper };
}

describe('HelperRemoteDisplay', () => {
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
    it('should spawn the helper for the display and wait for its capabilities', async () => {
      const { display } = await connectDisplay({
        virtualPointer: true,
        toplevelManagement: false,
        dataControl: true,
      });

      expect(spawn).toHaveBeenCalledWith(HELPER_PATH, ['wayland-test'], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      expect(display.connected).toBe(true);
      expect(display.capabilities).toEqual({
        virtualPointer: true,
        toplevelManagement: false,
        dataControl: true,
      });
    });

    it('should accept a HELLO split across reads', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);
      const connecting = display.connect('wayland-test');
      const hello = createHelloMessage(ALL_CAPABILITIES);

      currentProcess().simulateStdout(hello.subarray(0, 3));
      currentProcess().simulateStdout(hello.subarray(3));

      await expect(connecting).resolves.toBeUndefined();
    });

    it('should fail when the helper reports an error before HELLO', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);
      const connecting = display.connect('wayland-test');
      const helper = currentProcess();

      helper.simulateStdout(
        createHelperMessage(HelperMessageType.ERROR, Buffer.from('cannot open wayland-test'))
      );

      await expect(connecting).rejects.toMatchObject({
        code: BridgeErrorCode.CONNECT_FAILED,
        message: 'cannot open wayland-test',
      });
      expect(helper.kill).toHaveBeenCalled();
      expect(display.connected).toBe(false);
    });

    it('should fail when the helper exits before HELLO', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);
      const connecting = display.connect('wayland-test');

      currentProcess().simulateClose(1);

      await expect(connecting).rejects.toThrow('Remote helper exited with code 1');
    });

    it('should fail when the helper cannot be started', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);
      const connecting = display.connect('wayland-test');

      currentProcess().simulateError(new Error('spawn ENOENT'));

      await expect(connecting).rejects.toThrow('Failed to run the remote helper: spawn ENOENT');
    });

    it('should reject a malformed HELLO', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);
      const connecting = display.connect('wayland-test');

      currentProcess().simulateStdout(
        createHelperMessage(HelperMessageType.HELLO, Buffer.from('{"virtualPointer":true}'))
      );

      await expect(connecting).rejects.toMatchObject({ code: BridgeErrorCode.CONNECT_FAILED });
    });

    it('should relay helper diagnostics', async () => {
      const { helper } = await connectDisplay();

      helper.simulateStderr('registry roundtrip took 3ms\n');

      expect(console.error).toHaveBeenCalledWith('[remote-helper]', 'registry roundtrip took 3ms');
    });
  });

  describe('requests', () => {
    it('should queue requests until flushed', async () => {
      const { display, helper } = await connectDisplay();

      const pointer = display.createVirtualPointer(4, 3);
      display.motionAbsolute(pointer, 1000, 640, 360, 1280, 720);
      display.frame(pointer);
      const device = display.createDataDevice(4);

      expect(helper.stdin.write).not.toHaveBeenCalled();

      display.flush();

      expect(helper.stdin.write).toHaveBeenCalledTimes(1);
      expect(writtenRequests(helper)).toEqual([
        { op: 'create_virtual_pointer', id: 1, seat: 4, output: 3 },
        {
          op: 'motion_absolute',
          pointer: 1,
          time: 1000,
          x: 640,
          y: 360,
          xExtent: 1280,
          yExtent: 720,
        },
        { op: 'frame', pointer: 1 },
        { op: 'create_data_device', id: 2, seat: 4 },
      ]);
      expect(device).toBe(2);
    });

    it('should not write when nothing is queued', async () => {
      const { display, helper } = await connectDisplay();

      display.flush();

      expect(helper.stdin.write).not.toHaveBeenCalled();
    });

    it('should encode selections and releases', async () => {
      const { display, helper } = await connectDisplay();

      const source = display.createDataSource(['x-tag', 'text/plain']);
      display.setSelection(2, source, 'primary');
      display.setSelection(2, null, 'regular');
      display.releaseSeat(4);
      display.stopToplevelManager();
      display.flush();

      expect(writtenRequests(helper)).toEqual([
        { op: 'create_data_source', id: 1, mimeTypes: ['x-tag', 'text/plain'] },
        { op: 'set_selection', device: 2, source: 1, kind: 'primary' },
        { op: 'set_selection', device: 2, source: null, kind: 'regular' },
        { op: 'release_seat', seat: 4 },
        { op: 'stop_toplevel_manager' },
      ]);
    });

    it('should send source data frames', async () => {
      const { display, helper } = await connectDisplay();

      display.sendSourceData(6, Buffer.from('abc'));
      display.flush();

      const [frame] = writtenFrames(helper);
      expect(frame.type).toBe(BridgeMessageType.SOURCE_DATA);
      expect(frame.payload.readUInt32BE(0)).toBe(6);
      expect(frame.payload.subarray(4).toString()).toBe('abc');
    });
  });

  describe('events', () => {
    it('should deliver validated events', async () => {
      const { display, helper } = await connectDisplay();
      const onEvent = vi.fn();
      display.onEvent = onEvent;

      helper.simulateStdout(
        createEventMessage({ type: RemoteEventType.OUTPUT_NAME, payload: { id: 3, name: 'HEADLESS-1' } })
      );

      expect(onEvent).toHaveBeenCalledWith({
        type: RemoteEventType.OUTPUT_NAME,
        payload: { id: 3, name: 'HEADLESS-1' },
      });
    });

    it('should drop malformed events', async () => {
      const { display, helper } = await connectDisplay();
      const onEvent = vi.fn();
      display.onEvent = onEvent;

      helper.simulateStdout(
        createHelperMessage(HelperMessageType.EVENT, Buffer.from('{"type":"OUTPUT_NAME"}'))
      );

      expect(onEvent).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledWith(
        '[HelperRemoteDisplay] Dropping malformed event:',
        '{"type":"OUTPUT_NAME"}'
      );
    });
  });

  describe('receive', () => {
    it('should request the payload at once and collect it', async () => {
      const { display, helper } = await connectDisplay();

      const payload = display.receive(12, 'text/plain');

      expect(writtenRequests(helper)).toEqual([
        { op: 'receive', offer: 12, mimeType: 'text/plain', transfer: 1 },
      ]);

      helper.simulateStdout(
        Buffer.concat([
          createTransferDataMessage(1, Buffer.from('hello ')),
          createTransferDataMessage(1, Buffer.from('remote')),
          createTransferEndMessage(1),
        ])
      );

      await expect(payload).resolves.toEqual(Buffer.from('hello remote'));
    });

    it('should resolve an empty payload', async () => {
      const { display, helper } = await connectDisplay();

      const payload = display.receive(12, 'text/plain');
      helper.simulateStdout(createTransferEndMessage(1));

      await expect(payload).resolves.toEqual(Buffer.alloc(0));
    });

    it('should reject a failed transfer', async () => {
      const { display, helper } = await connectDisplay();

      const payload = display.receive(12, 'text/plain');
      helper.simulateStdout(createTransferErrorMessage(1, 'broken pipe'));

      await expect(payload).rejects.toMatchObject({
        code: BridgeErrorCode.PROTOCOL_ERROR,
        message: 'broken pipe',
      });
    });

    it('should reject when not connected', async () => {
      const display = new HelperRemoteDisplay(HELPER_PATH);

      await expect(display.receive(1, 'text/plain')).rejects.toThrow(
        'Remote display is not connected'
      );
    });
  });

  describe('connection loss', () => {
    it('should report an exit and reject pending transfers', async () => {
      const { display, helper } = await connectDisplay();
      const onError = vi.fn();
      display.onError = onError;

      const payload = display.receive(12, 'text/plain');
      helper.simulateClose(0);

      await expect(payload).rejects.toThrow('Remote helper exited with code 0');
      expect(onError).toHaveBeenCalledWith('Remote helper exited with code 0');
      expect(display.connected).toBe(false);
    });

    it('should report a truncated transfer frame', async () => {
      const { display, helper } = await connectDisplay();
      const onError = vi.fn();
      display.onError = onError;

      helper.simulateStdout(createHelperMessage(HelperMessageType.TRANSFER_END, Buffer.from([0, 1])));

      expect(onError).toHaveBeenCalledWith(
        'Remote helper protocol error: Transfer frame too short (2 bytes)'
      );
    });

    it('should flush, then stop the helper on disconnect', async () => {
      const { display, helper } = await connectDisplay();
      const onError = vi.fn();
      display.onError = onError;

      display.destroyVirtualPointer(1);
      display.disconnect();
      helper.simulateClose(null, 'SIGTERM');

      expect(writtenRequests(helper)).toEqual([{ op: 'destroy_virtual_pointer', pointer: 1 }]);
      expect(helper.stdin.end).toHaveBeenCalled();
      expect(helper.kill).toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
