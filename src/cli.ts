#!/usr/bin/env node
/**
 * mpv-wayland-remote entry point
 */

import { Bridge } from './Bridge';
import { exitCodeFor } from './EventMultiplexer';
import { BridgeConfig, loadConfig, loadEnvFile } from './config';
import { MpvIpcClient } from './host/MpvIpcClient';
import { HelperRemoteDisplay } from './remote/HelperRemoteDisplay';
import { SwayIpcClient } from './wm/SwayIpcClient';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<number> {
  loadEnvFile();

  let config: BridgeConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error('[mpv-wayland-remote]', describeError(error));
    return 1;
  }

  const bridge = new Bridge(config, {
    display: new HelperRemoteDisplay(config.helperPath),
    host: new MpvIpcClient(config.hostSocketPath),
    windowManager: config.swaySocketPath ? new SwayIpcClient(config.swaySocketPath) : null,
  });

  try {
    await bridge.setup();
  } catch (error) {
    console.error('[mpv-wayland-remote] Setup failed:', describeError(error));
    await bridge.teardown();
    return 1;
  }

  const stop = () => bridge.stop();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const exit = await bridge.run();
    return exitCodeFor(exit);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await bridge.teardown();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[mpv-wayland-remote] Fatal error:', error);
    process.exitCode = 1;
  }
);
