import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { BridgeError, BridgeErrorCode } from './types/BridgeState';

const DEFAULT_HELPER = 'wayland-remote-helper';

const required = (name: string) =>
  z
    .string({ required_error: `${name} is not set` })
    .trim()
    .min(1, `${name} is not set`);

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', '']))
  .optional()
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  MPV_IPC_SOCKET: required('MPV_IPC_SOCKET'),
  WAYLAND_REMOTE_DISPLAY: required('WAYLAND_REMOTE_DISPLAY'),
  WAYLAND_REMOTE_OUTPUT: required('WAYLAND_REMOTE_OUTPUT'),
  WAYLAND_REMOTE_SEAT: required('WAYLAND_REMOTE_SEAT'),
  WAYLAND_REMOTE_SWAYSOCK: optionalPath,
  WAYLAND_REMOTE_HELPER: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : DEFAULT_HELPER)),
  WAYLAND_REMOTE_REQUIRE_VISIBLE: booleanFlag,
});

export interface BridgeConfig {
  hostSocketPath: string;
  displayName: string;
  outputName: string;
  seatName: string;
  swaySocketPath: string | null;
  helperPath: string;
  /** Whether a window must be on the remote output to count as eligible */
  requireVisibleOnOutput: boolean;
}

/**
 * Load `.env` from the working directory into process.env
 */
export function loadEnvFile(): void {
  loadEnv({
    path: path.resolve(process.cwd(), '.env'),
  });
}

/**
 * Validate the environment and build the bridge configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new BridgeError(BridgeErrorCode.MISSING_CONFIG, problems.join('; '));
  }

  const parsed = result.data;
  return {
    hostSocketPath: parsed.MPV_IPC_SOCKET,
    displayName: parsed.WAYLAND_REMOTE_DISPLAY,
    outputName: parsed.WAYLAND_REMOTE_OUTPUT,
    seatName: parsed.WAYLAND_REMOTE_SEAT,
    swaySocketPath: parsed.WAYLAND_REMOTE_SWAYSOCK,
    helperPath: parsed.WAYLAND_REMOTE_HELPER,
    requireVisibleOnOutput: parsed.WAYLAND_REMOTE_REQUIRE_VISIBLE,
  };
}
