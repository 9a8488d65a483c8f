import { BridgeContext } from './BridgeContext';
import { HostProperty } from './host/HostProperties';
import { ToplevelWindow } from './types/BridgeState';

interface SessionLabel {
  displayName: string;
  outputName: string;
  seatName: string;
}

function sessionSuffix(label: SessionLabel): string {
  return `[${label.displayName} ${label.outputName} ${label.seatName}]`;
}

export function formatGenericTitle(label: SessionLabel): string {
  return `Remote desktop ${sessionSuffix(label)}`;
}

export function formatWindowTitle(window: ToplevelWindow, label: SessionLabel): string {
  return `[${window.appId ?? ''}] ${window.title ?? ''} ${sessionSuffix(label)}`;
}

/**
 * Mirrors the current eligible remote window into the host's media title
 */
export class TitleSynchronizer {
  constructor(private readonly ctx: BridgeContext) {}

  publishGeneric(): void {
    void this.publish(formatGenericTitle(this.ctx.config));
  }

  handleCurrentWindowChanged(window: ToplevelWindow | null): void {
    const title = window
      ? formatWindowTitle(window, this.ctx.config)
      : formatGenericTitle(this.ctx.config);
    void this.publish(title);
  }

  clear(): Promise<void> {
    return this.publish('');
  }

  private publish(title: string): Promise<void> {
    return this.ctx.host.setProperty(HostProperty.MEDIA_TITLE, title).catch((error: unknown) => {
      console.error('[TitleSynchronizer] Failed to set the media title:', error);
    });
  }
}
