import { logger } from '../../core/logger/index.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { SessionStore } from '../session/session.store.js';
import type { StatusService } from '../status/status.service.js';
import type { PanelDriver, RefreshMode } from './display.panel.js';
import { renderStatusFrame } from './display.renderer.js';
import type { Frame } from './frame.js';

export type RefreshOutcome = RefreshMode | 'skipped' | 'failed';

type PanelState = 'pending' | 'ready' | 'disabled';

export interface DisplayServiceOptions {
  panel: PanelDriver | null;
  session: SessionStore;
  status: StatusService;
  preferences: PreferencesService;
  now?: () => Date;
}

const pad = (value: number) => value.toString().padStart(2, '0');

export const formatClock = (date: Date) => `${pad(date.getHours())}:${pad(date.getMinutes())}`;

/**
 * Drives the e-paper panel. Every refresh also runs the session's idle tick,
 * so pet stats keep moving while no panel is attached.
 *
 * Draws are full on the first one and every `displayFullRefreshInterval`-th,
 * partial otherwise. A panel that fails to initialise is never retried.
 */
export class DisplayService {
  private readonly panel: PanelDriver | null;
  private readonly now: () => Date;
  private state: PanelState;
  private draws = 0;
  private inFlight: Promise<RefreshOutcome> | null = null;

  constructor(private readonly options: DisplayServiceOptions) {
    this.panel = options.panel;
    this.now = options.now ?? (() => new Date());
    this.state = options.panel ? 'pending' : 'disabled';
  }

  get enabled(): boolean {
    return this.state !== 'disabled';
  }

  get drawCount(): number {
    return this.draws;
  }

  /** Overlapping calls share the refresh already in flight. */
  refresh(): Promise<RefreshOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async shutdown(): Promise<void> {
    if (!this.panel || this.state !== 'ready') return;
    try {
      await this.panel.sleep();
    } catch (error) {
      logger.warn({ err: error }, 'Panel did not go to sleep');
    }
  }

  private async runRefresh(): Promise<RefreshOutcome> {
    this.options.session.tick(this.options.status.getStatus().count > 0);

    const panel = await this.readyPanel();
    if (!panel) return 'skipped';

    const { displayMode, displayFullRefreshInterval } = this.options.preferences.get();
    this.draws += 1;
    const wantsFull = this.draws === 1 || this.draws % displayFullRefreshInterval === 0;

    try {
      const view = { status: this.options.status.getStatus(), clock: formatClock(this.now()) };
      return await this.push(panel, renderStatusFrame(view, displayMode), wantsFull);
    } catch (error) {
      logger.error({ err: error, draw: this.draws }, 'Display update failed');
      return 'failed';
    }
  }

  private async push(panel: PanelDriver, frame: Frame, wantsFull: boolean): Promise<RefreshMode> {
    if (!wantsFull && panel.displayPartial) {
      try {
        await panel.displayPartial(frame);
        return 'partial';
      } catch (error) {
        logger.debug({ err: error }, 'Partial refresh failed, falling back to full');
      }
    }
    await panel.display(frame);
    return 'full';
  }

  private async readyPanel(): Promise<PanelDriver | null> {
    if (!this.panel || this.state === 'disabled') return null;
    if (this.state === 'ready') return this.panel;

    try {
      await this.panel.init();
      this.state = 'ready';
      logger.info({ driver: this.panel.name }, 'E-paper panel initialised');
      return this.panel;
    } catch (error) {
      this.state = 'disabled';
      logger.error({ err: error, driver: this.panel.name }, 'E-paper panel unavailable, display disabled');
      return null;
    }
  }
}
