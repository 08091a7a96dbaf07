/**
 * Connectivity monitor - tracks whether the authority is reachable
 * @module network
 */

import { BehaviorSubject, filter, map, pairwise } from 'rxjs';
import type { Observable } from 'rxjs';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Network status information
 */
export interface NetworkStatus {
  isOnline: boolean;
  lastChanged: number;
}

/**
 * Configuration for the connectivity monitor
 */
export interface ConnectivityMonitorConfig {
  /**
   * @default true
   */
  initialOnline?: boolean;
  /**
   * Probed with HEAD requests while started; no probing when unset
   */
  pingUrl?: string;
  pingInterval?: number;
  pingTimeout?: number;
  logger?: Logger;
}

/**
 * ConnectivityMonitor - the host reports transitions with `setOnline`,
 * optionally backed by an HTTP probe
 */
export class ConnectivityMonitor {
  private statusSubject: BehaviorSubject<NetworkStatus>;
  private pingTimer?: ReturnType<typeof setInterval>;
  private abortController?: AbortController;
  private logger?: Logger;

  private config: Required<Omit<ConnectivityMonitorConfig, 'pingUrl' | 'logger'>> & {
    pingUrl?: string;
  } = {
    initialOnline: true,
    pingInterval: 30000,
    pingTimeout: 5000,
  };

  /**
   * Observable of network status changes
   */
  public readonly status$: Observable<NetworkStatus>;

  /**
   * Emits once per offline to online transition
   */
  public readonly online$: Observable<void>;

  constructor(config: ConnectivityMonitorConfig = {}) {
    const { logger, ...rest } = config;
    this.config = { ...this.config, ...rest };
    this.logger = logger?.child({ module: 'network' });

    this.statusSubject = new BehaviorSubject<NetworkStatus>({
      isOnline: this.config.initialOnline,
      lastChanged: Date.now(),
    });

    this.status$ = this.statusSubject.asObservable();
    this.online$ = this.status$.pipe(
      map((status) => status.isOnline),
      pairwise(),
      filter(([wasOnline, isOnline]) => !wasOnline && isOnline),
      map(() => undefined)
    );
  }

  /**
   * Current network status
   */
  public get status(): NetworkStatus {
    return this.statusSubject.value;
  }

  public get isOnline(): boolean {
    return this.statusSubject.value.isOnline;
  }

  /**
   * Report a connectivity change. Repeating the current state is ignored.
   */
  public setOnline(isOnline: boolean): void {
    if (this.statusSubject.value.isOnline === isOnline) {
      return;
    }

    this.logger?.info({ isOnline }, isOnline ? 'connectivity restored' : 'connectivity lost');
    this.statusSubject.next({ isOnline, lastChanged: Date.now() });
  }

  /**
   * Start periodic probing of `pingUrl`
   */
  public start(): void {
    if (!this.config.pingUrl) {
      return;
    }

    this.stopPing();
    this.pingTimer = setInterval(() => {
      void this.checkConnectivity();
    }, this.config.pingInterval);
    void this.checkConnectivity();
  }

  /**
   * Probe `pingUrl` once and record the outcome
   *
   * @returns Whether the probe succeeded; the current status when no
   * `pingUrl` is configured
   */
  public async checkConnectivity(): Promise<boolean> {
    const pingUrl = this.config.pingUrl;
    if (!pingUrl) {
      return this.isOnline;
    }

    this.abortController?.abort();
    const controller = new AbortController();
    this.abortController = controller;
    const timer = setTimeout(() => controller.abort(), this.config.pingTimeout);

    try {
      const response = await fetch(pingUrl, { method: 'HEAD', signal: controller.signal });
      this.setOnline(response.ok);
      return response.ok;
    } catch (error) {
      // Superseded or stopped
      if (this.abortController !== controller) {
        return this.isOnline;
      }
      this.logger?.debug({ error: errorMessage(error) }, 'connectivity probe failed');
      this.setOnline(false);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Stop probing and complete the status stream
   */
  public destroy(): void {
    this.stopPing();
    this.statusSubject.complete();
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }

    if (this.abortController) {
      this.abortController.abort();
      this.abortController = undefined;
    }
  }
}
