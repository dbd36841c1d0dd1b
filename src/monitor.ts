import { sanitizeError } from './errors.js';
import { fetchAllPRs, type FetchOptions } from './fetcher.js';
import type { PRSource } from './github.js';
import { UnseenMarkers } from './markers.js';
import { buildMenu, type MenuRenderer } from './menu.js';
import { formatNotification, type Notifier } from './notifier.js';
import { formatDuration, silentLogger, type Logger } from './output.js';
import type { ReconciliationEngine } from './reconciler.js';
import type { Config } from './schemas.js';
import { classify } from './status.js';
import type { ClassifiedPullRequest, NotificationEvent } from './types.js';

export interface MonitorDeps {
  /** Called at the start of every poll so config edits apply without a restart */
  loadConfig: () => Promise<Config>;
  /** Login of the current user; called until it succeeds once */
  resolveUser: () => Promise<string>;
  source: PRSource;
  engine: ReconciliationEngine;
  notifier: Notifier;
  renderer: MenuRenderer;
  logger?: Logger;
  fetchOptions?: Omit<FetchOptions, 'logger'>;
}

/**
 * Application controller. Owns the PR list and unseen markers, drives the
 * poll timer and is the only caller of the reconciliation engine.
 *
 * Polls never overlap: a request made while one is running is folded into
 * at most one extra poll after it.
 */
export class Monitor {
  readonly markers = new UnseenMarkers();

  private prs: ClassifiedPullRequest[] = [];
  private config: Config;
  private username: string | null = null;
  private inFlight: Promise<void> | null = null;
  private queued = false;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly logger: Logger;

  constructor(private readonly deps: MonitorDeps, initialConfig: Config) {
    this.config = initialConfig;
    this.logger = deps.logger ?? silentLogger;
  }

  get pullRequests(): readonly ClassifiedPullRequest[] {
    return this.prs;
  }

  get currentConfig(): Config {
    return this.config;
  }

  /** Poll now, then keep polling at the configured interval until `stop()` */
  start(): Promise<void> {
    this.running = true;
    return this.requestPoll();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Ask for a poll. Resolves once a poll that started after this request
   * has finished.
   */
  requestPoll(): Promise<void> {
    if (this.inFlight) {
      this.queued = true;
      return this.inFlight;
    }
    this.inFlight = this.drain();
    return this.inFlight;
  }

  /** User asked for a refresh: clear markers straight away, then poll */
  refreshNow(): Promise<void> {
    this.markers.markAllSeen();
    return this.requestPoll();
  }

  markAllSeen(): void {
    this.markers.markAllSeen();
    this.render();
  }

  /** The user opened a PR from the menu */
  openPR(url: string): void {
    this.markers.acknowledge(url);
    this.render();
  }

  private async drain(): Promise<void> {
    try {
      do {
        this.queued = false;
        await this.pollSafely();
      } while (this.queued);
    } finally {
      this.inFlight = null;
      this.scheduleNext();
    }
  }

  private scheduleNext(): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.requestPoll().catch((error: unknown) => {
        this.logger.error(`Scheduled poll failed: ${sanitizeError(error)}`);
      });
    }, this.config.pollIntervalSeconds * 1000);
  }

  private async pollSafely(): Promise<void> {
    const start = performance.now();
    try {
      await this.poll();
      this.logger.debug(`Poll finished in ${formatDuration(performance.now() - start)}`);
    } catch (error: unknown) {
      this.logger.error(`Error during fetch: ${sanitizeError(error)}`);
    }
  }

  /** One cycle: reload config, fetch, classify, reconcile, notify, render */
  private async poll(): Promise<void> {
    try {
      this.config = await this.deps.loadConfig();
    } catch (error: unknown) {
      this.logger.warn(`Keeping previous config: ${sanitizeError(error)}`);
    }

    const user = await this.resolveUser();
    if (user === null) {
      this.prs = [];
      this.render();
      return;
    }

    const fetched = await fetchAllPRs(this.deps.source, this.config.repos, user, {
      ...this.deps.fetchOptions,
      logger: this.logger,
    });
    const prs = fetched.map(classify);

    const baseline = this.deps.engine.isBaselinePending;
    const events = await this.deps.engine.reconcile(prs);
    this.logger.debug(
      `${prs.length} open PRs across ${this.config.repos.length} repos` +
        (baseline ? ' (baseline)' : `, ${events.length} events`),
    );

    this.markers.record(events);
    this.prs = prs;
    this.deliver(events);
    this.render();
  }

  private async resolveUser(): Promise<string | null> {
    if (this.username !== null) return this.username;
    try {
      this.username = await this.deps.resolveUser();
      this.logger.debug(`Watching as @${this.username}`);
      return this.username;
    } catch (error: unknown) {
      this.logger.error(`Failed to get GitHub username: ${sanitizeError(error)}`);
      return null;
    }
  }

  /** Hand events to the notifier without waiting for delivery */
  private deliver(events: readonly NotificationEvent[]): void {
    for (const event of events) {
      const { title, subtitle, message } = formatNotification(event);
      this.logger.info(`${title}: ${subtitle} ${message}`);
      this.deps.notifier.notify(title, subtitle, message, this.config.sound).catch((error: unknown) => {
        this.logger.warn(`Notification failed: ${sanitizeError(error)}`);
      });
    }
  }

  private render(): void {
    try {
      this.deps.renderer.render(buildMenu(this.prs, this.markers));
    } catch (error: unknown) {
      this.logger.error(`Failed to render menu: ${sanitizeError(error)}`);
    }
  }
}
