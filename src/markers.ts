import type { NotificationEvent } from './types.js';

/**
 * Process-lifetime "unseen" state behind the badge and the activity column.
 * Not persisted, and independent of the snapshot's `seen` set.
 */
export class UnseenMarkers {
  private readonly newUrls = new Set<string>();
  private readonly commentedUrls = new Set<string>();
  private unseen = false;

  get hasUnseen(): boolean {
    return this.unseen;
  }

  isNew(url: string): boolean {
    return this.newUrls.has(url);
  }

  hasNewComments(url: string): boolean {
    return this.commentedUrls.has(url);
  }

  /**
   * Raise markers for a cycle's events. Any event sets the unseen flag.
   *
   * Transitions that emit no event (a review moving to `REVIEW_REQUIRED`,
   * CI going back to pending) never set the flag: the badge only counts
   * changes the user was notified about.
   */
  record(events: readonly NotificationEvent[]): void {
    for (const event of events) {
      this.unseen = true;
      if (event.kind === 'NewPR') {
        this.newUrls.add(event.pr.url);
      } else if (event.kind === 'NewComments') {
        this.commentedUrls.add(event.pr.url);
      }
    }
  }

  markAllSeen(): void {
    this.newUrls.clear();
    this.commentedUrls.clear();
    this.unseen = false;
  }

  /** The user opened one PR: clear its markers, and the flag once nothing is left */
  acknowledge(url: string): void {
    this.newUrls.delete(url);
    this.commentedUrls.delete(url);
    if (this.newUrls.size === 0 && this.commentedUrls.size === 0) {
      this.unseen = false;
    }
  }
}
