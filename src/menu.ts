import pc from 'picocolors';
import type { UnseenMarkers } from './markers.js';
import { getStatusIndicator, type StatusIndicator } from './status.js';
import type { ClassifiedPullRequest } from './types.js';

/** Colored circle per status indicator */
export const STATUS_GLYPHS: Record<StatusIndicator, string> = {
  draft: '⚫',
  failing: '\u{1F534}',
  passing: '\u{1F7E2}',
  pending: '\u{1F7E1}',
};

export const ACTIVITY_GLYPHS = {
  new: '\u{1F195}',
  comments: '\u{1F4AC}',
  approved: '✅',
  changesRequested: '❌',
  none: '  ',
} as const;

export interface MenuRow {
  statusGlyph: string;
  activityGlyph: string;
  author: string;
  repoShortName: string;
  title: string;
  url: string;
}

export interface MenuSection {
  heading: string;
  rows: MenuRow[];
}

/** Everything the presentation surface needs for one render */
export interface MenuModel {
  sections: MenuSection[];
  hasUnseen: boolean;
  /** Text shown next to the icon, e.g. " (3)", or null */
  badge: string | null;
  icon: 'normal' | 'notify';
}

/** A surface that can show the menu */
export interface MenuRenderer {
  render(menu: MenuModel): void;
}

/** `owner/name` → `name` */
export function repoShortName(repo: string): string {
  return repo.split('/').pop() ?? repo;
}

/**
 * Activity glyph for a row.
 * Priority: new > new comments > approved > changes requested > blank.
 */
export function activityGlyph(pr: ClassifiedPullRequest, isNew: boolean, hasNewComments: boolean): string {
  if (isNew) return ACTIVITY_GLYPHS.new;
  if (hasNewComments) return ACTIVITY_GLYPHS.comments;
  if (pr.reviewDecision === 'APPROVED') return ACTIVITY_GLYPHS.approved;
  if (pr.reviewDecision === 'CHANGES_REQUESTED') return ACTIVITY_GLYPHS.changesRequested;
  return ACTIVITY_GLYPHS.none;
}

export function buildRow(pr: ClassifiedPullRequest, markers: UnseenMarkers): MenuRow {
  return {
    statusGlyph: STATUS_GLYPHS[getStatusIndicator(pr)],
    activityGlyph: activityGlyph(pr, markers.isNew(pr.url), markers.hasNewComments(pr.url)),
    author: pr.author,
    repoShortName: repoShortName(pr.repo),
    title: pr.title,
    url: pr.url,
  };
}

/**
 * Group PRs into "My PRs" and "Review Requested", keeping their order.
 * Empty sections are left out.
 */
export function buildMenu(prs: readonly ClassifiedPullRequest[], markers: UnseenMarkers): MenuModel {
  const authored = prs.filter((pr) => pr.reason === 'author').map((pr) => buildRow(pr, markers));
  const reviewing = prs.filter((pr) => pr.reason === 'reviewer').map((pr) => buildRow(pr, markers));

  const sections: MenuSection[] = [];
  if (authored.length > 0) sections.push({ heading: 'My PRs', rows: authored });
  if (reviewing.length > 0) sections.push({ heading: 'Review Requested', rows: reviewing });

  const hasUnseen = markers.hasUnseen;
  return {
    sections,
    hasUnseen,
    badge: hasUnseen && prs.length > 0 ? ` (${prs.length})` : null,
    icon: hasUnseen ? 'notify' : 'normal',
  };
}

/** Rows in display order, as numbered by the terminal menu (1-based) */
export function menuRows(menu: MenuModel): MenuRow[] {
  return menu.sections.flatMap((section) => section.rows);
}

/**
 * Plain-text lines for the terminal menu. Rows are numbered across
 * sections, and author/repo columns are padded to the widest value.
 */
export function formatMenu(menu: MenuModel): string[] {
  const rows = menuRows(menu);
  const header = `${menu.icon === 'notify' ? '●' : '○'} Pull requests${menu.badge ?? ''}`;

  if (rows.length === 0) {
    return [header, '  No open PRs'];
  }

  const numberWidth = String(rows.length).length;
  const authorWidth = Math.max(...rows.map((r) => r.author.length));
  const repoWidth = Math.max(...rows.map((r) => r.repoShortName.length));

  const lines = [header];
  let index = 0;
  for (const section of menu.sections) {
    lines.push('', `--- ${section.heading} ---`);
    for (const row of section.rows) {
      index++;
      const num = String(index).padStart(numberWidth);
      lines.push(
        `${num}. ${row.statusGlyph} ${row.activityGlyph}  ${row.author.padEnd(authorWidth)}  ${row.repoShortName.padEnd(repoWidth)}  ${row.title}`,
      );
    }
  }
  return lines;
}

/**
 * Renders the menu to stdout and remembers which URL each number maps to.
 */
export class TerminalMenu implements MenuRenderer {
  private rows: MenuRow[] = [];

  render(menu: MenuModel): void {
    this.rows = menuRows(menu);
    const [header, ...rest] = formatMenu(menu);
    console.log();
    console.log(menu.icon === 'notify' ? pc.bold(pc.red(header)) : pc.bold(header));
    for (const line of rest) {
      console.log(line.startsWith('---') ? pc.dim(line) : line);
    }
    console.log(pc.dim('[m] mark all seen  [r] refresh  [n] open row n  [q] quit'));
  }

  /** URL of the 1-based row number from the last render */
  urlAt(position: number): string | undefined {
    return this.rows[position - 1]?.url;
  }
}
