/**
 * Terminal styling shared by the CLI commands.
 *
 * Color constants, box drawing, status markers, section headers and
 * key-value rows. Pure string rendering; callers print with console.log().
 */

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

/** Accent for titles and borders. */
export const ACCENT = '\x1b[38;2;214;128;60m';

/** Dimmed accent for borders and secondary elements. */
export const ACCENT_DIM = '\x1b[38;2;150;92;46m';

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// Box drawing characters
// ---------------------------------------------------------------------------

export const BOX = {
  topLeft: '╭',     // ╭
  topRight: '╮',    // ╮
  bottomLeft: '╰',  // ╰
  bottomRight: '╯', // ╯
  horizontal: '─',  // ─
  vertical: '│',    // │
} as const;

// ---------------------------------------------------------------------------
// Status indicators
// ---------------------------------------------------------------------------

export const CHECK = `${GREEN}✓${RESET}`;   // ✓
export const CROSS = `${RED}✗${RESET}`;      // ✗
export const WARN = `${YELLOW}⚠${RESET}`;    // ⚠

export type Status = 'pass' | 'warn' | 'fail';

// ---------------------------------------------------------------------------
// Terminal helpers
// ---------------------------------------------------------------------------

/** Get terminal width with 80-column fallback. */
export function termWidth(): number {
  return process.stdout.columns ?? 80;
}

/** Measure visible character length (strips ANSI escape sequences). */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

// ---------------------------------------------------------------------------
// Box rendering
// ---------------------------------------------------------------------------

/**
 * Render a bordered box with an optional title.
 *
 * ```
 * ╭── Title ──────────────────────────╮
 * │                                    │
 * │  Content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function box(title: string, lines: string[], width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 2;
  const innerW = w - 2;

  const out: string[] = [];

  if (title) {
    const titleStr = ` ${title} `;
    const dashesAfter = Math.max(0, w - 4 - visibleLength(titleStr));
    out.push(
      `  ${ACCENT_DIM}${BOX.topLeft}${BOX.horizontal.repeat(2)}${RESET}` +
      `${ACCENT}${BOLD}${titleStr}${RESET}` +
      `${ACCENT_DIM}${BOX.horizontal.repeat(dashesAfter)}${BOX.topRight}${RESET}`,
    );
  } else {
    out.push(`  ${ACCENT_DIM}${BOX.topLeft}${BOX.horizontal.repeat(w - 2)}${BOX.topRight}${RESET}`);
  }

  const blank = `  ${ACCENT_DIM}${BOX.vertical}${RESET}${' '.repeat(innerW)}${ACCENT_DIM}${BOX.vertical}${RESET}`;
  out.push(blank);

  for (const line of lines) {
    const padRight = Math.max(0, innerW - 2 - visibleLength(line));
    out.push(
      `  ${ACCENT_DIM}${BOX.vertical}${RESET}  ${line}${' '.repeat(padRight)}${ACCENT_DIM}${BOX.vertical}${RESET}`,
    );
  }

  out.push(blank);
  out.push(`  ${ACCENT_DIM}${BOX.bottomLeft}${BOX.horizontal.repeat(w - 2)}${BOX.bottomRight}${RESET}`);

  return out.join('\n');
}

/**
 * Render a section header with dashes.
 *
 * Example: ── Capabilities ────────────────────────────
 */
export function sectionHeader(title: string, width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 6;
  const dashesAfter = Math.max(0, w - 3 - title.length - 1);
  return (
    `  ${ACCENT_DIM}${BOX.horizontal.repeat(2)} ${RESET}` +
    `${ACCENT}${BOLD}${title} ${RESET}` +
    `${ACCENT_DIM}${BOX.horizontal.repeat(dashesAfter)}${RESET}`
  );
}

/**
 * Render a key-value row with aligned label.
 *
 * Example: "Language       ja"
 */
export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `${BOLD}${label.padEnd(labelWidth, ' ')}${RESET} ${value}`;
}

/** Render a horizontal separator line. */
export function separator(width?: number): string {
  const w = Math.min(width ?? termWidth(), termWidth()) - 4;
  return `  ${ACCENT_DIM}${BOX.horizontal.repeat(w)}${RESET}`;
}

/** Status prefix icon for pass/warn/fail results. */
export function statusPrefix(status: Status): string {
  switch (status) {
    case 'pass':
      return `${GREEN}+${RESET}`;
    case 'warn':
      return `${YELLOW}~${RESET}`;
    case 'fail':
      return `${RED}x${RESET}`;
  }
}

/** Status badge (PASS, WARN, FAIL). */
export function statusBadge(status: Status): string {
  switch (status) {
    case 'pass':
      return `${GREEN}PASS${RESET}`;
    case 'warn':
      return `${YELLOW}WARN${RESET}`;
    case 'fail':
      return `${RED}FAIL${RESET}`;
  }
}
