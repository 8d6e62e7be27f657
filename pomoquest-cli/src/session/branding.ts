/**
 * PomoQuest branding shared by the session view and plain-text commands.
 *
 * 🍅 (U+1F345) is double-width in most terminals; keep it at the start of
 * a line so the columns after it stay aligned.
 */

export const CLI_VERSION = '1.0.0';

export const BRAND_NAME = 'POMOQUEST';

export const BRAND_ICON = '\u{1F345}';

/** Single-line branded name for headers. */
export const BRAND_INLINE = `${BRAND_ICON} ${BRAND_NAME}`;

export const TAGLINE = 'Focus timer with XP, levels and daily bounties';
