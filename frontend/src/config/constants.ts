export const DASHBOARD_TITLE = 'Bagfiles Capturer';

/**
 * Console refresh interval used until /api/config has loaded (in milliseconds)
 */
export const DEFAULT_CONSOLE_REFRESH_MS = 5_000;

/**
 * Rows fetched per table on the database browser page
 */
export const TABLE_BROWSE_LIMIT = 100;
