import type { PageProvider } from '../router/page-router';
import { ConsolePage } from './ConsolePage';
import { DbBrowserPage } from './DbBrowserPage';
import { DbQueryPage } from './DbQueryPage';
import { SchedulePage } from './SchedulePage';
import { SetupPage } from './SetupPage';

export interface PageOptions {
  consoleRefreshMs: number;
}

/** Pages in menu order; the first one is also served at "/" */
export function createPages({ consoleRefreshMs }: PageOptions): PageProvider[] {
  return [
    { path: '/page_console', label: 'Console', layout: () => <ConsolePage refreshMs={consoleRefreshMs} /> },
    { path: '/page_setup', label: 'Setup', layout: () => <SetupPage /> },
    { path: '/page_schedule', label: 'Schedule', layout: () => <SchedulePage /> },
    { path: '/page_db_browser', label: 'DB', layout: () => <DbBrowserPage /> },
    { path: '/page_db_query', label: 'Query', layout: () => <DbQueryPage /> },
  ];
}
