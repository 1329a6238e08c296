import { useMemo } from 'react';
import { Navbar } from './components/Navbar';
import { PageErrorBoundary } from './components/PageErrorBoundary';
import { DASHBOARD_TITLE, DEFAULT_CONSOLE_REFRESH_MS } from './config/constants';
import { useDashboardConfig } from './hooks/useDashboardConfig';
import { useSystemTimer } from './hooks/useSystemTimer';
import { createPages } from './pages';
import { createPageRegistry, resolvePage } from './router/page-router';
import { navigate, usePathname } from './router/usePathname';
import './App.css';

function App() {
  const pathname = usePathname();
  const { data: config, error: configError } = useDashboardConfig();
  const timer = useSystemTimer(config?.timerIntervalMs ?? null);

  const consoleRefreshMs = config?.consoleRefreshMs ?? DEFAULT_CONSOLE_REFRESH_MS;
  const pages = useMemo(() => createPages({ consoleRefreshMs }), [consoleRefreshMs]);
  const registry = useMemo(() => createPageRegistry(pages), [pages]);
  const links = pages.map(({ path, label }) => ({ path, label }));

  const { content, navbar } = resolvePage(pathname, registry);
  const activePath = pathname === '/' ? registry.defaultPath : pathname;
  const showGlobalError = configError || timer.error;

  return (
    <div className="min-h-screen bg-base-200">
      <Navbar
        variant={navbar}
        title={config?.title ?? DASHBOARD_TITLE}
        links={links}
        activePath={activePath}
        onNavigate={navigate}
      />

      <main className="container mx-auto p-6 space-y-6" data-testid="page-content">
        {showGlobalError && (
          <div className="alert alert-error">
            <span>{showGlobalError}</span>
          </div>
        )}

        <PageErrorBoundary key={pathname}>{content}</PageErrorBoundary>
      </main>

      <footer className="text-xs text-base-content/50 p-2 text-right" data-testid="timer-status">
        Timer tick {timer.n}
      </footer>
    </div>
  );
}

export default App;
