import type { ReactNode } from 'react';

/** Navigation bar variant rendered above the page content */
export type NavbarVariant = 'with-menu';

export const NOT_FOUND_MESSAGE = '404 Page Error! Please choose a link';

export interface PageProvider {
  path: string;
  label: string;
  layout(): ReactNode;
}

export interface PageRegistry {
  pages: ReadonlyMap<string, PageProvider>;
  /** Path served for "/" */
  defaultPath: string;
}

export interface ResolvedPage {
  content: ReactNode;
  navbar: NavbarVariant;
}

export function createPageRegistry(providers: PageProvider[], defaultPath?: string): PageRegistry {
  const pages = new Map<string, PageProvider>();

  for (const provider of providers) {
    if (pages.has(provider.path)) {
      throw new Error(`Duplicate page path: ${provider.path}`);
    }
    pages.set(provider.path, provider);
  }

  const fallback = defaultPath ?? providers[0]?.path;
  if (fallback === undefined || !pages.has(fallback)) {
    throw new Error(`Default page is not registered: ${String(fallback)}`);
  }

  return { pages, defaultPath: fallback };
}

/**
 * Map a URL path to page content. Unknown paths get the not-found message;
 * a provider that throws yields no content. Every case keeps the full menu.
 */
export function resolvePage(pathname: string, registry: PageRegistry): ResolvedPage {
  const path = pathname === '/' ? registry.defaultPath : pathname;
  const provider = registry.pages.get(path);

  if (!provider) {
    return { content: NOT_FOUND_MESSAGE, navbar: 'with-menu' };
  }

  try {
    return { content: provider.layout(), navbar: 'with-menu' };
  } catch (error) {
    console.error(`Failed to build page ${path}:`, error);
    return { content: null, navbar: 'with-menu' };
  }
}
