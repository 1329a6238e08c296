import { describe, it, expect, vi } from 'vitest';
import { NOT_FOUND_MESSAGE, createPageRegistry, resolvePage, type PageProvider } from './page-router';

function provider(path: string, content: string): PageProvider {
  return { path, label: path, layout: vi.fn(() => content) };
}

describe('resolvePage', () => {
  const console_ = provider('/page_console', 'console');
  const setup = provider('/page_setup', 'setup');
  const schedule = provider('/page_schedule', 'schedule');
  const dbBrowser = provider('/page_db_browser', 'db browser');
  const dbQuery = provider('/page_db_query', 'db query');
  const registry = createPageRegistry([console_, setup, schedule, dbBrowser, dbQuery]);

  it.each([
    ['/page_console', 'console'],
    ['/page_setup', 'setup'],
    ['/page_schedule', 'schedule'],
    ['/page_db_browser', 'db browser'],
    ['/page_db_query', 'db query'],
  ])('should dispatch %s to its provider with the full menu', (path, content) => {
    expect(resolvePage(path, registry)).toEqual({ content, navbar: 'with-menu' });
  });

  it('should serve the console for the root path', () => {
    expect(resolvePage('/', registry)).toEqual(resolvePage('/page_console', registry));
  });

  it('should return the not-found message for unknown paths', () => {
    expect(resolvePage('/page_unknown', registry)).toEqual({
      content: '404 Page Error! Please choose a link',
      navbar: 'with-menu',
    });
    expect(resolvePage('/page_console/extra', registry).content).toBe(NOT_FOUND_MESSAGE);
  });

  it('should call only the matching provider', () => {
    vi.mocked(setup.layout).mockClear();
    vi.mocked(schedule.layout).mockClear();

    resolvePage('/page_setup', registry);

    expect(setup.layout).toHaveBeenCalledTimes(1);
    expect(schedule.layout).not.toHaveBeenCalled();
  });

  it('should log and return no content when a provider throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken: PageProvider = {
      path: '/page_broken',
      label: 'Broken',
      layout: () => {
        throw new Error('layout failed');
      },
    };

    const result = resolvePage('/page_broken', createPageRegistry([broken]));

    expect(result).toEqual({ content: null, navbar: 'with-menu' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('Failed to build page /page_broken:');
  });
});

describe('createPageRegistry', () => {
  it('should default to the first provider', () => {
    const registry = createPageRegistry([provider('/a', 'a'), provider('/b', 'b')]);

    expect(registry.defaultPath).toBe('/a');
  });

  it('should reject duplicate paths', () => {
    expect(() => createPageRegistry([provider('/a', 'a'), provider('/a', 'again')])).toThrow(
      'Duplicate page path: /a'
    );
  });

  it('should reject an unregistered default', () => {
    expect(() => createPageRegistry([provider('/a', 'a')], '/missing')).toThrow(
      'Default page is not registered: /missing'
    );
    expect(() => createPageRegistry([])).toThrow('Default page is not registered: undefined');
  });
});
