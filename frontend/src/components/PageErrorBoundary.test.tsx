import { render, screen } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import { PageErrorBoundary } from './PageErrorBoundary';

function Broken(): JSX.Element {
  throw new Error('render failed');
}

describe('PageErrorBoundary', () => {
  it('renders its children', () => {
    render(
      <PageErrorBoundary>
        <p>page body</p>
      </PageErrorBoundary>
    );

    expect(screen.getByText('page body')).toBeInTheDocument();
  });

  it('logs render errors and renders nothing', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const { container } = render(
      <div data-testid="shell">
        <PageErrorBoundary>
          <Broken />
        </PageErrorBoundary>
      </div>
    );

    expect(screen.getByTestId('shell')).toBeEmptyDOMElement();
    expect(container).toContainElement(screen.getByTestId('shell'));
    expect(errorSpy).toHaveBeenCalledWith('Page render failed:', expect.any(Error), expect.any(String));
  });
});
