import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, it, expect, vi } from 'vitest';
import { Navbar } from './Navbar';

const links = [
  { path: '/page_console', label: 'Console' },
  { path: '/page_setup', label: 'Setup' },
];

describe('Navbar', () => {
  it('renders the brand and every menu link', () => {
    render(
      <Navbar variant="with-menu" title="Bagfiles Capturer" links={links} activePath="/page_setup" onNavigate={vi.fn()} />
    );

    expect(screen.getByRole('link', { name: 'Bagfiles Capturer' })).toHaveAttribute('href', '/');
    expect(screen.getByRole('link', { name: 'Console' })).toHaveAttribute('href', '/page_console');
    expect(screen.getByRole('link', { name: 'Setup' })).toHaveAttribute('aria-current', 'page');
    expect(screen.getByRole('link', { name: 'Console' })).not.toHaveAttribute('aria-current');
    expect(screen.getByRole('navigation')).toHaveAttribute('data-variant', 'with-menu');
  });

  it('navigates client-side on click', async () => {
    const onNavigate = vi.fn();
    render(
      <Navbar variant="with-menu" title="Bagfiles Capturer" links={links} activePath="/" onNavigate={onNavigate} />
    );

    await userEvent.click(screen.getByRole('link', { name: 'Setup' }));
    await userEvent.click(screen.getByRole('link', { name: 'Bagfiles Capturer' }));

    expect(onNavigate.mock.calls).toEqual([['/page_setup'], ['/']]);
  });
});
