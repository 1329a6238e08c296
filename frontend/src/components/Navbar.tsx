import type { MouseEvent } from 'react';
import type { NavbarVariant } from '../router/page-router';

export interface NavLink {
  path: string;
  label: string;
}

interface NavbarProps {
  variant: NavbarVariant;
  title: string;
  links: NavLink[];
  activePath: string;
  onNavigate: (path: string) => void;
}

export function Navbar({ variant, title, links, activePath, onNavigate }: NavbarProps) {
  const handleClick = (path: string) => (event: MouseEvent<HTMLAnchorElement>) => {
    // Let modified clicks open a new tab
    if (event.metaKey || event.ctrlKey || event.shiftKey || event.button !== 0) {
      return;
    }
    event.preventDefault();
    onNavigate(path);
  };

  return (
    <nav className="navbar bg-base-100 shadow-lg" data-variant={variant}>
      <div className="flex-1">
        <a href="/" className="btn btn-ghost text-xl" onClick={handleClick('/')}>
          {title}
        </a>
      </div>
      <ul className="menu menu-horizontal flex-none">
        {links.map(link => (
          <li key={link.path}>
            <a
              href={link.path}
              className={link.path === activePath ? 'active' : undefined}
              aria-current={link.path === activePath ? 'page' : undefined}
              onClick={handleClick(link.path)}
            >
              {link.label}
            </a>
          </li>
        ))}
      </ul>
    </nav>
  );
}
