// =============================================================================
// Lumen Harbor Web — AppShell layout
// Sidebar nav + topbar + scrollable content. The "Need help now?" button lives
// in the topbar on every page and is the only way the safety sheet opens.
// =============================================================================

import { useCallback, useState } from 'react';
import { NavLink, Outlet, useLocation } from 'react-router-dom';
import { useExperienceMode } from '../stores/experience.js';
import { SafetySheet } from './SafetySheet.js';

const NAV_ITEMS = [
  { path: '/',        icon: '🏠', label: 'Home' },
  { path: '/talk',    icon: '💬', label: 'Talk' },
  { path: '/mood',    icon: '🌤', label: 'Mood' },
  { path: '/journal', icon: '📓', label: 'Journal' },
  { path: '/more',    icon: '⋯',  label: 'More' },
] as const;

export function AppShell() {
  const { mode } = useExperienceMode();
  const location = useLocation();
  const [safetyOpen, setSafetyOpen] = useState(false);

  const closeSafety = useCallback(() => setSafetyOpen(false), []);

  const current = NAV_ITEMS.find((item) => item.path === location.pathname);

  return (
    <div className="app">
      {/* ════════ SIDEBAR ════════ */}
      <aside className="sidebar">
        <div className="sidebar-brand">
          <div className="brand-name">Lumen <em>Harbor</em></div>
          <div className="brand-role">{mode === 'gentle' ? 'Gentle mode' : 'Structured mode'}</div>
        </div>

        <nav className="nav-section">
          {NAV_ITEMS.map((item) => (
            <NavLink
              key={item.path}
              to={item.path}
              end={item.path === '/'}
              className={({ isActive }) => `nav-item${isActive ? ' active' : ''}`}
            >
              <span className="nav-icon">{item.icon}</span>
              {item.label}
            </NavLink>
          ))}
        </nav>
      </aside>

      {/* ════════ MAIN ════════ */}
      <div className="main">
        <div className="topbar">
          <div className="topbar-title">{current?.label ?? 'Lumen Harbor'}</div>
          <div className="topbar-spacer" />
          <button
            className="topbar-btn safety"
            onClick={() => setSafetyOpen(true)}
            aria-haspopup="dialog"
            data-testid="safety-open"
          >
            Need help now?
          </button>
        </div>

        <div className="content">
          <Outlet />
        </div>
      </div>

      <SafetySheet open={safetyOpen} onClose={closeSafety} />
    </div>
  );
}
