import { Link } from 'react-router-dom';

export function NotFoundPage() {
  return (
    <div className="page narrow" style={{ alignItems: 'center', textAlign: 'center', paddingTop: 64 }}>
      <h2 style={{ fontSize: 48, margin: '0 0 16px' }}>404</h2>
      <p className="muted">This page doesn’t exist.</p>
      <Link to="/" style={{ color: 'var(--safe)', marginTop: 16 }}>
        Back to home
      </Link>
    </div>
  );
}
