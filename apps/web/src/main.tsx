import './styles/main.css';
import * as Sentry from '@sentry/react';
import type { ErrorEvent } from '@sentry/react';
import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { QueryClientProvider } from '@tanstack/react-query';
import { ReactQueryDevtools } from '@tanstack/react-query-devtools';
import { BrowserRouter } from 'react-router-dom';
import { App } from './App.js';
import { config } from './config.js';
import { createQueryClient } from './queryClient.js';
import { ExperienceModeProvider } from './stores/experience.js';

// Initialise Sentry before any React render (no-op if VITE_SENTRY_DSN is absent)
if (config.sentryDsn) {
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.mode,
    ...(config.sentryRelease ? { release: config.sentryRelease } : {}),
    tracesSampleRate: config.isProd ? 0.1 : 1.0,
    // Journal text, plans and chat must never leave in a report
    beforeSend(event: ErrorEvent) {
      if (event.request) {
        delete event.request.data;
        delete event.request.cookies;
        if (event.request.headers) {
          delete event.request.headers['authorization'];
          delete event.request.headers['cookie'];
        }
      }
      return event;
    },
  });
}

const queryClient = createQueryClient();

const rootEl = document.getElementById('root');
if (!rootEl) throw new Error('Root element #root not found');

createRoot(rootEl).render(
  <StrictMode>
    <Sentry.ErrorBoundary fallback={<p style={{ padding: 32 }}>Something went wrong. Please reload the page.</p>}>
      <QueryClientProvider client={queryClient}>
        <ExperienceModeProvider>
          <BrowserRouter>
            <App />
          </BrowserRouter>
        </ExperienceModeProvider>
        {config.isDev && <ReactQueryDevtools initialIsOpen={false} />}
      </QueryClientProvider>
    </Sentry.ErrorBoundary>
  </StrictMode>,
);
