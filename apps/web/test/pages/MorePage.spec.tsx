import { describe, expect, it, vi } from 'vitest';
import { STORAGE_KEYS } from '@lumen-harbor/shared';
import { MorePage } from '../../src/pages/MorePage.js';
import { createMemoryStore } from '../../src/stores/storage.js';
import { renderWithProviders } from '../fixtures/app.js';
import { jsonResponse, stubFetch } from '../fixtures/fetch.js';
import { click, flush, getButton, getField, query, text } from '../fixtures/render.js';

const EXPORT = 'GET /api/v2/export/text';

describe('MorePage', () => {
  it('should switch and persist the experience mode', () => {
    const store = createMemoryStore();
    renderWithProviders(<MorePage />, { store });

    expect(text('mode-hint')).toBe('Fewer details, softer prompts.');
    expect(getButton('segment-gentle').getAttribute('aria-pressed')).toBe('true');

    click(getButton('segment-structured'));

    expect(text('mode-hint')).toBe('More detail: averages, tags and labels.');
    expect(getButton('segment-structured').getAttribute('aria-pressed')).toBe('true');
    expect(store.get(STORAGE_KEYS.experienceMode)).toBe('"structured"');
  });

  it('should show the exported text', async () => {
    stubFetch({ [EXPORT]: () => jsonResponse({ ok: true, text: 'Mood 7: Calm' }) });
    renderWithProviders(<MorePage />);

    expect(query('export-text')).toBeNull();
    click(getButton('export-button'));
    await flush();

    expect(getField('export-text').value).toBe('Mood 7: Calm');
    expect(query('export-error')).toBeNull();
  });

  it('should report a failed export', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    stubFetch({ [EXPORT]: () => jsonResponse({ error: 'Server unavailable' }, 500) });
    renderWithProviders(<MorePage />);

    click(getButton('export-button'));
    await flush();

    expect(text('export-error')).toBe('Could not export right now.');
    expect(query('export-text')).toBeNull();
    expect(getButton('export-button').disabled).toBe(false);
  });
});
