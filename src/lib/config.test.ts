import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '@/lib/config';

describe('resolveConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads overrides and trims them', () => {
    const config = resolveConfig({
      VITE_READER_BACKEND: 'readium',
      VITE_DEFAULT_PUBLICATION_URL: '  http://localhost:15080/book.epub  ',
      VITE_READIUM_SCRIPT_URL: 'http://localhost:15080/navigator.js'
    });

    expect(config.backend).toBe('readium');
    expect(config.defaultPublicationUrl).toBe('http://localhost:15080/book.epub');
    expect(config.readiumScriptUrl).toBe('http://localhost:15080/navigator.js');
    expect(config.epubjsScriptUrl).toBe(DEFAULT_CONFIG.epubjsScriptUrl);
  });

  it('ignores unknown backends and blank values', () => {
    const config = resolveConfig({
      VITE_READER_BACKEND: 'pdfjs',
      VITE_EPUBJS_SCRIPT_URL: '   ',
      DEV: true
    });

    expect(config.backend).toBe('epubjs');
    expect(config.epubjsScriptUrl).toBe(DEFAULT_CONFIG.epubjsScriptUrl);
  });
});
