/**
 * Formatting utilities tests
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  formatConfigDisplay,
  formatDuration,
  formatPhaseProgress,
  formatQuestion,
} from '../progress/formatters.js';

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(8000)).toBe('8.0s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(60000)).toBe('1m 0s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('formatPhaseProgress', () => {
  it('should show the counter alone during the first second', () => {
    expect(formatPhaseProgress('Composing questions', 3, 30, 999)).toBe('Composing questions... 3/30');
  });

  it('should add the elapsed time after a second', () => {
    expect(formatPhaseProgress('Composing questions', 12, 30, 2500)).toBe(
      'Composing questions... 12/30 (2.5s)',
    );
  });
});

describe('formatQuestion', () => {
  it('should number from one and show the source underneath', () => {
    expect(formatQuestion(0, 'What breaks first?', 'https://example.com/a')).toEqual([
      'Q1. What breaks first?',
      '    https://example.com/a',
    ]);
  });

  it('should hide the local fallback source', () => {
    expect(formatQuestion(9, 'Describe a trade-off.', 'local_fallback')).toEqual([
      'Q10. Describe a trade-off.',
    ]);
  });
});

describe('formatConfigDisplay', () => {
  it('should list the resolved settings', () => {
    const display = formatConfigDisplay(DEFAULT_CONFIG);

    expect(display).toContain('  Default count: 40');
    expect(display).toContain('  Batch size: 15');
    expect(display).toContain('  Timeout: 8.0s');
    expect(display).toContain('  Database: quarry.db');
    expect(display).toContain('  Extra curated topics: none');
  });
});
