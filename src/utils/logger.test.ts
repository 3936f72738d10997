import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, formatContext, setDebug, setSink } from './logger.js';

function capture(): string[] {
  const lines: string[] = [];
  setSink((line) => lines.push(line));
  return lines;
}

afterEach(() => {
  setSink(null);
  setDebug(false);
  vi.useRealTimers();
});

describe('formatContext', () => {
  it('writes fields as key=value and quotes values that need it', () => {
    expect(
      formatContext({ path: 'a b.txt', step: 2, ok: true, skipped: undefined, none: null, empty: '' })
    ).toBe(' path="a b.txt" step=2 ok=true none=null empty=""');
  });

  it('is empty without fields', () => {
    expect(formatContext()).toBe('');
    expect(formatContext({ unset: undefined })).toBe('');
  });
});

describe('createLogger', () => {
  it('tags lines with the scope and level', () => {
    const lines = capture();
    createLogger('config').warn('Ignoring config', { path: '/tmp/gitfold.json' });
    expect(lines).toEqual(['[gitfold config warn] Ignoring config path=/tmp/gitfold.json']);
  });

  it('only writes debug lines once debugging is on', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
    const lines = capture();
    const log = createLogger('git');

    log.debug('read', { command: 'status' });
    expect(lines).toEqual([]);

    setDebug(true);
    log.debug('read', { command: 'status' });
    expect(lines).toEqual(['[gitfold git debug 2026-01-02T03:04:05.000Z] read command=status']);
  });

  it('appends the error message', () => {
    const lines = capture();
    const log = createLogger('app');
    log.error('Event handler failed', new Error('boom'));
    log.error('Event handler failed', 'plain', { key: 'j' });
    expect(lines).toEqual([
      '[gitfold app error] Event handler failed: boom',
      '[gitfold app error] Event handler failed: plain key=j',
    ]);
  });
});
