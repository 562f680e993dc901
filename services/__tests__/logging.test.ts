import { describe, expect, it, vi } from 'vitest';
import { WallspanError } from '../../core/layout';
import { LogStatus } from '../../types';
import { createConsoleReporter, formatLogEntry } from '../consoleReporter';
import { mapWallspanErrorToLogEntry, mapWallspanEventToLogEntry } from '../logAdapter';

describe('mapWallspanEventToLogEntry', () => {
  it('keeps the phase, code, metrics and timing', () => {
    const entry = mapWallspanEventToLogEntry({
      phase: 'composite',
      level: 'info',
      code: 'COMPOSITE_DONE',
      message: 'Combined image complete.',
      metrics: { ms: '12.5' },
    });
    expect(entry.id).toMatch(/^composite-\d+$/);
    expect(entry).toMatchObject({
      stepId: 'composite.COMPOSITE_DONE',
      title: 'Combined image complete.',
      status: LogStatus.Ok,
      ms: 12.5,
      metrics: [{ label: 'ms', value: '12.5' }],
      description: 'COMPOSITE_DONE',
    });
  });

  it('maps warning levels', () => {
    const entry = mapWallspanEventToLogEntry({ phase: 'select', level: 'warn', code: 'X', message: 'careful' });
    expect(entry.status).toBe(LogStatus.Warn);
    expect(entry.ms).toBe(0);
    expect(entry.metrics).toEqual([]);
  });

  it('gives every entry its own id', () => {
    const event = { phase: 'run' as const, level: 'info' as const, code: 'A', message: 'a' };
    expect(mapWallspanEventToLogEntry(event).id).not.toBe(mapWallspanEventToLogEntry(event).id);
  });
});

describe('mapWallspanErrorToLogEntry', () => {
  it('carries the error code and details', () => {
    const entry = mapWallspanErrorToLogEntry(
      new WallspanError('PATH_NOT_FOUND', 'Path does not exist: /nowhere', { path: '/nowhere' }),
      'run.error',
    );
    expect(entry).toMatchObject({
      stepId: 'run.error',
      title: 'Path does not exist: /nowhere',
      status: LogStatus.Error,
      metrics: [
        { label: 'code', value: 'PATH_NOT_FOUND' },
        { label: 'path', value: '/nowhere' },
      ],
      description: 'PATH_NOT_FOUND',
    });
  });

  it('wraps anything else as unexpected', () => {
    expect(mapWallspanErrorToLogEntry(new Error('boom'), 'run.error')).toMatchObject({
      title: 'Unexpected error',
      description: 'boom',
    });
    expect(mapWallspanErrorToLogEntry('nope', 'run.error').description).toBe('nope');
  });
});

describe('console reporter', () => {
  it('formats errors with their code', () => {
    const entry = mapWallspanErrorToLogEntry(
      new WallspanError('PATH_NOT_FOUND', 'Path does not exist: /nowhere', { path: '/nowhere' }),
      'run.error',
    );
    expect(formatLogEntry(entry)).toBe('Error in wallspan: Path does not exist: /nowhere [PATH_NOT_FOUND]');
  });

  it('formats warnings with their metrics', () => {
    const entry = mapWallspanEventToLogEntry({
      phase: 'run',
      level: 'warn',
      code: 'WRITE_FAILED',
      message: 'Could not save.',
      metrics: { reason: 'disk full', attempt: 1 },
    });
    expect(formatLogEntry(entry)).toBe('Warning from wallspan: Could not save. (reason=disk full, attempt=1)');
  });

  it('prints progress only when verbose', () => {
    const info = mapWallspanEventToLogEntry({ phase: 'run', level: 'info', code: 'WRITE', message: 'Writing.' });
    const warn = mapWallspanEventToLogEntry({ phase: 'run', level: 'warn', code: 'SLOW', message: 'Slow.' });

    const out = vi.fn();
    const err = vi.fn();
    const quiet = createConsoleReporter({ verbose: false, out, err });
    quiet(info);
    quiet(warn);
    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledWith('Warning from wallspan: Slow.');

    const loud = createConsoleReporter({ verbose: true, out, err });
    loud(info);
    expect(out).toHaveBeenCalledWith('Writing.');
  });
});
