import { describe, it, expect } from 'vitest';
import { LogRing, createLogger } from './logger';

describe('LogRing', () => {
  it('parses pino records and keeps the component binding', () => {
    const ring = new LogRing();
    ring.write('{"level":40,"time":1700000000000,"component":"watcher","msg":"retrying"}\n');
    expect(ring.entries()).toEqual([
      { time: 1700000000000, level: 'warn', component: 'watcher', msg: 'retrying' },
    ]);
  });

  it('appends the error message of serialized errors', () => {
    const ring = new LogRing();
    ring.write('{"level":50,"time":1,"msg":"watch failed","err":{"message":"connection refused"}}');
    expect(ring.entries()[0].msg).toBe('watch failed: connection refused');
    expect(ring.entries()[0].level).toBe('error');
  });

  it('drops the oldest records beyond capacity', () => {
    const ring = new LogRing(2);
    ring.push({ time: 1, level: 'info', msg: 'a' });
    ring.push({ time: 2, level: 'info', msg: 'b' });
    ring.push({ time: 3, level: 'info', msg: 'c' });
    expect(ring.entries().map((e) => e.msg)).toEqual(['b', 'c']);
    expect(ring.version).toBe(3);
  });

  it('keeps non-JSON lines as info text', () => {
    const ring = new LogRing();
    ring.write('plain text');
    expect(ring.entries()[0].level).toBe('info');
    expect(ring.entries()[0].msg).toBe('plain text');
  });
});

describe('createLogger', () => {
  it('writes records into the ring with child bindings', () => {
    const ring = new LogRing();
    const log = createLogger({ level: 'debug', ring }).child({ component: 'informer' });
    log.debug('resync');
    log.error({ err: new Error('boom') }, 'watch failed');

    const entries = ring.entries();
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'debug', component: 'informer', msg: 'resync' });
    expect(entries[1]).toMatchObject({ level: 'error', msg: 'watch failed: boom' });
  });

  it('respects the configured level', () => {
    const ring = new LogRing();
    const log = createLogger({ level: 'warn', ring });
    log.info('hidden');
    log.warn('shown');
    expect(ring.entries().map((e) => e.msg)).toEqual(['shown']);
  });
});
