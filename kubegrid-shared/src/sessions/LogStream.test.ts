import { describe, it, expect, vi } from 'vitest';
import type { Writable } from 'stream';
import { LogStream, logBackoffMs, parseLogLine, reconnectSinceSeconds } from './LogStream';
import type { LogOptions, LogSource } from '../cluster/types';
import type { AppEvent } from '../events/types';

interface OpenedStream {
  container: string;
  options: LogOptions;
  sink: Writable;
  stopped: boolean;
}

class FakeLogSource implements LogSource {
  containers = ['app', 'sidecar'];
  opened: OpenedStream[] = [];
  failures = 0;

  async podContainers(): Promise<string[]> {
    return this.containers;
  }

  async streamLogs(_pod: string, _ns: string, container: string, options: LogOptions, sink: Writable) {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('pod not found');
    }
    const stream: OpenedStream = { container, options, sink, stopped: false };
    this.opened.push(stream);
    return { stop: () => { stream.stopped = true; } };
  }
}

function collect() {
  const events: AppEvent[] = [];
  return { events, target: { paneId: 5, seq: 2, send: (e: AppEvent) => { events.push(e); } } };
}

describe('parseLogLine', () => {
  it('splits an RFC 3339 timestamp prefix', () => {
    expect(parseLogLine('2024-01-15T10:30:00.123456789Z hello world')).toEqual({
      timestamp: '2024-01-15T10:30:00.123456789Z',
      content: 'hello world',
    });
  });

  it('leaves lines without a timestamp alone', () => {
    expect(parseLogLine('not-a-timestamp some content')).toEqual({ timestamp: null, content: 'not-a-timestamp some content' });
    expect(parseLogLine('')).toEqual({ timestamp: null, content: '' });
  });
});

describe('log reconnect helpers', () => {
  it('backs off exponentially up to 30s', () => {
    expect([0, 1, 2, 3, 4, 5, 10].map(logBackoffMs)).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
  });

  it('asks for the time since the last line plus one second', () => {
    expect(reconnectSinceSeconds(null, 10_000)).toBeUndefined();
    expect(reconnectSinceSeconds(7_000, 10_000)).toBe(4);
  });
});

describe('LogStream', () => {
  it('streams the first container and posts complete lines', async () => {
    const source = new FakeLogSource();
    const { events, target } = collect();
    const stream = new LogStream(source, { pod: 'web-1', namespace: 'default', tailLines: 100 }, target, { batchMs: 0 });
    stream.start();
    await vi.waitFor(() => expect(source.opened).toHaveLength(1));

    const [opened] = source.opened;
    expect(opened.container).toBe('app');
    expect(opened.options).toEqual({ follow: true, tailLines: 100, sinceSeconds: undefined, timestamps: false });
    expect(stream.status).toBe('streaming');

    opened.sink.write('first\nsec');
    await vi.waitFor(() => expect(events).toHaveLength(1));
    opened.sink.write('ond\r\n');
    await vi.waitFor(() => expect(events).toHaveLength(2));
    expect(events).toEqual([
      { type: 'log-lines', paneId: 5, seq: 2, lines: ['first'] },
      { type: 'log-lines', paneId: 5, seq: 2, lines: ['second'] },
    ]);
    stream.stop();
    expect(opened.stopped).toBe(true);
  });

  it('flushes the trailing partial line when a one-shot stream ends', async () => {
    const source = new FakeLogSource();
    const { events, target } = collect();
    const stream = new LogStream(source, { pod: 'job-1', namespace: 'ci', container: 'runner', follow: false }, target, { batchMs: 0 });
    stream.start();
    await vi.waitFor(() => expect(source.opened).toHaveLength(1));

    source.opened[0].sink.end('done');
    await vi.waitFor(() => expect(stream.status).toBe('stopped'));
    expect(source.opened[0].container).toBe('runner');
    expect(events).toEqual([{ type: 'log-lines', paneId: 5, seq: 2, lines: ['done'] }]);
  });

  it('batches lines inside the window', async () => {
    const source = new FakeLogSource();
    const { events, target } = collect();
    const stream = new LogStream(source, { pod: 'web-1', namespace: 'default' }, target, { batchMs: 20 });
    stream.start();
    await vi.waitFor(() => expect(source.opened).toHaveLength(1));

    source.opened[0].sink.write('a\n');
    source.opened[0].sink.write('b\n');
    await vi.waitFor(() => expect(events).toHaveLength(1));
    expect(events[0]).toEqual({ type: 'log-lines', paneId: 5, seq: 2, lines: ['a', 'b'] });
    stream.stop();
  });

  it('reports an error after repeated failures', async () => {
    const source = new FakeLogSource();
    source.failures = 10;
    const { events, target } = collect();
    const stream = new LogStream(source, { pod: 'gone', namespace: 'default' }, target, {
      batchMs: 0,
      maxFailures: 3,
      backoffMs: () => 1,
    });
    stream.start();

    await vi.waitFor(() => expect(stream.status).toBe('error'));
    expect(events).toEqual([{ type: 'log-error', paneId: 5, seq: 2, message: 'Log stream failed: pod not found' }]);
    expect(source.failures).toBe(7);
  });

  it('reconnects after a followed stream ends, asking only for new lines', async () => {
    const source = new FakeLogSource();
    const { events, target } = collect();
    let now = 50_000;
    const stream = new LogStream(source, { pod: 'web-1', namespace: 'default', tailLines: 10 }, target, {
      batchMs: 0,
      backoffMs: () => 1,
      now: () => now,
    });
    stream.start();
    await vi.waitFor(() => expect(source.opened).toHaveLength(1));

    source.opened[0].sink.write('line\n');
    await vi.waitFor(() => expect(events).toHaveLength(1));
    now = 52_500;
    source.opened[0].sink.end();

    await vi.waitFor(() => expect(source.opened).toHaveLength(2));
    expect(source.opened[1].options.tailLines).toBe(10);
    expect(source.opened[1].options.sinceSeconds).toBe(3);
    stream.stop();
  });
});
