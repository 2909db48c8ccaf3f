/**
 * Local TCP listeners tunnelling to pod ports.
 *
 * Each accepted connection opens its own port-forward stream to the pod.
 */

import * as net from 'net';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { dig, num, records, str } from '../cluster/objects';
import type { PortForwardSource } from '../cluster/types';
import type { AppEvent, PortForwardInfo } from '../events/types';

const log = getLogger('port-forward');

const PREFERRED_PORTS = [80, 8080, 8000, 3000, 5000];

/** Best guess at the pod port to forward: a port named like http/web, then common ports, then the first. */
export function suggestRemotePort(pod: unknown): number {
  const ports: Array<{ port: number; name: string }> = [];
  for (const container of records(dig(pod, 'spec', 'containers'))) {
    for (const p of records(container.ports)) {
      const port = num(p.containerPort);
      if (port > 0 && port <= 65535) ports.push({ port, name: str(p.name) });
    }
  }
  if (ports.length === 0) return 80;
  const named = ports.find((p) => p.name.includes('http') || p.name.includes('web'));
  if (named) return named.port;
  const common = PREFERRED_PORTS.find((preferred) => ports.some((p) => p.port === preferred));
  return common ?? ports[0].port;
}

export type PortInput = { ok: true; local: number; remote: number } | { ok: false; error: string };

/** Local may be 0 (any free port); remote must be a real port. */
export function parsePortInput(local: string, remote: string): PortInput {
  const localText = local.trim();
  const localPort = localText === '' ? 0 : Number(localText);
  if (!Number.isInteger(localPort) || localPort < 0 || localPort > 65535) {
    return { ok: false, error: 'Local port must be 0-65535' };
  }
  const remotePort = Number(remote.trim());
  if (remote.trim() === '' || !Number.isInteger(remotePort) || remotePort < 1 || remotePort > 65535) {
    return { ok: false, error: 'Remote port must be 1-65535' };
  }
  return { ok: true, local: localPort, remote: remotePort };
}

interface ActiveForward {
  info: PortForwardInfo;
  server: net.Server;
  sockets: Set<net.Socket>;
}

export class PortForwardRegistry {
  private readonly forwards = new Map<number, ActiveForward>();
  private nextId = 1;

  constructor(
    private source: PortForwardSource | null,
    private readonly send: (event: AppEvent) => void,
    private readonly now: () => number = Date.now,
  ) {}

  setSource(source: PortForwardSource | null): void {
    this.source = source;
  }

  /** Newest first. */
  list(): PortForwardInfo[] {
    return [...this.forwards.values()].map((f) => f.info).sort((a, b) => b.startedAt - a.startedAt || b.id - a.id);
  }

  find(pod: string, namespace: string): PortForwardInfo | undefined {
    return this.list().find((info) => info.pod === pod && info.namespace === namespace);
  }

  get size(): number {
    return this.forwards.size;
  }

  async start(pod: string, namespace: string, localPort: number, remotePort: number): Promise<PortForwardInfo> {
    const source = this.source;
    if (!source) throw new Error('No cluster connection');

    const server = net.createServer();
    const sockets = new Set<net.Socket>();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(localPort, '127.0.0.1', () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    const info: PortForwardInfo = {
      id: this.nextId++,
      pod,
      namespace,
      localPort: address !== null && typeof address === 'object' ? address.port : localPort,
      remotePort,
      startedAt: this.now(),
    };

    server.on('connection', (socket) => {
      sockets.add(socket);
      socket.on('close', () => sockets.delete(socket));
      socket.on('error', (err) => log.debug({ id: info.id, err: err.message }, 'client socket error'));
      source.forwardSocket(pod, namespace, remotePort, socket).catch((err: unknown) => {
        log.warn({ id: info.id, pod, err: errorMessage(err) }, 'forward connection failed');
        socket.destroy();
        this.send({ type: 'toast', level: 'error', message: `Port-forward ${pod}:${remotePort}: ${errorMessage(err)}` });
      });
    });
    server.on('error', (err) => {
      log.error({ id: info.id, err: err.message }, 'listener failed');
      this.stop(info.id, err.message);
    });

    this.forwards.set(info.id, { info, server, sockets });
    log.info({ ...info }, 'port-forward started');
    this.send({ type: 'port-forward-started', forward: info });
    return info;
  }

  stop(id: number, reason?: string): boolean {
    const forward = this.forwards.get(id);
    if (!forward) return false;
    this.forwards.delete(id);
    for (const socket of forward.sockets) socket.destroy();
    forward.server.close();
    log.info({ id, reason }, 'port-forward stopped');
    this.send({ type: 'port-forward-stopped', id, reason });
    return true;
  }

  stopAll(): void {
    for (const id of [...this.forwards.keys()]) this.stop(id);
  }
}
