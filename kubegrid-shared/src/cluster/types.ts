/**
 * Narrow interfaces over the cluster client. Producers depend on these so
 * tests can substitute in-process fakes.
 */

import type { Readable, Writable } from 'stream';
import type { ResourceKind } from './resourceKinds';

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED' | 'BOOKMARK' | 'ERROR';

export interface ResourceListing {
  items: unknown[];
  resourceVersion?: string;
}

export interface Subscription {
  stop(): void;
}

export interface WatchCallbacks {
  onEvent: (type: WatchEventType, object: unknown) => void;
  /** Called once when the stream ends; `err` is null for a clean close. */
  onDone: (err: unknown) => void;
}

/** List + watch of one resource collection. Empty namespace means all namespaces. */
export interface ResourceSource {
  listResources(kind: ResourceKind, namespace: string): Promise<ResourceListing>;
  watchResources(
    kind: ResourceKind,
    namespace: string,
    resourceVersion: string | undefined,
    callbacks: WatchCallbacks,
  ): Promise<Subscription>;
}

export interface LogOptions {
  follow: boolean;
  tailLines?: number;
  sinceSeconds?: number;
  timestamps?: boolean;
}

export interface LogSource {
  podContainers(pod: string, namespace: string): Promise<string[]>;
  streamLogs(pod: string, namespace: string, container: string, options: LogOptions, sink: Writable): Promise<Subscription>;
}

export interface ExecIo {
  stdout: Writable;
  stderr: Writable;
  stdin: Readable | null;
}

export interface ExecSource {
  podContainers(pod: string, namespace: string): Promise<string[]>;
  /** Resolves once attached; `onExit` fires when the remote process ends. */
  exec(
    pod: string,
    namespace: string,
    container: string,
    command: string[],
    io: ExecIo,
    tty: boolean,
    onExit: (code: number | null, message?: string) => void,
  ): Promise<Subscription>;
}

export interface PortForwardSource {
  forwardSocket(pod: string, namespace: string, port: number, socket: Readable & Writable): Promise<void>;
}

export interface ResourceActions {
  getResource(kind: ResourceKind, name: string, namespace: string): Promise<unknown>;
  getResourceYaml(kind: ResourceKind, name: string, namespace: string): Promise<string>;
  describeResource(kind: ResourceKind, name: string, namespace: string): Promise<string>;
  deleteResource(kind: ResourceKind, name: string, namespace: string): Promise<void>;
  restartRollout(kind: ResourceKind, name: string, namespace: string): Promise<void>;
  listNamespaces(): Promise<string[]>;
  podEnv(pod: string, namespace: string): Promise<Record<string, string>>;
}

export interface ContextInfo {
  name: string;
  cluster: string;
  namespace?: string;
  current: boolean;
}

/** Everything the dashboard needs from a connected cluster. */
export interface ClusterClient extends ResourceSource, LogSource, ExecSource, PortForwardSource, ResourceActions {
  readonly context: string;
  /** Context default namespace, or `default`. */
  readonly namespace: string;
  contexts(): ContextInfo[];
  /** A client bound to another context of the same kubeconfig. */
  withContext(name: string): ClusterClient;
}
