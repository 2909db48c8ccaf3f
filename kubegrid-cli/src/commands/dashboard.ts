/**
 * `kubegrid dashboard`: Full-screen tiling dashboard for a cluster.
 * Uses Ink (React for the terminal) for rendering.
 */

import React from 'react';
import chalk from 'chalk';
import { z } from 'zod';
import {
  EventChannel,
  KubeClient,
  errorMessage,
  getLogger,
  loadConfig,
  parseResourceKind,
} from 'kubegrid-shared';
import type { AppEvent, ClusterClient, ResourceKind } from 'kubegrid-shared';
import { DashboardController } from '../dashboard/DashboardController';
import { EventLoop } from '../dashboard/EventLoop';
import { Dashboard } from '../dashboard/ink/Dashboard';
import { disableMouse } from '../dashboard/ink/mouse';

const log = getLogger('dashboard');

const RENDER_THROTTLE_MS = 16;

export const DashboardOptionsSchema = z.object({
  context: z.string().min(1).optional(),
  namespace: z.string().min(1).optional(),
  allNamespaces: z.boolean().optional(),
  view: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  kubeconfig: z.string().min(1).optional(),
});

export type DashboardOptions = z.infer<typeof DashboardOptionsSchema>;

function connect(opts: DashboardOptions): ClusterClient | null {
  try {
    return KubeClient.load({ context: opts.context, kubeconfig: opts.kubeconfig });
  } catch (err) {
    log.warn({ err }, 'no cluster connection');
    process.stderr.write(chalk.yellow(`No cluster connection: ${errorMessage(err)}\n`));
    return null;
  }
}

export async function dashboardAction(opts: DashboardOptions, version: string): Promise<void> {
  const loaded = loadConfig(opts.config);
  for (const warning of loaded.warnings) {
    log.warn({ path: loaded.path }, warning);
    process.stderr.write(chalk.yellow(`config: ${warning}\n`));
  }

  let initialView: ResourceKind | undefined;
  if (opts.view) {
    const kind = parseResourceKind(opts.view);
    if (!kind) {
      process.stderr.write(chalk.red(`Unknown resource kind: ${opts.view}\n`));
      process.exit(2);
    }
    initialView = kind;
  }

  const client = connect(opts);
  const channel = new EventChannel<AppEvent>();
  const send = (event: AppEvent): void => {
    channel.send(event);
  };

  const controller = new DashboardController({
    config: loaded.config,
    client,
    send,
    columns: process.stdout.columns || 80,
    rows: process.stdout.rows || 24,
    initialView,
    namespace: opts.namespace,
    allNamespaces: opts.allNamespaces,
  });
  log.info({ context: client?.context ?? null, fromFile: loaded.fromFile }, 'dashboard started');

  // ── Render with Ink ──
  const { render } = await import('ink');

  const element = (): React.ReactElement => React.createElement(Dashboard, {
    view: controller.view(),
    version,
    send,
  });

  // ctrl+c belongs to the focused shell, not to Ink.
  const instance = render(element(), { exitOnCtrlC: false });

  // Re-render bridge: throttled rerender with a fresh view
  let renderTimer: ReturnType<typeof setTimeout> | null = null;
  function scheduleRender(): void {
    if (renderTimer) return;
    renderTimer = setTimeout(() => {
      renderTimer = null;
      if (!stopped) instance.rerender(element());
    }, RENDER_THROTTLE_MS);
  }

  const tickInterval = setInterval(() => send({ type: 'tick' }), loaded.config.general.tickRateMs);

  let stopped = false;
  function cleanup(): void {
    if (stopped) return;
    stopped = true;
    clearInterval(tickInterval);
    if (renderTimer) clearTimeout(renderTimer);
    controller.shutdown();
    channel.close();
    instance.unmount();
  }

  // Safety net: ensure mouse tracking is disabled even on unclean exit
  process.on('exit', disableMouse);
  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);

  let failure: unknown = null;
  try {
    await new EventLoop(channel, controller, scheduleRender).run();
  } catch (err) {
    log.fatal({ err }, 'dashboard stopped');
    failure = err;
  }
  cleanup();
  if (failure !== null) {
    process.stderr.write(chalk.red(`kubegrid: ${errorMessage(failure)}\n`));
    process.exit(1);
  }
  process.exit(0);
}
