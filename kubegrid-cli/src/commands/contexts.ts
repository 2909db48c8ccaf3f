/**
 * `kubegrid contexts`: List the contexts of the kubeconfig.
 */

import chalk from 'chalk';
import { errorMessage, listContexts } from 'kubegrid-shared';
import type { ContextInfo } from 'kubegrid-shared';

export function formatContexts(contexts: ContextInfo[]): string {
  if (contexts.length === 0) return chalk.gray('No contexts found.') + '\n';
  const nameWidth = Math.max(...contexts.map(c => c.name.length), 'NAME'.length);
  const clusterWidth = Math.max(...contexts.map(c => c.cluster.length), 'CLUSTER'.length);

  const lines = [
    chalk.bold(`  ${'NAME'.padEnd(nameWidth)}  ${'CLUSTER'.padEnd(clusterWidth)}  NAMESPACE`),
  ];
  for (const c of contexts) {
    const marker = c.current ? chalk.green('*') : ' ';
    const name = c.current ? chalk.green(c.name.padEnd(nameWidth)) : c.name.padEnd(nameWidth);
    lines.push(`${marker} ${name}  ${c.cluster.padEnd(clusterWidth)}  ${c.namespace ?? chalk.gray('-')}`);
  }
  return lines.join('\n') + '\n';
}

export function contextsAction(opts: { json?: boolean; kubeconfig?: string }): void {
  let contexts: ContextInfo[];
  try {
    contexts = listContexts({ kubeconfig: opts.kubeconfig });
  } catch (err) {
    process.stderr.write(chalk.red(`Cannot read kubeconfig: ${errorMessage(err)}\n`));
    process.exitCode = 1;
    return;
  }

  if (opts.json) {
    process.stdout.write(JSON.stringify(contexts, null, 2) + '\n');
    return;
  }
  process.stdout.write(formatContexts(contexts));
}
