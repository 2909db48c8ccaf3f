import * as fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

const version = readVersion();

const program = new Command();

program
  .name('kubegrid')
  .description('Tiling multi-pane terminal dashboard for Kubernetes clusters')
  .version(version);

// Dashboard command pulls in Ink and React: lazy-load to avoid import at parse time
const dashCmd = new Command('dashboard')
  .description('Open the full-screen dashboard (default)')
  .option('--context <name>', 'Kubeconfig context to use (default: current context)')
  .option('-n, --namespace <name>', 'Initial namespace')
  .option('-A, --all-namespaces', 'Start with resources from every namespace')
  .option('--view <kind>', 'Initial resource view, e.g. pods, deploy, svc')
  .option('--config <path>', 'Config file (default: ~/.config/kubegrid/config.json)')
  .option('--kubeconfig <path>', 'Kubeconfig file (default: $KUBECONFIG or ~/.kube/config)')
  .action(async (opts: unknown) => {
    const { dashboardAction, DashboardOptionsSchema } = await import('./commands/dashboard');
    const parsed = DashboardOptionsSchema.safeParse(opts);
    if (!parsed.success) {
      process.stderr.write(chalk.red(`Invalid options: ${parsed.error.issues.map(i => i.message).join('; ')}\n`));
      process.exit(2);
    }
    await dashboardAction(parsed.data, version);
  });
program.addCommand(dashCmd, { isDefault: true });

// Contexts command: list kubeconfig contexts
const contextsCmd = new Command('contexts')
  .description('List the contexts of the kubeconfig')
  .option('--json', 'Output as JSON')
  .option('--kubeconfig <path>', 'Kubeconfig file (default: $KUBECONFIG or ~/.kube/config)')
  .action(async (opts: { json?: boolean; kubeconfig?: string }) => {
    const { contextsAction } = await import('./commands/contexts');
    contextsAction(opts);
  });
program.addCommand(contextsCmd);

// Config command: init and check the config file
const configCmd = new Command('config').description('Manage the configuration file');
configCmd
  .command('init')
  .description('Write the default config file')
  .option('--config <path>', 'Config file to create')
  .action(async (opts: { config?: string }) => {
    const { configInitAction } = await import('./commands/config');
    configInitAction(opts);
  });
configCmd
  .command('check')
  .description('Validate the config file and report key binding problems')
  .option('--config <path>', 'Config file to check')
  .action(async (opts: { config?: string }) => {
    const { configCheckAction } = await import('./commands/config');
    configCheckAction(opts);
  });
program.addCommand(configCmd);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(chalk.red(`kubegrid: ${err instanceof Error ? err.message : String(err)}\n`));
  process.exit(1);
});
