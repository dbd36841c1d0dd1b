#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import * as readline from 'node:readline';
import { checkPrerequisites } from './prerequisites.js';
import { createOctokit, getViewerLogin, GhPRSource } from './github.js';
import { createConsoleLogger, printErrors } from './output.js';
import { defaultConfigPath, defaultStatePath, loadConfig, writeStarterConfig } from './config.js';
import { ConfigError, EXIT_CONFIG, EXIT_PREREQ, sanitizeError } from './errors.js';
import { SnapshotStore } from './snapshot-store.js';
import { ReconciliationEngine } from './reconciler.js';
import { TerminalMenu } from './menu.js';
import { DesktopNotifier } from './notifier.js';
import { Monitor } from './monitor.js';
import { handleCommand } from './commands.js';
import { openInBrowser } from './browser.js';
import type { Config } from './schemas.js';

interface WatchOptions {
  config?: string;
  state?: string;
  once?: boolean;
  interactive: boolean;
  verbose?: boolean;
}

async function loadStartupConfig(configPath: string): Promise<Config> {
  try {
    return await loadConfig(configPath);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(pc.red(`✖ ${error.message}`));
      console.error(pc.dim('  Create one with: pr-watch init'));
    } else {
      console.error(pc.red(`✖ ${sanitizeError(error)}`));
    }
    process.exit(EXIT_CONFIG);
  }
}

async function watch(options: WatchOptions): Promise<void> {
  // 1. Check prerequisites (collect all failures, report at once)
  const failures = checkPrerequisites();
  if (failures.length > 0) {
    printErrors(failures);
    process.exit(EXIT_PREREQ);
  }

  // 2. Load config
  const configPath = options.config ?? defaultConfigPath();
  const config = await loadStartupConfig(configPath);
  const logger = createConsoleLogger(options.verbose);

  if (config.repos.length === 0) {
    logger.warn(`No repositories configured; add some to ${configPath}`);
  }

  // 3. Restore state
  const store = new SnapshotStore(options.state ?? defaultStatePath(), logger);
  const engine = new ReconciliationEngine(store, {
    notifyChangesSinceLastRun: config.notifyChangesSinceLastRun,
    logger,
  });
  await engine.init();

  const menu = new TerminalMenu();
  const monitor = new Monitor(
    {
      loadConfig: () => loadConfig(configPath),
      resolveUser: () => getViewerLogin(createOctokit()),
      source: new GhPRSource(),
      engine,
      notifier: new DesktopNotifier(logger),
      renderer: menu,
      logger,
    },
    config,
  );

  // 4. Single poll
  if (options.once) {
    await monitor.requestPoll();
    return;
  }

  // 5. Keep polling; read commands from stdin when interactive
  let rl: readline.Interface | null = null;
  const shutdown = () => {
    monitor.stop();
    rl?.close();
  };
  process.on('SIGINT', () => { shutdown(); process.exit(130); });

  if (options.interactive && process.stdin.isTTY) {
    rl = readline.createInterface({ input: process.stdin });
    rl.on('line', (line) => {
      const result = handleCommand(line, {
        target: monitor,
        urlAt: (position) => menu.urlAt(position),
        openUrl: (url) => openInBrowser(url, logger),
        logger,
      });
      if (result === 'quit') shutdown();
    });
  }

  logger.info(`Polling ${config.repos.length} repos every ${config.pollIntervalSeconds}s`);
  await monitor.start();
}

const program = new Command();

program
  .name('pr-watch')
  .description('Watch your open GitHub pull requests and get notified when they change')
  .version('0.1.0');

program
  .command('watch', { isDefault: true })
  .description('Poll configured repositories and notify on changes (default)')
  .option('--config <path>', 'Config file (default: ~/.pr-watch/config.json)')
  .option('--state <path>', 'State file (default: ~/.pr-watch/state.json)')
  .option('--once', 'Poll once, print the PR list and exit')
  .option('--no-interactive', 'Do not read commands from stdin')
  .option('--verbose', 'Show debug output: timing, PR counts, user')
  .action(async (options: WatchOptions) => {
    await watch(options);
  });

program
  .command('init')
  .description('Write a starter config file')
  .option('--config <path>', 'Config file (default: ~/.pr-watch/config.json)')
  .option('--force', 'Overwrite an existing config')
  .action(async (options: { config?: string; force?: boolean }) => {
    const configPath = options.config ?? defaultConfigPath();
    try {
      const written = await writeStarterConfig(configPath, options.force);
      if (written) {
        console.log(pc.green('✔ ') + `Wrote ${configPath}`);
        console.log(pc.dim('  Add repositories as "owner/name" to the "repos" list.'));
      } else {
        console.log(pc.yellow(`Config already exists at ${configPath}`) + pc.dim(' (use --force to overwrite)'));
      }
    } catch (error: unknown) {
      console.error(pc.red(`✖ Could not write ${configPath}`));
      console.error(pc.dim('  ' + sanitizeError(error)));
      process.exit(EXIT_CONFIG);
    }
  });

await program.parseAsync();
