#!/usr/bin/env node
import * as fs from 'node:fs';
import * as path from 'node:path';
import { simpleGit } from 'simple-git';
import { App } from './App.js';
import { loadConfig, parseCommitLimit, MAX_COMMIT_LIMIT, MIN_COMMIT_LIMIT } from './config.js';
import { SimpleGitBackend } from './git/SimpleGitBackend.js';
import { BlessedTerminal } from './ui/Terminal.js';
import { createLogger, setDebug } from './utils/logger.js';

const log = createLogger('cli');

// Cleanup function to reset terminal state on exit
function cleanupTerminal(): void {
  // Reset attributes
  process.stdout.write('\x1b[0m');
  // Leave the alternate screen buffer
  process.stdout.write('\x1b[?1049l');
  // Show cursor
  process.stdout.write('\x1b[?25h');
}

// Ensure terminal is cleaned up on any exit
process.on('exit', cleanupTerminal);
process.on('SIGINT', () => {
  cleanupTerminal();
  process.exit(0);
});
process.on('SIGTERM', () => {
  cleanupTerminal();
  process.exit(0);
});
process.on('uncaughtException', (err) => {
  cleanupTerminal();
  console.error('Uncaught exception:', err);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  cleanupTerminal();
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

// Parse CLI arguments
interface ParsedArgs {
  repoPath?: string;
  commits?: number;
  color?: boolean;
  debug?: boolean;
}

const HELP = `
gitfold - Terminal status buffer for git

Usage: gitfold [options] [path]

Options:
  -n, --commits N  Number of recent commits to list (${MIN_COMMIT_LIMIT}-${MAX_COMMIT_LIMIT}, default 10)
  --color          Keep git's own diff colors
  -d, --debug      Log git calls to stderr
  -h, --help       Show this help message

Arguments:
  [path]           Path inside a git repository (default: current directory)

Environment:
  GITFOLD_THEME, GITFOLD_RECENT_COMMITS, GITFOLD_COLOR_DIFF, GITFOLD_DEBUG

Keyboard:
  j/k, Up/Down   Next / previous row
  h/l            Parent / expand and step in
  n/p            Next / previous sibling
  Tab            Fold or unfold; Shift+Tab folds every node of that kind
  Space          Select; Escape clears the selection
  s / u          Stage / unstage the section, file, hunk or lines
  x              Discard (asks for y)
  c / Shift+c    Commit / amend
  Enter          Show commit or stash, blame file
  Shift+l        Log
  g / r          Refresh
  q / Ctrl+C     Quit
`;

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--commits' || arg === '-n') {
      const limit = parseCommitLimit(args[i + 1]);
      if (limit === null) {
        console.error(
          `Error: ${arg} requires a number from ${MIN_COMMIT_LIMIT} to ${MAX_COMMIT_LIMIT}`
        );
        process.exit(1);
      }
      result.commits = limit;
      i++;
    } else if (arg === '--color') {
      result.color = true;
    } else if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      console.log(HELP);
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      result.repoPath = arg;
    } else {
      console.error(`Error: unknown option ${arg}`);
      process.exit(1);
    }
    i++;
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  if (args.commits !== undefined) config.recentCommitLimit = args.commits;
  if (args.color) config.colorDiff = true;
  if (args.debug) config.debug = true;
  setDebug(config.debug);

  const target = path.resolve(args.repoPath ?? process.cwd());
  if (!fs.existsSync(target)) {
    console.error(`Error: ${target} does not exist`);
    process.exit(1);
  }

  const git = simpleGit(target);
  if (!(await git.checkIsRepo())) {
    console.error(`Error: ${target} is not inside a git repository`);
    process.exit(1);
  }
  const repoPath = (await git.revparse(['--show-toplevel'])).trim();
  log.debug('repository', { path: repoPath });

  const app = new App({
    config,
    backend: new SimpleGitBackend(repoPath, { colorDiff: config.colorDiff }),
    terminal: new BlessedTerminal(),
  });

  // Wait for app to exit
  await app.start();

  process.exit(0);
}

main().catch((err) => {
  cleanupTerminal();
  console.error('Fatal error:', err);
  process.exit(1);
});
