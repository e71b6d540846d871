#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { classifyCommand } from './cli/commands/classify.js';
import { validateCommand } from './cli/commands/validate.js';
import { scoreCommand } from './cli/commands/score.js';
import { chatCommand } from './cli/commands/chat.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    printVersion();
    return;
  }

  switch (command) {
    case 'classify':
    case 'c': {
      const exitCode = await classifyCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'validate':
    case 'v': {
      const exitCode = await validateCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'score':
    case 's': {
      const exitCode = await scoreCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'chat': {
      const exitCode = await chatCommand(args.slice(1));
      if (exitCode !== 0) process.exit(exitCode);
      break;
    }

    case 'help':
    case '-h':
    case '--help':
      showHelp();
      break;

    default:
      if (command) {
        p.log.error(`Unknown command: ${command}`);
      }
      showHelp();
      process.exit(command ? 1 : 0);
  }
}

function showHelp() {
  console.log(`
intent-router - Pattern and keyword intent classification

Usage:
  intent-router <command> [options]

Commands:
  classify, c     Classify one utterance
  validate, v     Check an intent catalog
  score, s        Token-set similarity of two phrases
  chat            Interactive session with the default skills
  help            Show this help

Options:
  --version, -V   Show version information

Run 'intent-router <command> --help' for command options.

Examples:
  intent-router classify "jarvis open youtube"
  intent-router classify "jarvis weather" --threshold=60 --json
  intent-router validate --catalog=./my-intents.json
  intent-router score "what time is it" "tell me the time"
  intent-router chat --speak --log

Configuration:
  .intent-router.json in the working directory (or --config=PATH).
  Every field is optional; a missing file means the defaults.
  Set ANTHROPIC_API_KEY to enable questions about local files.
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
