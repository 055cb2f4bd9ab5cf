#!/usr/bin/env node

/**
 * parley -- talk to a desktop chat app.
 *
 * Speak a question through native dictation, say "send", and hear the reply
 * read back once you copy it. Every step is gated by a spoken yes or no.
 *
 * Entry point: parses process.argv manually and dispatches to the
 * appropriate command module.
 *
 * Commands:
 *   (default)   Run the conversation loop
 *   run         Run the conversation loop
 *   doctor      Run health checks
 *   keys        Emit one key combination
 *   listen      Record one clip and show how it was understood
 *   help        Show usage
 *   version     Show version
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ACCENT, RESET, BOLD, DIM, GREEN, RED } from './ui.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Walk up from dist/ or src/ to find package.json.
  const paths = [
    resolve(here, '..', 'package.json'),
    resolve(here, '..', '..', 'package.json'),
  ];
  for (const p of paths) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      // Try next path.
    }
  }
  return '0.1.0';
}

// ---------------------------------------------------------------------------
// Help text
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
  ${ACCENT}${BOLD}parley${RESET} ${DIM}v${getVersion()}${RESET} -- Voice conversations with a desktop chat app

  ${BOLD}Usage${RESET}
    ${GREEN}parley${RESET}                           Run the conversation loop
    ${GREEN}parley${RESET} ${DIM}<command> [options]${RESET}

  ${BOLD}Commands${RESET}
    ${GREEN}run${RESET}          Run the conversation loop
    ${GREEN}doctor${RESET}       Check platform, config and capabilities
    ${GREEN}keys${RESET}         Emit one key combination (toggle, cancel, send, screenshot)
    ${GREEN}listen${RESET}       Record one clip and show how it was understood

  ${BOLD}Run Options${RESET}
    ${GREEN}-l, --lang${RESET} ja|en          Narration and transcription language
    ${GREEN}--no-monitor${RESET}             Do not listen for stop phrases while dictating

  ${BOLD}Listen Options${RESET}
    ${GREEN}-s, --seconds${RESET} N           Clip length

  ${BOLD}Global Options${RESET}
    ${GREEN}--help, -h${RESET}               Show this help
    ${GREEN}--version, -V${RESET}            Show version

  ${BOLD}Examples${RESET}
    ${DIM}$${RESET} parley                        ${DIM}# Start talking${RESET}
    ${DIM}$${RESET} parley run --lang en          ${DIM}# English prompts${RESET}
    ${DIM}$${RESET} parley doctor                 ${DIM}# Health checks${RESET}
    ${DIM}$${RESET} parley keys toggle            ${DIM}# Toggle dictation once${RESET}
    ${DIM}$${RESET} parley listen --seconds 3     ${DIM}# Try the keywords${RESET}

  ${DIM}Settings live in ~/.parley/config.json; API keys can go in ~/.parley/.env.${RESET}
`);
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseArgs(argv: string[]): { command: string; rest: string[] } {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args.
  const args = argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    return { command: 'help', rest: [] };
  }
  if (args.includes('--version') || args.includes('-V')) {
    return { command: 'version', rest: [] };
  }

  const [first, ...rest] = args;

  // No command, or only options = run.
  if (first === undefined || first.startsWith('-')) {
    return { command: 'run', rest: args };
  }

  return { command: first, rest };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { command, rest } = parseArgs(process.argv);

  switch (command) {
    case 'run': {
      const { run } = await import('./commands/run.js');
      await run(rest);
      break;
    }

    case 'doctor': {
      const { doctor } = await import('./commands/doctor.js');
      await doctor();
      break;
    }

    case 'keys': {
      const { keys } = await import('./commands/keys.js');
      await keys(rest);
      break;
    }

    case 'listen': {
      const { listen } = await import('./commands/listen.js');
      await listen(rest);
      break;
    }

    case 'version': {
      console.log(`parley v${getVersion()}`);
      break;
    }

    case 'help': {
      printHelp();
      break;
    }

    default: {
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      console.error(`  ${DIM}Run ${ACCENT}parley --help${DIM} for available commands.${RESET}\n`);
      process.exitCode = 1;
      break;
    }
  }
}

// Only run when executed directly, not when imported by tests.
if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}${BOLD}Fatal error:${RESET} ${message}`);
    if (err instanceof Error && err.stack) {
      const stackLines = err.stack.split('\n').slice(1).map((l) => `  ${l.trim()}`).join('\n');
      console.error(`${DIM}${stackLines}${RESET}`);
    }
    process.exitCode = 1;
  });
}
