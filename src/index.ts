#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * market-scout entry point.
 * Composition root that loads config, wires the model provider into a search
 * session and starts the interactive REPL.
 */

import * as readline from 'node:readline';
import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, loadConfig } from './config/config.js';
import type { AppConfig } from './config/schema.js';
import { createModelProvider, type ModelProvider } from './model/index.js';
import { createProductSearch, type SearchModelSettings } from './search/index.js';
import { createSession, type Session } from './session/index.js';
import { HELP_TEXT, runCommand, type Ask, type Write } from './cli/index.js';

type Closable = {
  close(): void;
};

type InteractionLoopDeps = {
  session: Session;
  ask: Ask;
  write: Write;
  market: string;
};

export function searchSettings(config: AppConfig): SearchModelSettings {
  return {
    model: config.model.name,
    temperature: config.search.temperature,
    market: config.search.market,
    location: {
      type: 'approximate',
      country: config.search.location.country,
      city: config.search.location.city,
    },
  };
}

/**
 * Build a fresh session around the shared provider.
 * Each interactive user gets their own; nothing but the provider is shared.
 */
export function createSearchSession(config: AppConfig, model: ModelProvider): Session {
  const search = createProductSearch({ model, settings: searchSettings(config) });
  return createSession({ search });
}

/**
 * Prompt for a single line of input from readline.
 * Used by the REPL and by the search form.
 */
function promptForLine(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onClose = (): void => reject(new Error('input closed'));
    rl.once('close', onClose);
    rl.question(prompt, (answer: string) => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/**
 * Core shutdown logic without process.exit - for testability.
 */
export function performShutdown(rl: Closable): void {
  rl.close();
}

/**
 * Closing readline emits 'close', which lands back here; only the first call acts.
 */
export function createShutdownHandler(rl: Closable, exit: (code: number) => void = (code) => process.exit(code)): () => void {
  let shuttingDown = false;
  return (): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log('\nShutting down...');
    performShutdown(rl);
    exit(0);
  };
}

export type InputCloseGate = {
  onClose(): void;
  run<T>(work: () => Promise<T>): Promise<T>;
};

/**
 * End of input while a command is running (piped stdin, for one) waits for
 * that command to finish before shutting down.
 */
export function createInputCloseGate(shutdown: () => void): InputCloseGate {
  let busy = false;
  let closed = false;
  return {
    onClose(): void {
      closed = true;
      if (!busy) {
        shutdown();
      }
    },
    async run<T>(work: () => Promise<T>): Promise<T> {
      busy = true;
      try {
        return await work();
      } finally {
        busy = false;
        if (closed) {
          shutdown();
        }
      }
    },
  };
}

/**
 * Handles one REPL line; errors are reported and the loop keeps going.
 * Returns false once the user asked to leave.
 */
export function createInteractionLoop(deps: InteractionLoopDeps): (input: string) => Promise<boolean> {
  return async (userInput: string) => {
    try {
      const result = await runCommand(userInput, deps);
      return result === 'continue';
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`error: ${errorMsg}`);
      return true;
    }
  };
}

/**
 * Main entry point: wires all components and starts the REPL.
 */
async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.code === 'missing_credential' ? error.message : `config error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  console.log(`market-scout starting (model ${config.model.name}, ${config.search.market})\n`);

  const model = createModelProvider(config.model);
  const session = createSearchSession(config, model);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const shutdownHandler = createShutdownHandler(rl);
  const gate = createInputCloseGate(shutdownHandler);
  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);
  rl.on('close', () => gate.onClose());

  const handleLine = createInteractionLoop({
    session,
    ask: (prompt) => promptForLine(rl, prompt),
    write: (text) => process.stdout.write(`${text}\n`),
    market: config.search.market,
  });

  console.log(`${HELP_TEXT}\n`);

  let running = true;
  while (running) {
    const line = await promptForLine(rl, '> ');
    running = await gate.run(() => handleLine(line));
  }

  shutdownHandler();
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(resolve(invoked)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run main entry point only when file is executed directly
if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
