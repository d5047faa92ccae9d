/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 * Safe for CI/CD pipelines and headless environments.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.log(`✗ ${message}`);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${title}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },
};
