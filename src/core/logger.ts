/**
 * Diagnostics logger. Everything goes to stderr so stdout carries only results.
 */

import * as p from '@clack/prompts'

const output = process.stderr

export const logger = {
  info: (message: string) => p.log.info(message, { output }),
  step: (message: string) => p.log.step(message, { output }),
  success: (message: string) => p.log.success(message, { output }),
  warn: (message: string) => p.log.warn(message, { output }),
  error: (message: string) => p.log.error(message, { output }),
}
