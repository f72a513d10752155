/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const select = p.select;
export const isCancel = p.isCancel;

/**
 * Prompts need a terminal on both ends.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}
