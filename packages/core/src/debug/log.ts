/**
 * packages/core/src/debug/log.ts — Development-only diagnostics.
 *
 * Warnings go to `console.warn` outside production builds and are dropped
 * otherwise. Nothing on the layout or paint path logs unconditionally.
 */

import { isDevMode } from "../config.js";

export function warnDev(message: string): void {
  if (!isDevMode()) return;
  console.warn(message);
}
