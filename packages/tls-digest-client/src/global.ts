import { Manager } from './manager.js';
import { tlsManagerSettings } from './settings.js';

// Process-wide default issuer. Built on first use, replaceable at any time.
let globalManager: Manager | null = null;

/**
 * The global Manager, created with tlsManagerSettings() on first call.
 */
export function getGlobalManager(): Manager {
  if (globalManager === null) {
    globalManager = new Manager(tlsManagerSettings());
  }
  return globalManager;
}

/**
 * Replace the global Manager. The previous one is not closed.
 */
export function setGlobalManager(manager: Manager): void {
  globalManager = manager;
}

/** Forget the global Manager so the next get builds a fresh one. */
export function resetGlobalManager(): void {
  globalManager = null;
}
