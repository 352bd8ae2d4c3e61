import { getLogger } from '@kernel/logger';

/**
* Centralized Shutdown Manager
*
* All shutdown work (stopping the sync scheduler, draining HTTP, closing the
* database pool and the search client) is registered here so that a single
* SIGTERM/SIGINT handler runs it in a known order.
*
* Handlers run sequentially in reverse registration order: resources opened
* first are released last.
*/

const logger = getLogger({ service: 'shutdown' });

/** Shutdown handler function type */
export type ShutdownHandler = () => Promise<void> | void;

interface RegisteredHandler {
  name: string;
  handler: ShutdownHandler;
}

/** Registered handlers, in registration order */
let handlers: RegisteredHandler[] = [];

/** Flag indicating if shutdown is in progress */
let isShuttingDown = false;

/** Per-handler time budget */
const HANDLER_TIMEOUT_MS = 30000;

// ============================================================================
// Handler Management
// ============================================================================

/**
* Register a shutdown handler to be called during graceful shutdown
* @param name - Label used in log lines
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(name: string, handler: ShutdownHandler): () => void {
  const entry: RegisteredHandler = { name, handler };
  handlers = [...handlers, entry];
  return () => {
    handlers = handlers.filter(h => h !== entry);
  };
}

/**
* Unregister all shutdown handlers
* Useful for testing
*/
export function clearShutdownHandlers(): void {
  handlers = [];
}

/**
* Get the count of registered handlers
*/
export function getHandlerCount(): number {
  return handlers.length;
}

// ============================================================================
// Shutdown Execution
// ============================================================================

async function runWithTimeout(entry: RegisteredHandler): Promise<void> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Handler ${entry.name} timed out after ${HANDLER_TIMEOUT_MS}ms`)),
      HANDLER_TIMEOUT_MS
    );
  });
  try {
    await Promise.race([Promise.resolve(entry.handler()), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
* Run every registered handler once, isolating failures.
* @returns Number of handlers that failed
*/
export async function runShutdownHandlers(): Promise<number> {
  let failures = 0;
  for (const entry of [...handlers].reverse()) {
    try {
      await runWithTimeout(entry);
      logger.info(`Shutdown handler ${entry.name} completed`);
    } catch (err) {
      failures++;
      logger.error(`Shutdown handler ${entry.name} failed`, err instanceof Error ? err : new Error(String(err)));
    }
  }
  return failures;
}

/**
* Execute graceful shutdown with all registered handlers, then exit
* @param signal - The signal that triggered the shutdown
* @param exitCode - Exit code to use (default: 0 for graceful)
*/
export async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown`, { handlers: handlers.length });

  const failures = await runShutdownHandlers();
  if (failures > 0) {
    logger.error(`${failures} shutdown handler(s) failed`);
  }

  process.exit(failures > 0 && exitCode === 0 ? 1 : exitCode);
}

/**
* Reset the shutdown state
* Useful for testing
*/
export function resetShutdownState(): void {
  isShuttingDown = false;
}

/**
* Check if shutdown is in progress
*/
export function getIsShuttingDown(): boolean {
  return isShuttingDown;
}

// ============================================================================
// Global Handler Setup
// ============================================================================

let isRegistered = false;

/**
* Setup global shutdown handlers (SIGTERM/SIGINT)
* Safe to call multiple times - handlers are registered only once
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      gracefulShutdown(signal).catch((error: unknown) => {
        logger.fatal(`${signal} shutdown error`, error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      });
    });
  }
}
