/**
 * Strata Membership Server
 *
 * Entry point for a primary or observer membership process.
 * @module @strata/server
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createServiceLogger } from '@strata/shared';
import { createMembershipService, type MembershipRuntime } from './bootstrap.js';

const logger = createServiceLogger({
  level: 'info',
  service: 'strata-membership',
}, { component: 'server' });

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Main function to start the membership service
 */
async function main(): Promise<void> {
  let runtime: MembershipRuntime;
  try {
    runtime = await createMembershipService();
  } catch (error) {
    logger.error('Failed to start membership service', error instanceof Error ? error : undefined);
    process.exit(1);
  }

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    runtime.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });
}

// Run main if this is the entry point
const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  void main();
}

// ============================================================================
// Exports
// ============================================================================

export {
  createMembershipService,
  parseMembershipMode,
} from './bootstrap.js';

export type {
  MembershipMode,
  MembershipRuntime,
  MembershipServiceOptions,
} from './bootstrap.js';

export * from './supabase/index.js';
