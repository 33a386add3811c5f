/**
 * Real ProcessTerminator implementation
 * Ends the Node.js process through process.exit
 */

import type { ProcessTerminator } from '../types/process-terminator';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(status: number): never {
    process.exit(status);
  }
}

/**
 * Shared terminator used when callers do not inject their own
 */
export const nodeProcessTerminator: ProcessTerminator = new NodeProcessTerminator();
