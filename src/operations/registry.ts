/**
 * Operation Registry
 *
 * Central registry of operation handlers, keyed by operation name.
 * Names are unique: registering a name twice is a startup error.
 */

import type { OperationHandler } from './types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'operation-registry' });

export class OperationRegistry {
  private operations = new Map<string, OperationHandler>();

  /**
   * Register an operation
   * @throws Error if the name is already taken
   */
  register(handler: OperationHandler): void {
    if (this.operations.has(handler.name)) {
      throw new Error(`Operation '${handler.name}' is already registered`);
    }
    this.operations.set(handler.name, handler);
    logger.debug({ operation: handler.name }, 'Operation registered');
  }

  registerAll(handlers: OperationHandler[]): void {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  get(name: string): OperationHandler | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /**
   * Registered names, in registration order
   */
  getNames(): string[] {
    return Array.from(this.operations.keys());
  }

  getAll(): OperationHandler[] {
    return Array.from(this.operations.values());
  }

  get size(): number {
    return this.operations.size;
  }
}
