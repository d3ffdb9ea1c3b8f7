/**
 * Hooks
 *
 * An explicit, ordered list of callbacks. Lists are owned by whoever
 * triggers them (the access service holds its own); nothing is registered
 * globally.
 */

import { silentLogger, type Logger } from '../utils/logger.js';

export type HookHandler<T> = (value: T) => void | Promise<void>;

export interface BindOptions {
  /** Identifier used by `unbind`; generated when omitted */
  readonly id?: string;
  /** Higher runs first (default: 0) */
  readonly priority?: number;
}

interface BoundHandler<T> {
  readonly id: string;
  readonly priority: number;
  readonly sequence: number;
  readonly handler: HookHandler<T>;
}

/**
 * Ordered callback list
 *
 * Handlers run one after another by descending priority, then registration
 * order. A handler that throws is logged and the remaining handlers still run.
 */
export class HookList<T> {
  private handlers: BoundHandler<T>[] = [];
  private sequence = 0;
  private logger: Logger;
  private name: string;

  constructor(name: string, logger: Logger = silentLogger) {
    this.name = name;
    this.logger = logger;
  }

  get size(): number {
    return this.handlers.length;
  }

  /**
   * Register a handler and return its id.
   * Binding an id that is already bound replaces that handler.
   */
  bind(handler: HookHandler<T>, options: BindOptions = {}): string {
    const sequence = this.sequence++;
    const id = options.id ?? `${this.name}-${sequence}`;

    this.handlers = this.handlers.filter((h) => h.id !== id);
    this.handlers.push({ id, priority: options.priority ?? 0, sequence, handler });
    this.handlers.sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);

    return id;
  }

  /**
   * Remove a handler; returns false when the id is not bound
   */
  unbind(id: string): boolean {
    const before = this.handlers.length;
    this.handlers = this.handlers.filter((h) => h.id !== id);
    return this.handlers.length !== before;
  }

  /**
   * Run every handler with `value`
   */
  async trigger(value: T): Promise<void> {
    for (const { id, handler } of [...this.handlers]) {
      try {
        await handler(value);
      } catch (error) {
        this.logger.error(`Hook '${this.name}' handler '${id}' failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
