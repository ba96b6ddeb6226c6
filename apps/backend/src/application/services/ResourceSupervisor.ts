// =============================================================================
// Resource Supervisor
// =============================================================================

import type { ManagedResource } from '../../ports/ManagedResource.js';
import type { Logger } from '../../infrastructure/logging/logger.js';

/**
 * Starts and stops a bundle of resources as a unit.
 *
 * Resources start in the order given. If one fails, those already started
 * are stopped in reverse order and the start error is rethrown. `stop()`
 * releases in reverse order, attempts every resource and is idempotent.
 */
export class ResourceSupervisor {
  private started: ManagedResource[] = [];
  private running = false;

  constructor(
    private readonly resources: ManagedResource[],
    private readonly log: Logger
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    for (const resource of this.resources) {
      try {
        this.log.debug('Starting resource', { resource: resource.name });
        await resource.start();
        this.started.push(resource);
      } catch (error) {
        this.log.error('Resource failed to start', error, { resource: resource.name });
        try {
          await this.stopStarted();
        } catch (rollbackError) {
          this.log.error('Rollback after failed start did not complete', rollbackError);
        }
        throw error;
      }
    }

    this.running = true;
  }

  /**
   * @throws the single stop error, or an AggregateError when several resources failed
   */
  async stop(): Promise<void> {
    this.running = false;
    await this.stopStarted();
  }

  private async stopStarted(): Promise<void> {
    const toStop = this.started.reverse();
    this.started = [];

    const errors: unknown[] = [];
    for (const resource of toStop) {
      try {
        await resource.stop();
      } catch (error) {
        this.log.error('Resource failed to stop', error, { resource: resource.name });
        errors.push(error);
      }
    }

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Multiple errors while stopping agent resources');
    }
  }
}
