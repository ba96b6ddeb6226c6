// =============================================================================
// Managed Resource
// =============================================================================

/**
 * Anything an agent acquires for the duration of its run: the model session,
 * the execution session, a tool back-end connection.
 *
 * `start` is called once before first use and `stop` once after last use.
 * `stop` must tolerate being called after a failed `start`.
 */
export interface ManagedResource {
  /** Human-readable name, used in logs and aggregate errors */
  readonly name: string;

  start(): Promise<void>;

  stop(): Promise<void>;
}
