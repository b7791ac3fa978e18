/**
 * Service lifecycle.
 *
 * Services that hold resources (the database connection, the stdio tool
 * server) implement BaseService and are registered with a ServiceRegistry so
 * that CLI commands can tear everything down in reverse order on exit.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

export interface BaseService {
  /** Acquire resources (open connections, apply migrations, ...). */
  initialize(): Promise<void>

  /** Release resources. Called in reverse registration order. */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * Register a named service. Registration order is preserved for lifecycle calls.
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * Initialize all registered services in registration order.
   * Fails fast: later services may depend on earlier ones.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut down all registered services in reverse registration order.
   * Errors are collected and re-thrown as an AggregateError after all services
   * have had a chance to shut down.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
