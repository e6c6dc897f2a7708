/**
 * Service lifecycle and registry.
 *
 * Long-lived resources (the checkpoint database today) implement BaseService
 * and are registered with the orchestrator's ServiceRegistry, which opens
 * them in registration order and closes them in reverse.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

export interface BaseService {
  /**
   * Acquire the service's resources. Called once, before the orchestrator
   * emits orchestrator:ready.
   */
  initialize(): Promise<void>

  /** Release the service's resources. Must tolerate a failed or missing initialize(). */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named services, typed by an optional service map.
 *
 * @example
 * const registry = new ServiceRegistry<{ database: DatabaseService }>()
 * registry.register('database', createDatabaseService(path))
 * await registry.initializeAll()
 * registry.get('database').db   // typed as DatabaseService
 * await registry.shutdownAll()
 */
export class ServiceRegistry<S extends Record<string, BaseService> = Record<string, BaseService>> {
  private readonly _services: Partial<S> = {}
  private readonly _order: Array<keyof S & string> = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register<K extends keyof S & string>(name: K, service: S[K]): void {
    if (this._services[name] !== undefined) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services[name] = service
    this._order.push(name)
  }

  /**
   * @throws {Error} if no service with the given name is registered.
   */
  get<K extends keyof S & string>(name: K): S[K] {
    const service = this._services[name]
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._order.some((registered) => registered === name)
  }

  /**
   * Initialize services in registration order, stopping at the first failure.
   * @throws the first initialization error encountered.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      await this._services[name]?.initialize()
    }
  }

  /**
   * Shut down every service in reverse registration order. Failures are
   * collected and rethrown together as an AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const name of [...this._order].reverse()) {
      try {
        await this._services[name]?.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
