/**
 * @fileoverview Dependency injection container for service registration and resolution.
 *
 * Provides a typed, token-based dependency injection container. Every
 * service is a lazily created singleton.
 *
 * @module core/container
 */

/**
 * Typed service key. The phantom `T` ties a token to the type it resolves to,
 * so `resolve(Tokens.ReviewService)` needs no type argument at the call site.
 */
export interface ServiceToken<T> {
  readonly key: symbol;
  /** Never set; carries `T` for inference only. */
  readonly __type?: T;
}

/** Create a token for a service of type `T`. */
export function createToken<T>(description: string): ServiceToken<T> {
  return { key: Symbol(description) };
}

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  instance?: T;
}

/**
 * Dependency injection container with typed tokens.
 */
export class ServiceContainer {
  private readonly services = new Map<symbol, ServiceRegistration<unknown>>();

  /**
   * Register a singleton service factory. Creates only one instance, cached after first resolve().
   */
  registerSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void {
    this.services.set(token.key, { factory });
  }

  /**
   * Register an already constructed instance.
   */
  registerInstance<T>(token: ServiceToken<T>, instance: T): void {
    this.services.set(token.key, { factory: () => instance, instance });
  }

  /**
   * Resolve a service instance, creating it on first call.
   */
  resolve<T>(token: ServiceToken<T>): T {
    const registration = this.services.get(token.key);
    if (!registration) {
      throw new Error(`Service not registered: ${token.key.toString()}`);
    }
    // Registrations are only stored through the typed register methods,
    // so the entry under token.key was created by a ServiceFactory<T>.
    return this.createInstance(registration) as T;
  }

  isRegistered<T>(token: ServiceToken<T>): boolean {
    return this.services.has(token.key);
  }

  /** Create an instance from a service registration. */
  private createInstance<T>(registration: ServiceRegistration<T>): T {
    if (registration.instance === undefined) {
      registration.instance = registration.factory(this);
    }
    return registration.instance;
  }
}
