import { getInjectedParams, isInjectable } from './decorators';

type FactoryFunction<T> = () => T;
type Constructor<T> = new (...args: never[]) => T;

interface Binding {
  factory: FactoryFunction<unknown>;
  singleton: boolean;
  instance?: unknown;
}

export class DIContainer {
  private bindings: Map<string, Binding> = new Map();
  private static instance: DIContainer;

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  bind<T>(token: string, factory: FactoryFunction<T>, singleton: boolean = true): void {
    this.bindings.set(token, { factory, singleton });
  }

  /**
   * Binds a class whose constructor parameters are all marked with `@Inject(token)`.
   */
  bindClass<T>(token: string, constructor: Constructor<T>, singleton: boolean = true): void {
    if (!isInjectable(constructor)) {
      throw new Error(`Class ${constructor.name} is not marked @Injectable()`);
    }

    this.bind(
      token,
      () => {
        const args = getInjectedParams(constructor).map(({ token: paramToken }) =>
          this.get<unknown>(paramToken),
        );
        return Reflect.construct(constructor, args);
      },
      singleton,
    );
  }

  get<T>(token: string): T {
    const binding = this.bindings.get(token);
    if (!binding) {
      throw new Error(`No binding found for token: ${token}`);
    }

    if (binding.singleton && binding.instance !== undefined) {
      return binding.instance as T;
    }

    const instance = binding.factory();
    if (binding.singleton) {
      binding.instance = instance;
    }

    return instance as T;
  }

  clear(): void {
    this.bindings.clear();
  }
}
