import { describe, it, expect } from 'vitest';
import { DIContainer } from '../container';
import { Inject, Injectable, getInjectedParams } from '../decorators';

class Engine {
  readonly id = Math.random();
}

@Injectable()
class Car {
  constructor(
    @Inject('engine') readonly engine: Engine,
    @Inject('name') readonly name: string,
  ) {}
}

class Plain {}

describe('decorators', () => {
  it('returns injected params in declaration order', () => {
    expect(getInjectedParams(Car)).toEqual([
      { index: 0, token: 'engine' },
      { index: 1, token: 'name' },
    ]);
  });
});

describe('DIContainer', () => {
  it('builds injectable classes from their @Inject tokens', () => {
    const container = new DIContainer();
    container.bind('engine', () => new Engine());
    container.bind('name', () => 'roadster');
    container.bindClass('car', Car);

    const car = container.get<Car>('car');

    expect(car).toBeInstanceOf(Car);
    expect(car.name).toBe('roadster');
    expect(car.engine).toBe(container.get<Engine>('engine'));
  });

  it('caches singletons and rebuilds transient bindings', () => {
    const container = new DIContainer();
    container.bind('singleton', () => new Engine());
    container.bind('transient', () => new Engine(), false);

    expect(container.get('singleton')).toBe(container.get('singleton'));
    expect(container.get('transient')).not.toBe(container.get('transient'));
  });

  it('throws for unknown tokens', () => {
    expect(() => new DIContainer().get('missing')).toThrow('No binding found for token: missing');
  });

  it('refuses classes not marked injectable', () => {
    expect(() => new DIContainer().bindClass('plain', Plain)).toThrow(
      'Class Plain is not marked @Injectable()',
    );
  });

  it('forgets bindings on clear()', () => {
    const container = new DIContainer();
    container.bind('name', () => 'x');

    container.clear();

    expect(() => container.get('name')).toThrow('No binding found for token: name');
  });
});
