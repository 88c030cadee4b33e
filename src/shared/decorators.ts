import 'reflect-metadata';

const INJECTABLE_METADATA_KEY = 'injectable';
const INJECT_METADATA_KEY = 'inject';

export interface InjectedParam {
  index: number;
  token: string;
}

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, true, target);
  };
}

export function Inject(token: string): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: InjectedParam[] = getInjectedParams(target);
    Reflect.defineMetadata(
      INJECT_METADATA_KEY,
      [...existing, { index: parameterIndex, token }],
      target,
    );
  };
}

export function isInjectable(target: object): boolean {
  return Reflect.getMetadata(INJECTABLE_METADATA_KEY, target) === true;
}

/**
 * Constructor parameter tokens in declaration order.
 * Parameter decorators run last-to-first, so the stored list is sorted here.
 */
export function getInjectedParams(target: object): InjectedParam[] {
  const params: InjectedParam[] = Reflect.getMetadata(INJECT_METADATA_KEY, target) ?? [];
  return [...params].sort((a, b) => a.index - b.index);
}
