export type SignalSubscriber<T> = (value: T) => void;
export type SignalEquality<T> = (current: T, next: T) => boolean;

export interface Signal<T> {
  get: () => T;
  set: (value: T) => void;
  subscribe: (subscriber: SignalSubscriber<T>) => () => void;
}

export function createSignal<T>(initialValue: T, isEqual: SignalEquality<T> = Object.is): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<SignalSubscriber<T>>();

  return {
    get: () => value,
    set: (nextValue: T) => {
      if (isEqual(value, nextValue)) return;
      value = nextValue;
      [...subscribers].forEach((subscriber) => subscriber(value));
    },
    subscribe: (subscriber: SignalSubscriber<T>) => {
      subscribers.add(subscriber);
      subscriber(value);
      return () => {
        subscribers.delete(subscriber);
      };
    },
  };
}
