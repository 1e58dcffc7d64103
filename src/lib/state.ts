import { createStore } from "zustand/vanilla";

/**
 * State primitives shared by every resource.
 *
 * An atom is a single value behind a zustand vanilla store: readers call
 * get(), writers replace the whole value, watchers hear about every swap.
 * A subscription is a bare fan-out list with no stored value.
 */

export function createAtom<T>(initialValue: T) {
  const store = createStore<T>()(() => initialValue);

  return {
    get: () => store.getState(),
    set: (value: T) => store.setState(value, true),
    update: (updater: (current: T) => T) => {
      store.setState(updater(store.getState()), true);
    },
    watch: (listener: (next: T, previous: T) => void) =>
      store.subscribe(listener),
  };
}

export type Atom<T> = ReturnType<typeof createAtom<T>>;

export function createSubscription<T>() {
  const listeners = new Set<(value: T) => void>();

  return {
    subscribe: (listener: (value: T) => void) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    notify: (value: T) => {
      for (const listener of Array.from(listeners)) {
        listener(value);
      }
    },
    size: () => listeners.size,
    clear: () => {
      listeners.clear();
    },
  };
}

export type Subscription<T> = ReturnType<typeof createSubscription<T>>;
