/**
 * Observable session state for the host UI
 *
 * The whiteboard publishes its live preview (mode + in-progress points)
 * through a Store; the Lit element reads it through a StoreController and
 * re-renders on every change.
 */
import type { ReactiveController, ReactiveControllerHost } from "lit";

type Listener<T> = (value: T) => void;

export class Store<T> {
  private value: T;
  private listeners = new Set<Listener<T>>();

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  /**
   * Replace the value. Setting the current value again notifies nobody.
   */
  set(value: T): void {
    if (Object.is(value, this.value)) return;
    this.value = value;
    this.listeners.forEach((fn) => fn(value));
  }

  /**
   * @returns Unsubscribe function
   */
  subscribe(fn: Listener<T>): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }
}

/**
 * Keeps `value` in step with a store while the host is connected
 */
export class StoreController<T> implements ReactiveController {
  private readonly host: ReactiveControllerHost;
  private readonly store: Store<T>;
  private unsubscribe: (() => void) | null = null;

  value: T;

  constructor(host: ReactiveControllerHost, store: Store<T>) {
    this.host = host;
    this.store = store;
    this.value = store.get();
    host.addController(this);
  }

  hostConnected(): void {
    this.value = this.store.get();
    this.unsubscribe = this.store.subscribe((value) => {
      this.value = value;
      this.host.requestUpdate();
    });
  }

  hostDisconnected(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
