/**
 * Create a strongly-typed, synchronous event bus.
 *
 * Listener call signatures are derived from a generic event map `M` whose keys
 * are event names and whose values are the payload ("detail") types:
 *
 * ```ts
 * type BuildEvents = {
 *   "source:loaded": { path: string };
 *   "artifact:written": { path: string; kind: string };
 * };
 *
 * const bus = eventBus<BuildEvents>();
 * const off = bus.on("source:loaded", ({ path }) => console.info(path));
 * bus.emit("source:loaded", { path: "unit1/unit1-01.ipynb" });
 * off();
 * ```
 *
 * Listeners are either `(detail) => void` or `{ handle(detail) { … } }`, are
 * de-duped per identity and run in registration order on the caller's stack,
 * so a listener's exception surfaces at the emit site.
 */
export function eventBus<M extends Record<string, unknown>>() {
  type Key = Extract<keyof M, string>;

  type ListenerFn<K extends Key> = (detail: M[K]) => void;
  type ListenerObj<K extends Key> = { handle: ListenerFn<K> };
  type Listener<K extends Key> = ListenerFn<K> | ListenerObj<K>;

  const listeners: { [K in Key]?: Set<Listener<K>> } = {};

  const ensureSet = <K extends Key>(type: K) => {
    let set: Set<Listener<K>> | undefined = listeners[type];
    if (!set) {
      set = new Set();
      listeners[type] = set;
    }
    return set;
  };

  const api = {
    on<K extends Key>(type: K, listener: Listener<K>): () => void {
      ensureSet(type).add(listener);
      return () => api.off(type, listener);
    },

    off<K extends Key>(type: K, listener: Listener<K>): void {
      const set = listeners[type];
      if (!set) return;
      set.delete(listener);
      if (set.size === 0) delete listeners[type];
    },

    emit<K extends Key>(type: K, detail: M[K]): boolean {
      // snapshot so listeners may unsubscribe while being called
      const set = listeners[type];
      const current = set ? Array.from(set) : [];
      for (const l of current) {
        if (typeof l === "function") l(detail);
        else l.handle(detail);
      }
      return current.length > 0;
    },
  } as const;

  return api;
}

export type EventBus<M extends Record<string, unknown>> = ReturnType<
  typeof eventBus<M>
>;
