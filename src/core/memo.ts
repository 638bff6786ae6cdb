/**
 * Async-safe memoization for lazily built, single-instance resources.
 *
 * Concurrent callers share one in-flight initialization; a failed
 * initialization is forgotten so the next `get()` tries again.
 */

// ─── Types ──────────────────────────────────────────────────────

export interface AsyncMemo<T> {
  /** Resolve the memoized value, building it on first use. */
  get(): Promise<T>;
  /** True once a value has been built successfully. */
  isInitialized(): boolean;
  /** Forget the cached value; the next `get()` rebuilds it. */
  reset(): void;
}

// ─── Factory ────────────────────────────────────────────────────

/** Wrap an async factory so it runs at most once per successful build. */
export function createAsyncMemo<T>(factory: () => Promise<T>): AsyncMemo<T> {
  let pending: Promise<T> | undefined;
  let initialized = false;

  return {
    get(): Promise<T> {
      if (pending) return pending;

      const attempt = factory().then(
        (value) => {
          initialized = true;
          return value;
        },
        (error: unknown) => {
          if (pending === attempt) pending = undefined;
          throw error;
        },
      );
      pending = attempt;
      return attempt;
    },

    isInitialized(): boolean {
      return initialized;
    },

    reset(): void {
      pending = undefined;
      initialized = false;
    },
  };
}
