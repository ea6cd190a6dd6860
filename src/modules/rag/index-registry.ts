import { IndexUnavailableError } from "../../errors.js";
import { logError, logInfo, logWarn } from "../../observability/logger.js";
import type { IndexSnapshot } from "./types.js";

export type SnapshotLoader = () => Promise<IndexSnapshot>;

/**
 * Holds the snapshot served to readers. A reload builds a complete new
 * snapshot first and swaps the reference only once it validated; readers that
 * already took a snapshot keep using it until their request ends.
 */
export class IndexRegistry {
  private snapshot: IndexSnapshot | null = null;
  private reloading: Promise<IndexSnapshot> | null = null;

  constructor(private readonly loader?: SnapshotLoader) {}

  current(): IndexSnapshot {
    if (!this.snapshot) {
      throw new IndexUnavailableError("Vector index is not loaded.");
    }
    return this.snapshot;
  }

  swap(next: IndexSnapshot): IndexSnapshot | null {
    const previous = this.snapshot;
    this.snapshot = next;
    logInfo("rag.index.swapped", {}, {
      previous_version: previous?.version ?? null,
      version: next.version,
      size: next.backend.size,
      backend: next.backend.kind
    });
    return previous;
  }

  async reload(loader: SnapshotLoader | undefined = this.loader): Promise<IndexSnapshot> {
    if (!loader) {
      throw new IndexUnavailableError("No snapshot loader configured.");
    }
    if (this.reloading) {
      return this.reloading;
    }

    this.reloading = (async () => {
      try {
        const next = await loader();
        this.swap(next);
        return next;
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown snapshot load error";
        logError("rag.index.reload_failed", {}, {
          error: message,
          serving_version: this.snapshot?.version ?? null
        });
        throw error;
      } finally {
        this.reloading = null;
      }
    })();

    return this.reloading;
  }

  status(): { loaded: boolean; version: string | null; size: number; backend: string | null } {
    return {
      loaded: this.snapshot !== null,
      version: this.snapshot?.version ?? null,
      size: this.snapshot?.backend.size ?? 0,
      backend: this.snapshot?.backend.kind ?? null
    };
  }
}

/**
 * Reloads the index whenever the process receives `signal`, so a rebuilt
 * snapshot goes live without a restart. Returns a function that detaches it.
 */
export function registerIndexReloadSignal(
  registry: Pick<IndexRegistry, "reload">,
  signal: NodeJS.Signals = "SIGHUP"
): () => void {
  const onSignal = (): void => {
    logInfo("rag.index.reload_requested", {}, { signal });
    registry.reload().catch((error: unknown) => {
      logWarn("rag.index.reload_ignored", {}, {
        signal,
        error: error instanceof Error ? error.message : "unknown snapshot load error"
      });
    });
  };

  process.on(signal, onSignal);
  return () => {
    process.removeListener(signal, onSignal);
  };
}
