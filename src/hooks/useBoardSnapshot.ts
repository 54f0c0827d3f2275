import { useState, useEffect, useCallback } from "react";
import { getBoardSnapshot } from "@/api";
import type { BoardSnapshot } from "@/types";

interface UseBoardSnapshotReturn {
  snapshot: BoardSnapshot | null;
  loading: boolean;
  error: string | null;
  refetch: () => Promise<void>;
}

/**
 * Load the board snapshot once and keep it for the session.
 *
 * @param url - Optional override of the configured data URL
 */
export function useBoardSnapshot(url?: string): UseBoardSnapshotReturn {
  const [snapshot, setSnapshot] = useState<BoardSnapshot | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const fetchSnapshot = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      setSnapshot(await getBoardSnapshot(url));
    } catch (err) {
      const message =
        err instanceof Error ? err.message : "Failed to load board data";
      setError(message);
      console.error("Error loading board snapshot:", err);
    } finally {
      setLoading(false);
    }
  }, [url]);

  useEffect(() => {
    void fetchSnapshot();
  }, [fetchSnapshot]);

  return { snapshot, loading, error, refetch: fetchSnapshot };
}
