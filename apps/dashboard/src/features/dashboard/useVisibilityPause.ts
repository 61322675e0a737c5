/**
 * Pauses every poll task while the document is hidden and resumes them
 * when it becomes visible again.
 */

import { useEffect } from "react";

import type { Dashboard } from "./Dashboard";

export function useVisibilityPause(dashboard: Dashboard | undefined, enabled = true): void {
  useEffect(() => {
    if (!dashboard || !enabled) return;
    const target = dashboard;

    function handleVisibilityChange() {
      target.setVisible(document.visibilityState !== "hidden");
    }

    handleVisibilityChange();
    document.addEventListener("visibilitychange", handleVisibilityChange);
    return () => {
      document.removeEventListener("visibilitychange", handleVisibilityChange);
      target.setVisible(true);
    };
  }, [dashboard, enabled]);
}
