/**
 * Keeps `useDashboardStore` in sync with a dashboard for as long as the
 * calling component is mounted.
 */

import { useEffect } from "react";

import type { Dashboard } from "./Dashboard";
import { bindDashboardStore, useDashboardStore } from "./useDashboardStore";

export function useDashboardConnector(dashboard: Dashboard | undefined): void {
  useEffect(() => {
    if (!dashboard) return;
    const unbind = bindDashboardStore(dashboard);
    return () => {
      unbind();
      useDashboardStore.getState().reset();
    };
  }, [dashboard]);
}
