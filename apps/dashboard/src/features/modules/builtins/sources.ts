/**
 * Portable built-in sources backed by Node's `os` module and the clock.
 */

import os from "node:os";

import { SourceFetchError } from "@/lib/errors";

import { numberOption, stringOption, withCommonSourceSections } from "../configSchema";
import type { ConfigSchema, DataValue, ModuleConfig, Source, SourceDescriptor } from "../types";
import { collection, scalar } from "../values";

/* --------------------------------------------------------------------------
   System probe
   -------------------------------------------------------------------------- */

export interface CpuTimes {
  idle: number;
  total: number;
}

/** Raw readings the built-in sources are computed from. */
export interface SystemProbe {
  cpuTimes(): CpuTimes;
  memory(): { total: number; free: number };
  loadAverage(): number[];
  uptimeSeconds(): number;
  now(): number;
}

export const nodeProbe: SystemProbe = {
  cpuTimes() {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      idle += cpuIdle;
      total += user + nice + sys + cpuIdle + irq;
    }
    return { idle, total };
  },
  memory: () => ({ total: os.totalmem(), free: os.freemem() }),
  loadAverage: () => os.loadavg(),
  uptimeSeconds: () => os.uptime(),
  now: () => Date.now(),
};

/* --------------------------------------------------------------------------
   Helpers
   -------------------------------------------------------------------------- */

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function ensureLive(signal: AbortSignal): void {
  if (signal.aborted) throw new SourceFetchError("Fetch aborted", "transient");
}

/** Build a source whose reading is computed synchronously. */
function syncSource(schema: ConfigSchema, read: () => DataValue): Source {
  const fullSchema = withCommonSourceSections(schema);
  return {
    fetch: async (signal) => {
      ensureLive(signal);
      return read();
    },
    describeSchema: () => fullSchema,
  };
}

/* --------------------------------------------------------------------------
   Sources
   -------------------------------------------------------------------------- */

/** Busy share of all cores since the previous fetch (since boot on the first). */
export function createCpuSource(probe: SystemProbe = nodeProbe): Source {
  let previous: CpuTimes = { idle: 0, total: 0 };
  return syncSource([], () => {
    const current = probe.cpuTimes();
    const totalDelta = current.total - previous.total;
    const idleDelta = current.idle - previous.idle;
    previous = current;
    const busy = totalDelta > 0 ? (1 - idleDelta / totalDelta) * 100 : 0;
    return scalar("scalar-percentage", round(busy, 1), "%");
  });
}

export function createMemorySource(probe: SystemProbe = nodeProbe): Source {
  return syncSource([], () => {
    const { total, free } = probe.memory();
    if (total <= 0) throw new SourceFetchError("Total memory is not available", "permanent");
    return scalar("scalar-percentage", round(((total - free) / total) * 100, 1), "%");
  });
}

const LOAD_WINDOWS = ["1 min", "5 min", "15 min"];

export function createLoadAverageSource(probe: SystemProbe = nodeProbe): Source {
  return syncSource([], () => {
    const loads = probe.loadAverage();
    return collection(
      "named-series",
      LOAD_WINDOWS.map((name, index) => ({ name, value: round(loads[index] ?? 0, 2), unit: "" })),
    );
  });
}

export function createUptimeSource(probe: SystemProbe = nodeProbe): Source {
  return syncSource([], () => scalar("scalar-generic", Math.floor(probe.uptimeSeconds()), "s"));
}

export function createClockSource(probe: SystemProbe = nodeProbe): Source {
  return syncSource([], () => scalar("timestamp", probe.now(), "ms"));
}

const STATIC_SCHEMA: ConfigSchema = [
  {
    title: "Value",
    options: [
      { key: "value", type: "number", label: "Value", default: 0 },
      { key: "unit", type: "string", label: "Unit", default: "" },
      { key: "label", type: "string", label: "Label", default: "" },
    ],
  },
];

/** Constant reading taken from its own config. */
export function createStaticSource(config: ModuleConfig): Source {
  const value = numberOption(config, "value", 0);
  const unit = stringOption(config, "unit", "");
  const label = stringOption(config, "label", "");
  return syncSource(STATIC_SCHEMA, () => scalar("scalar-generic", value, unit, label || undefined));
}

/* --------------------------------------------------------------------------
   Descriptors
   -------------------------------------------------------------------------- */

export const BUILTIN_SOURCES: SourceDescriptor[] = [
  {
    typeKey: "cpu",
    label: "CPU Usage",
    shapeTag: "scalar-percentage",
    configSchema: [],
    create: () => createCpuSource(),
  },
  {
    typeKey: "memory_usage",
    label: "Memory Usage",
    shapeTag: "scalar-percentage",
    configSchema: [],
    create: () => createMemorySource(),
  },
  {
    typeKey: "load_average",
    label: "Load Average",
    shapeTag: "named-series",
    configSchema: [],
    create: () => createLoadAverageSource(),
  },
  {
    typeKey: "uptime",
    label: "System Uptime",
    shapeTag: "scalar-generic",
    configSchema: [],
    create: () => createUptimeSource(),
  },
  {
    typeKey: "clock",
    label: "Clock",
    shapeTag: "timestamp",
    configSchema: [],
    defaultSize: { width: 12, height: 12 },
    create: () => createClockSource(),
  },
  {
    typeKey: "static",
    label: "Static Value",
    shapeTag: "scalar-generic",
    configSchema: STATIC_SCHEMA,
    create: createStaticSource,
  },
];
