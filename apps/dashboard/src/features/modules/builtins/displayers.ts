/**
 * Built-in displayers.
 *
 * Each displayer draws through the `RenderSurface` it is handed and keeps no
 * state beyond what its own rendering needs (the graph's history).
 */

import type { PanelStyle } from "@/features/panels/types";

import { boolOption, numberOption, stringOption } from "../configSchema";
import type {
  ConfigSchema,
  DataValue,
  Displayer,
  DisplayerDescriptor,
  ModuleConfig,
  RenderSurface,
  ShapeTag,
  TextOptions,
} from "../types";
import { formatReading, numericReading } from "../values";

/* --------------------------------------------------------------------------
   Shared
   -------------------------------------------------------------------------- */

export const SCALAR_SHAPES: readonly ShapeTag[] = [
  "scalar-percentage",
  "scalar-temperature",
  "scalar-frequency",
  "scalar-bytes",
  "scalar-generic",
];

const ALIGN_CHOICES = { Left: "left", Center: "center", Right: "right" };

const PLACEHOLDER = "--";

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function fractionOf(reading: number, min: number, max: number): number {
  return max > min ? clamp01((reading - min) / (max - min)) : 0;
}

function alignOf(value: string): NonNullable<TextOptions["align"]> {
  return value === "left" || value === "right" ? value : "center";
}

function textX(surface: RenderSurface, align: NonNullable<TextOptions["align"]>): number {
  if (align === "left") return 0;
  if (align === "right") return surface.width;
  return surface.width / 2;
}

/** Assemble a displayer from its schema, accepted shapes and draw routine. */
function displayer(
  schema: ConfigSchema,
  accepts: readonly ShapeTag[],
  draw: (surface: RenderSurface, value: DataValue | undefined, style: PanelStyle) => void,
  extra: Pick<Displayer, "update" | "reset"> = {},
): Displayer {
  return {
    accepts: (shape) => accepts.includes(shape),
    render: draw,
    describeSchema: () => schema,
    ...extra,
  };
}

/* --------------------------------------------------------------------------
   Text
   -------------------------------------------------------------------------- */

const TEXT_SCHEMA: ConfigSchema = [
  {
    title: "Text",
    options: [
      { key: "prefix", type: "string", label: "Prefix", default: "" },
      { key: "decimals", type: "number", label: "Decimals", default: 1, min: 0, max: 6, step: 1 },
      { key: "showUnit", type: "bool", label: "Show Unit", default: true },
      { key: "align", type: "dropdown", label: "Alignment", choices: ALIGN_CHOICES, default: "center" },
    ],
  },
];

export function createTextDisplayer(config: ModuleConfig): Displayer {
  const prefix = stringOption(config, "prefix", "");
  const decimals = numberOption(config, "decimals", 1);
  const showUnit = boolOption(config, "showUnit", true);
  const align = alignOf(stringOption(config, "align", "center"));

  const describe = (value: DataValue): string => {
    if (value.kind === "scalar") return formatReading(value.value, value.unit, decimals, showUnit);
    return value.items.map((item) => `${item.name}: ${formatReading(item.value, item.unit, decimals, showUnit)}`).join("  ");
  };

  return displayer(TEXT_SCHEMA, SCALAR_SHAPES, (surface, value, style) => {
    surface.clear(style.background);
    surface.drawText(value ? `${prefix}${describe(value)}` : PLACEHOLDER, {
      x: textX(surface, align),
      y: surface.height / 2,
      font: style.font,
      color: style.foreground,
      align,
    });
  });
}

/* --------------------------------------------------------------------------
   Level bar
   -------------------------------------------------------------------------- */

const LEVEL_BAR_SCHEMA: ConfigSchema = [
  {
    title: "Bar",
    options: [
      { key: "minValue", type: "number", label: "Minimum", default: 0 },
      { key: "maxValue", type: "number", label: "Maximum", default: 100 },
      {
        key: "orientation",
        type: "dropdown",
        label: "Orientation",
        choices: { Horizontal: "horizontal", Vertical: "vertical" },
        default: "horizontal",
      },
      { key: "barColor", type: "color", label: "Bar Color", default: "#4caf50" },
      { key: "trackColor", type: "color", label: "Track Color", default: "#333333" },
    ],
  },
];

export function createLevelBarDisplayer(config: ModuleConfig): Displayer {
  const min = numberOption(config, "minValue", 0);
  const max = numberOption(config, "maxValue", 100);
  const vertical = stringOption(config, "orientation", "horizontal") === "vertical";
  const barColor = stringOption(config, "barColor", "#4caf50");
  const trackColor = stringOption(config, "trackColor", "#333333");

  return displayer(LEVEL_BAR_SCHEMA, SCALAR_SHAPES, (surface, value, style) => {
    const { width, height } = surface;
    surface.clear(style.background);
    surface.fillRect(0, 0, width, height, trackColor);
    const reading = value ? numericReading(value) : undefined;
    if (reading === undefined) return;
    const fraction = fractionOf(reading, min, max);
    if (vertical) {
      surface.fillRect(0, height - height * fraction, width, height * fraction, barColor);
    } else {
      surface.fillRect(0, 0, width * fraction, height, barColor);
    }
  });
}

/* --------------------------------------------------------------------------
   Arc gauge
   -------------------------------------------------------------------------- */

const ARC_START = Math.PI * 0.75;
const ARC_SWEEP = Math.PI * 1.5;

const ARC_GAUGE_SCHEMA: ConfigSchema = [
  {
    title: "Gauge",
    options: [
      { key: "minValue", type: "number", label: "Minimum", default: 0 },
      { key: "maxValue", type: "number", label: "Maximum", default: 100 },
      { key: "lineWidth", type: "number", label: "Arc Width", default: 8, min: 1, max: 64, step: 1 },
      { key: "arcColor", type: "color", label: "Arc Color", default: "#2196f3" },
      { key: "trackColor", type: "color", label: "Track Color", default: "#333333" },
      { key: "decimals", type: "number", label: "Decimals", default: 0, min: 0, max: 6, step: 1 },
    ],
  },
];

export function createArcGaugeDisplayer(config: ModuleConfig): Displayer {
  const min = numberOption(config, "minValue", 0);
  const max = numberOption(config, "maxValue", 100);
  const lineWidth = numberOption(config, "lineWidth", 8);
  const arcColor = stringOption(config, "arcColor", "#2196f3");
  const trackColor = stringOption(config, "trackColor", "#333333");
  const decimals = numberOption(config, "decimals", 0);

  return displayer(ARC_GAUGE_SCHEMA, SCALAR_SHAPES, (surface, value, style) => {
    const cx = surface.width / 2;
    const cy = surface.height / 2;
    const radius = Math.max(1, Math.min(surface.width, surface.height) / 2 - lineWidth);

    surface.clear(style.background);
    surface.strokeArc(cx, cy, radius, ARC_START, ARC_START + ARC_SWEEP, trackColor, lineWidth);

    if (!value || value.kind !== "scalar") {
      surface.drawText(PLACEHOLDER, { x: cx, y: cy, font: style.font, color: style.foreground, align: "center" });
      return;
    }
    const fraction = fractionOf(value.value, min, max);
    if (fraction > 0) {
      surface.strokeArc(cx, cy, radius, ARC_START, ARC_START + ARC_SWEEP * fraction, arcColor, lineWidth);
    }
    surface.drawText(formatReading(value.value, value.unit, decimals, true), {
      x: cx,
      y: cy,
      font: style.font,
      color: style.foreground,
      align: "center",
    });
  });
}

/* --------------------------------------------------------------------------
   Graph
   -------------------------------------------------------------------------- */

const GRAPH_SCHEMA: ConfigSchema = [
  {
    title: "Graph",
    options: [
      { key: "historyLength", type: "number", label: "History Points", default: 60, min: 2, max: 600, step: 1 },
      { key: "minValue", type: "number", label: "Minimum", default: 0 },
      { key: "maxValue", type: "number", label: "Maximum", default: 100 },
      { key: "autoScale", type: "bool", label: "Auto Scale", default: false },
      { key: "lineColor", type: "color", label: "Line Color", default: "#03a9f4" },
      { key: "lineWidth", type: "number", label: "Line Width", default: 2, min: 1, max: 16, step: 1 },
    ],
  },
];

/** Line graph over a bounded history of readings. */
export function createGraphDisplayer(config: ModuleConfig): Displayer {
  const historyLength = Math.max(2, Math.round(numberOption(config, "historyLength", 60)));
  const autoScale = boolOption(config, "autoScale", false);
  const fixedMin = numberOption(config, "minValue", 0);
  const fixedMax = numberOption(config, "maxValue", 100);
  const lineColor = stringOption(config, "lineColor", "#03a9f4");
  const lineWidth = numberOption(config, "lineWidth", 2);

  let history: number[] = [];

  const update = (value: DataValue): void => {
    if (value.kind === "collection" && value.shape === "time-series") {
      history = value.items.map((item) => item.value).slice(-historyLength);
      return;
    }
    const reading = numericReading(value);
    if (reading === undefined) return;
    history.push(reading);
    if (history.length > historyLength) history = history.slice(-historyLength);
  };

  const draw = (surface: RenderSurface, _value: DataValue | undefined, style: PanelStyle): void => {
    surface.clear(style.background);
    if (history.length < 2) return;

    let min = fixedMin;
    let max = fixedMax;
    if (autoScale) {
      min = Math.min(...history);
      max = Math.max(...history);
      if (min === max) {
        min -= 1;
        max += 1;
      }
    }
    const step = surface.width / (historyLength - 1);
    const offset = historyLength - history.length;
    const points = history.map((reading, index) => ({
      x: (offset + index) * step,
      y: surface.height - fractionOf(reading, min, max) * surface.height,
    }));
    surface.strokePolyline(points, lineColor, lineWidth);
  };

  return displayer(GRAPH_SCHEMA, [...SCALAR_SHAPES, "time-series"], draw, {
    update,
    reset: () => {
      history = [];
    },
  });
}

/* --------------------------------------------------------------------------
   Indicator
   -------------------------------------------------------------------------- */

const INDICATOR_SCHEMA: ConfigSchema = [
  {
    title: "Thresholds",
    options: [
      { key: "lowThreshold", type: "number", label: "Low Threshold", default: 50 },
      { key: "highThreshold", type: "number", label: "High Threshold", default: 80 },
      { key: "lowColor", type: "color", label: "Low Color", default: "#4caf50" },
      { key: "midColor", type: "color", label: "Medium Color", default: "#ffc107" },
      { key: "highColor", type: "color", label: "High Color", default: "#f44336" },
      { key: "showValue", type: "bool", label: "Show Value", default: true },
    ],
  },
];

/** Colour for a reading against two thresholds. */
export function indicatorColor(reading: number, config: ModuleConfig): string {
  if (reading < numberOption(config, "lowThreshold", 50)) return stringOption(config, "lowColor", "#4caf50");
  if (reading < numberOption(config, "highThreshold", 80)) return stringOption(config, "midColor", "#ffc107");
  return stringOption(config, "highColor", "#f44336");
}

export function createIndicatorDisplayer(config: ModuleConfig): Displayer {
  const showValue = boolOption(config, "showValue", true);

  return displayer(INDICATOR_SCHEMA, SCALAR_SHAPES, (surface, value, style) => {
    surface.clear(style.background);
    if (!value || value.kind !== "scalar") return;
    surface.fillRect(0, 0, surface.width, surface.height, indicatorColor(value.value, config));
    if (showValue) {
      surface.drawText(formatReading(value.value, value.unit, 0, true), {
        x: surface.width / 2,
        y: surface.height / 2,
        font: style.font,
        color: style.foreground,
        align: "center",
      });
    }
  });
}

/* --------------------------------------------------------------------------
   Table
   -------------------------------------------------------------------------- */

const TABLE_SCHEMA: ConfigSchema = [
  {
    title: "Table",
    options: [
      { key: "decimals", type: "number", label: "Decimals", default: 2, min: 0, max: 6, step: 1 },
      { key: "showUnit", type: "bool", label: "Show Unit", default: true },
    ],
  },
];

/** One row per named reading. */
export function createTableDisplayer(config: ModuleConfig): Displayer {
  const decimals = numberOption(config, "decimals", 2);
  const showUnit = boolOption(config, "showUnit", true);

  return displayer(TABLE_SCHEMA, ["named-series", "composite"], (surface, value, style) => {
    surface.clear(style.background);
    if (!value) return;
    const rows = value.kind === "collection" ? value.items : [{ name: value.label ?? "", value: value.value, unit: value.unit }];
    const rowHeight = surface.height / Math.max(1, rows.length);
    rows.forEach((row, index) => {
      const y = rowHeight * index + rowHeight / 2;
      surface.drawText(row.name, { x: 0, y, font: style.font, color: style.foreground, align: "left" });
      surface.drawText(formatReading(row.value, row.unit, decimals, showUnit), {
        x: surface.width,
        y,
        font: style.font,
        color: style.foreground,
        align: "right",
      });
    });
  });
}

/* --------------------------------------------------------------------------
   Analog clock
   -------------------------------------------------------------------------- */

const CLOCK_SCHEMA: ConfigSchema = [
  {
    title: "Clock",
    options: [
      { key: "showSeconds", type: "bool", label: "Show Seconds Hand", default: true },
      { key: "faceColor", type: "color", label: "Face Color", default: "#222222" },
      { key: "handColor", type: "color", label: "Hand Color", default: "#ffffff" },
      {
        key: "utcOffsetMinutes",
        type: "number",
        label: "UTC Offset (minutes)",
        min: -720,
        max: 840,
        step: 15,
        tooltip: "Leave empty to follow the local time zone",
      },
    ],
  },
];

export interface ClockTime {
  hours: number;
  minutes: number;
  seconds: number;
}

/** Wall-clock time for a timestamp, either local or at a fixed UTC offset. */
export function clockTime(timestamp: number, utcOffsetMinutes: number | undefined): ClockTime {
  if (utcOffsetMinutes === undefined) {
    const date = new Date(timestamp);
    return { hours: date.getHours(), minutes: date.getMinutes(), seconds: date.getSeconds() };
  }
  const date = new Date(timestamp + utcOffsetMinutes * 60_000);
  return { hours: date.getUTCHours(), minutes: date.getUTCMinutes(), seconds: date.getUTCSeconds() };
}

/** Hand angle in radians, clockwise from 3 o'clock, for a fraction of a turn from 12. */
export function handAngle(turnFraction: number): number {
  return turnFraction * Math.PI * 2 - Math.PI / 2;
}

export function createAnalogClockDisplayer(config: ModuleConfig): Displayer {
  const showSeconds = boolOption(config, "showSeconds", true);
  const faceColor = stringOption(config, "faceColor", "#222222");
  const handColor = stringOption(config, "handColor", "#ffffff");
  const offset = typeof config.utcOffsetMinutes === "number" ? config.utcOffsetMinutes : undefined;

  return displayer(CLOCK_SCHEMA, ["timestamp"], (surface, value, style) => {
    const cx = surface.width / 2;
    const cy = surface.height / 2;
    const radius = Math.max(1, Math.min(cx, cy) - 2);

    surface.clear(style.background);
    surface.strokeArc(cx, cy, radius, 0, Math.PI * 2, faceColor, 2);
    if (!value || value.kind !== "scalar") return;

    const { hours, minutes, seconds } = clockTime(value.value, offset);
    const hand = (fraction: number, length: number, width: number) => {
      const angle = handAngle(fraction);
      surface.strokePolyline(
        [
          { x: cx, y: cy },
          { x: cx + Math.cos(angle) * length, y: cy + Math.sin(angle) * length },
        ],
        handColor,
        width,
      );
    };
    hand(((hours % 12) + minutes / 60) / 12, radius * 0.5, 4);
    hand((minutes + seconds / 60) / 60, radius * 0.8, 3);
    if (showSeconds) hand(seconds / 60, radius * 0.9, 1);
  });
}

/* --------------------------------------------------------------------------
   Descriptors
   -------------------------------------------------------------------------- */

export const BUILTIN_DISPLAYERS: DisplayerDescriptor[] = [
  { typeKey: "text", label: "Text", accepts: SCALAR_SHAPES, configSchema: TEXT_SCHEMA, create: createTextDisplayer },
  {
    typeKey: "level_bar",
    label: "Level Bar",
    accepts: SCALAR_SHAPES,
    configSchema: LEVEL_BAR_SCHEMA,
    create: createLevelBarDisplayer,
  },
  {
    typeKey: "arc_gauge",
    label: "Arc Gauge",
    accepts: SCALAR_SHAPES,
    configSchema: ARC_GAUGE_SCHEMA,
    create: createArcGaugeDisplayer,
  },
  {
    typeKey: "graph",
    label: "Graph",
    accepts: [...SCALAR_SHAPES, "time-series"],
    configSchema: GRAPH_SCHEMA,
    create: createGraphDisplayer,
  },
  {
    typeKey: "indicator",
    label: "Indicator",
    accepts: SCALAR_SHAPES,
    configSchema: INDICATOR_SCHEMA,
    create: createIndicatorDisplayer,
  },
  {
    typeKey: "table",
    label: "Table",
    accepts: ["named-series", "composite"],
    configSchema: TABLE_SCHEMA,
    create: createTableDisplayer,
  },
  {
    typeKey: "analog_clock",
    label: "Analog Clock",
    accepts: ["timestamp"],
    configSchema: CLOCK_SCHEMA,
    create: createAnalogClockDisplayer,
  },
];
