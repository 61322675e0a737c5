import { DEFAULT_ALARM_HIGH_VALUE, boolOption, numberOption } from "@/features/modules/configSchema";
import type { DataValue, ModuleConfig } from "@/features/modules/types";
import { numericReading } from "@/features/modules/values";

/** Whether a reading trips the source's high-value alarm. */
export function isAlarmed(sourceConfig: ModuleConfig, value: DataValue): boolean {
  if (!boolOption(sourceConfig, "alarmEnabled", false)) return false;
  const reading = numericReading(value);
  if (reading === undefined) return false;
  return reading > numberOption(sourceConfig, "alarmHighValue", DEFAULT_ALARM_HIGH_VALUE);
}
