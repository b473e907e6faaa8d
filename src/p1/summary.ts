import type { ReadingSet } from "@/p1/Reading";
import { roundTo } from "@/util/dataTransformUtil";

export type EnergySummary = {
  /** 電文の時刻 (UNIX時間 秒) */
  timestamp: number;
  /** 積算消費電力量 (昼+夜) */
  consumption: number;
  /** 積算発電電力量 (昼+夜) */
  production: number;
};

const TIMESTAMP = "0-0:1.0.0";
const CONSUMPTION = ["1-0:1.8.1", "1-0:1.8.2"] as const;
const PRODUCTION = ["1-0:2.8.1", "1-0:2.8.2"] as const;

function sumOf(readings: ReadingSet, codes: readonly string[]) {
  let total = 0;
  let precision = 0;
  for (const code of codes) {
    const reading = readings[code];
    if (typeof reading?.value !== "number") {
      return undefined;
    }
    total += reading.value;
    precision = Math.max(precision, reading.precision ?? 0);
  }
  return roundTo(total, precision);
}

/**
 * 電文の時刻と昼・夜料金の合計値を求めます。
 *
 * @returns 必要なOBISコードが揃っていない場合はundefined
 */
export function summarize(readings: ReadingSet): EnergySummary | undefined {
  const timestamp = readings[TIMESTAMP]?.value;
  const consumption = sumOf(readings, CONSUMPTION);
  const production = sumOf(readings, PRODUCTION);
  if (
    typeof timestamp !== "number" ||
    consumption === undefined ||
    production === undefined
  ) {
    return undefined;
  }

  return { timestamp, consumption, production };
}
