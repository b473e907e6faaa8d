import type { ReadingSet } from "@/p1/Reading";
import type { EnergySummary } from "@/p1/summary";
import { summarize } from "@/p1/summary";

export type LiveDataStore = {
  readonly readings: ReadingSet | undefined;
  readonly summary: EnergySummary | undefined;
  /** 最後に電文を受信した時刻 (ミリ秒) */
  readonly lastReceivedAt: number | undefined;
  update: (readings: ReadingSet) => void;
  /**
   * 指定時間以上電文を受信していないかどうか。
   * 一度も受信していない場合は作成時刻から判定します。
   */
  isStale: (timeout: number) => boolean;
};

export function createLiveDataStore(
  now: () => number = Date.now,
): LiveDataStore {
  const createdAt = now();
  let readings: ReadingSet | undefined;
  let summary: EnergySummary | undefined;
  let lastReceivedAt: number | undefined;

  return {
    get readings() {
      return readings;
    },
    get summary() {
      return summary;
    },
    get lastReceivedAt() {
      return lastReceivedAt;
    },
    update: (newReadings) => {
      readings = newReadings;
      summary = summarize(newReadings);
      lastReceivedAt = now();
    },
    isStale: (timeout) => now() - (lastReceivedAt ?? createdAt) > timeout,
  };
}
