import {
  createObisTable,
  defaultObisDefinitions,
} from "@/obis/ObisDefinition";
import type { Reading } from "@/p1/Reading";
import { summarize } from "@/p1/summary";
import { TelegramParser } from "@/p1/TelegramParser";
import { sampleTelegram } from "~/tests/fixtures/telegram";

function numberReading(code: string, value: number, precision: number): Reading {
  return { code, id: code, name: code, value, raw: String(value), precision };
}

describe("summarize", () => {
  test("昼・夜の積算値を合計する", () => {
    const parser = new TelegramParser({
      obisTable: createObisTable(defaultObisDefinitions),
      verifyChecksum: true,
    });

    const summary = summarize(parser.parse(sampleTelegram));

    expect(summary).toEqual({
      timestamp: 1729254625,
      consumption: 3580.245,
      production: 169.056,
    });
  });

  test("精度の大きい方に丸める", () => {
    const summary = summarize({
      "0-0:1.0.0": numberReading("0-0:1.0.0", 1700000000, 0),
      "1-0:1.8.1": numberReading("1-0:1.8.1", 0.1, 1),
      "1-0:1.8.2": numberReading("1-0:1.8.2", 0.2, 1),
      "1-0:2.8.1": numberReading("1-0:2.8.1", 1.25, 2),
      "1-0:2.8.2": numberReading("1-0:2.8.2", 2, 0),
    });

    expect(summary).toEqual({
      timestamp: 1700000000,
      consumption: 0.3,
      production: 3.25,
    });
  });

  test("必要なコードが不足している場合はundefinedを返す", () => {
    const summary = summarize({
      "0-0:1.0.0": numberReading("0-0:1.0.0", 1700000000, 0),
      "1-0:1.8.1": numberReading("1-0:1.8.1", 1, 0),
      "1-0:1.8.2": numberReading("1-0:1.8.2", 2, 0),
      "1-0:2.8.1": numberReading("1-0:2.8.1", 3, 0),
    });

    expect(summary).toBeUndefined();
  });

  test("時刻がない場合はundefinedを返す", () => {
    const summary = summarize({
      "1-0:1.8.1": numberReading("1-0:1.8.1", 1, 0),
      "1-0:1.8.2": numberReading("1-0:1.8.2", 2, 0),
      "1-0:2.8.1": numberReading("1-0:2.8.1", 3, 0),
      "1-0:2.8.2": numberReading("1-0:2.8.2", 4, 0),
    });

    expect(summary).toBeUndefined();
  });
});
