import { createP1Connector } from "@/connector/P1Connector";
import type { Entity } from "@/entity";
import env from "@/env";
import { getLogger } from "@/logger";
import type { ObisDefinition, ObisTable } from "@/obis/ObisDefinition";
import {
  createObisTable,
  defaultObisDefinitions,
  parseObisDefinitions,
} from "@/obis/ObisDefinition";
import { MalformedTelegramError } from "@/p1/errors";
import type { ReadingSet } from "@/p1/Reading";
import type { TelegramHeader } from "@/p1/TelegramParser";
import { parseTelegramHeader, TelegramParser } from "@/p1/TelegramParser";
import assert from "assert";
import fileExists from "file-exists";
import { readFile } from "node:fs/promises";
import { pEvent } from "p-event";

const logger = getLogger("P1Meter");

/** 電気メーターのシリアル番号 */
const ELECTRICITY_SERIAL = "0-0:96.1.1";

export type P1MeterClient = {
  device: {
    deviceId: string;
    manufacturer: string;
    model: string;
    entities: Entity[];
  };
  /** 受信した電文の解析結果を順に返す (起動時に受信した電文を含む) */
  readingSets: () => AsyncGenerator<ReadingSet>;
  close: () => Promise<void>;
};

export default async function initializeP1MeterClient(): Promise<P1MeterClient> {
  const obisTable = createObisTable(
    defaultObisDefinitions,
    await loadObisDefinitions(env.OBIS_DEFINITIONS_PATH),
  );
  logger.info(`${obisTable.size} OBIS codes configured`);

  const parser = new TelegramParser({
    obisTable,
    verifyChecksum: env.P1_VERIFY_CHECKSUM,
  });
  const tryParse = (lines: string[]): ReadingSet | undefined => {
    try {
      return parser.parse(lines);
    } catch (err) {
      if (!(err instanceof MalformedTelegramError)) {
        throw err;
      }
      logger.warn(`Telegram discarded: ${err.message}`);
      return undefined;
    }
  };

  const connector = createP1Connector(env.P1_DEVICE_PATH, {
    baudRate: env.P1_BAUDRATE,
    dataBits: env.P1_DATA_BITS,
    parity: env.P1_PARITY,
    xonxoff: env.P1_XONXOFF,
  });

  // ヘッダーを解釈できない電文ではデバイス情報を決定できない
  const tryParseHeader = (lines: string[]): TelegramHeader | undefined => {
    const headerLine = lines.find((line) => line.startsWith("/")) ?? "";
    try {
      return parseTelegramHeader(headerLine.trimEnd());
    } catch (err) {
      if (!(err instanceof MalformedTelegramError)) {
        throw err;
      }
      logger.warn(`Telegram discarded: ${err.message}`);
      return undefined;
    }
  };

  // デバイス情報を決定するため、最初の正常な電文を待つ
  const parsedTelegrams = new WeakMap<
    string[],
    { header: TelegramHeader; readings: ReadingSet }
  >();
  let initialTelegram: string[];
  try {
    initialTelegram = await pEvent<"telegram", string[]>(
      connector,
      "telegram",
      {
        timeout: env.P1_TELEGRAM_TIMEOUT,
        filter: (lines) => {
          const readings = tryParse(lines);
          const telegramHeader = readings && tryParseHeader(lines);
          if (!readings || !telegramHeader) {
            return false;
          }
          parsedTelegrams.set(lines, { header: telegramHeader, readings });
          return true;
        },
      },
    );
  } catch (err) {
    logger.error("Failed to receive the first telegram:", err);
    await connector.close();
    throw err;
  }
  // 以降の電文はreadingSetsで読み出すまでバッファする
  const telegrams = connector.telegrams();

  const initial = parsedTelegrams.get(initialTelegram);
  assert(initial);
  const { header, readings: initialReadings } = initial;

  const serial = initialReadings[ELECTRICITY_SERIAL]?.value;
  const deviceId = `p1meter_${toTopicSafe(
    typeof serial === "string" && serial !== ""
      ? serial
      : `${header.manufacturer}_${header.model}`,
  )}`;
  logger.info(
    `Meter detected: ${deviceId} (${header.manufacturer} ${header.model})`,
  );

  async function* readingSets(): AsyncGenerator<ReadingSet> {
    yield initialReadings;
    for await (const lines of telegrams) {
      const readings = tryParse(lines);
      if (readings) {
        yield readings;
      }
    }
  }

  return {
    device: {
      deviceId,
      manufacturer: header.manufacturer,
      model: header.model,
      entities: buildEntities(obisTable),
    },
    readingSets,
    close: () => connector.close(),
  };
}

// export for test
export function buildEntities(obisTable: ObisTable): Entity[] {
  return [...obisTable.values()].map((definition) => ({
    id: definition.id,
    name: definition.name,
    domain: "sensor",
    deviceClass: definition.deviceClass,
    stateClass: definition.stateClass,
    unit: definition.unit,
    unitPrecision: definition.precision,
    code: definition.code,
    converter:
      definition.valueType === "timestamp"
        ? ({ value }) =>
            typeof value === "number"
              ? new Date(value * 1000).toISOString()
              : value
        : ({ value }) => String(value),
  }));
}

// export for test
export async function loadObisDefinitions(
  path: string | undefined,
): Promise<ObisDefinition[]> {
  if (path === undefined) {
    return [];
  }
  if (!(await fileExists(path))) {
    throw new Error(`OBIS definitions file not found: ${path}`);
  }

  const definitionsText = await readFile(path, "utf-8");
  const definitions: unknown = JSON.parse(definitionsText);
  const parsed = parseObisDefinitions(definitions);
  logger.info(`Loaded ${parsed.length} OBIS definitions from ${path}`);

  return parsed;
}

function toTopicSafe(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}
