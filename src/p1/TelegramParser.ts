import { getLogger } from "@/logger";
import type { ObisDefinition, ObisTable } from "@/obis/ObisDefinition";
import {
  ChecksumMismatchError,
  DecodeError,
  MalformedTelegramError,
} from "@/p1/errors";
import type { Reading, ReadingSet } from "@/p1/Reading";
import { crc16, formatCrc16 } from "@/util/crc16";
import {
  getDecimalPlaces,
  hex2ascii,
  parseP1Timestamp,
} from "@/util/dataTransformUtil";
import assert from "assert";

const logger = getLogger("TelegramParser");

const CRLF = "\r\n";

export type TelegramParserOptions = {
  obisTable: ObisTable;
  /** `!` に続くCRC16を検証する (DSMR 2.2のメーターはチェックサムを送信しない) */
  verifyChecksum: boolean;
  /** 行の解釈に失敗したときに呼び出される (その行は読み捨てる) */
  onDecodeError?: (err: DecodeError) => void;
};

export type TelegramHeader = {
  /** メーカーを表す3文字 */
  manufacturer: string;
  baudRateId: string;
  identification: string;
  model: string;
};

type TelegramFrame = {
  header: string;
  body: string[];
  checksum: string | undefined;
  /** チェックサムの計算対象 (`/` から `!` まで) */
  content: string;
};

type DecodedValue = Pick<Reading, "value" | "unit" | "precision">;

export class TelegramParser {
  constructor(private readonly options: TelegramParserOptions) {}

  /**
   * 1電文分の行を解析し、OBISコード表に存在するコードの値を取得します。
   *
   * @param lines `/` で始まる行から `!` で始まる行まで
   * @throws {MalformedTelegramError} 電文の開始・終了またはチェックサムが不正な場合
   */
  parse(lines: readonly string[]): ReadingSet {
    const frame = this.splitFrame(lines);
    if (this.options.verifyChecksum) {
      this.verifyChecksum(frame);
    }

    const readings: Record<string, Reading> = {};
    for (const line of frame.body) {
      try {
        const reading = this.decodeLine(line);
        if (reading) {
          readings[reading.code] = reading;
        }
      } catch (err) {
        if (!(err instanceof DecodeError)) {
          throw err;
        }
        logger.warn(err.message);
        this.options.onDecodeError?.(err);
      }
    }

    return readings;
  }

  private splitFrame(lines: readonly string[]): TelegramFrame {
    const normalized = lines.map((line) => line.replace(/[\r\n]+$/, ""));
    const start = normalized.findIndex((line) => line.trim() !== "");
    const end = normalized.findLastIndex((line) => line.trim() !== "");
    if (start === -1) {
      throw new MalformedTelegramError("Telegram is empty");
    }

    const header = normalized[start];
    const trailer = normalized[end];
    if (!header.startsWith("/")) {
      throw new MalformedTelegramError(`Telegram must start with "/": ${header}`);
    }
    if (start === end || !trailer.startsWith("!")) {
      throw new MalformedTelegramError("Telegram must end with a \"!\" line");
    }

    const body = normalized.slice(start + 1, end);
    if (body.some((line) => line.startsWith("/") || line.startsWith("!"))) {
      throw new MalformedTelegramError(
        "Telegram contains more than one header or trailer",
      );
    }

    const checksum = trailer.slice(1).trim();
    if (checksum !== "" && !/^[0-9A-Fa-f]{4}$/.test(checksum)) {
      throw new MalformedTelegramError(`Invalid checksum format: ${checksum}`);
    }

    return {
      header,
      body,
      checksum: checksum === "" ? undefined : checksum.toUpperCase(),
      content:
        normalized
          .slice(start, end)
          .map((line) => `${line}${CRLF}`)
          .join("") + "!",
    };
  }

  private verifyChecksum({ checksum, content }: TelegramFrame) {
    if (checksum === undefined) {
      throw new MalformedTelegramError("Checksum is missing");
    }

    const calculated = formatCrc16(crc16(Buffer.from(content, "latin1")));
    logger.debug(`Given checksum: ${checksum}, calculated: ${calculated}`);
    if (calculated !== checksum) {
      throw new ChecksumMismatchError(calculated, checksum);
    }
  }

  private decodeLine(line: string): Reading | undefined {
    // 書式: OBIS(値) / ガス: OBIS(時刻)(値)
    const openIndex = line.indexOf("(");
    const code = (openIndex === -1 ? line : line.slice(0, openIndex)).trim();
    const definition = this.options.obisTable.get(code);
    if (!definition) {
      return undefined;
    }

    const rest = openIndex === -1 ? "" : line.slice(openIndex).trimEnd();
    if (!/^(\([^()]*\))+$/.test(rest)) {
      throw new DecodeError("Malformed value groups", code, line);
    }
    const groups = [...rest.matchAll(/\(([^()]*)\)/g)].map((match) => match[1]);

    const raw = groups[groups.length - 1];
    const capturedAt =
      groups.length > 1 ? parseP1Timestamp(groups[0]) : undefined;

    const decoded = this.decodeValue(definition, raw, line);
    if (logger.isDebugEnabled()) {
      logger.debug(
        `${definition.name}: value=${decoded.value} unit=${decoded.unit ?? ""}`,
      );
    }

    return {
      code,
      id: definition.id,
      name: definition.name,
      raw,
      ...decoded,
      ...(capturedAt !== undefined && { capturedAt }),
    };
  }

  private decodeValue(
    { code, valueType }: ObisDefinition,
    raw: string,
    line: string,
  ): DecodedValue {
    switch (valueType) {
      case "number": {
        const [magnitude, unit, ...extra] = raw.split("*");
        if (extra.length > 0 || !/^[-+]?\d+(\.\d+)?$/.test(magnitude)) {
          throw new DecodeError("Invalid number", code, line);
        }
        return {
          value: Number(magnitude),
          precision: getDecimalPlaces(magnitude),
          ...(unit !== undefined && unit !== "" && { unit }),
        };
      }
      case "timestamp": {
        const value = parseP1Timestamp(raw);
        if (value === undefined) {
          throw new DecodeError("Invalid timestamp", code, line);
        }
        if (!/[SW]$/.test(raw)) {
          logger.warn(`Unknown timezone in ${raw}, assuming UTC`);
        }
        return { value };
      }
      case "hexString": {
        if (!/^([0-9A-Fa-f]{2})*$/.test(raw)) {
          throw new DecodeError("Invalid hex string", code, line);
        }
        return { value: hex2ascii(raw) };
      }
      case "string":
        return { value: raw };
      default: {
        const unsupportedType: never = valueType;
        throw new Error(`Unsupported value type: ${String(unsupportedType)}`);
      }
    }
  }
}

/**
 * 電文の1行目 (`/XXXZ<識別子>`) を解析します。
 *
 * @throws {MalformedTelegramError} 書式が不正な場合
 */
export function parseTelegramHeader(line: string): TelegramHeader {
  const headerMatcher = line.match(
    /^\/(?<manufacturer>[A-Za-z]{3})(?<baudRateId>[0-9A-Za-z])(?<identification>.+)$/,
  );
  if (!headerMatcher) {
    throw new MalformedTelegramError(`Invalid telegram header: ${line}`);
  }
  assert(headerMatcher.groups);

  const { manufacturer, baudRateId, identification } = headerMatcher.groups;
  return {
    manufacturer,
    baudRateId,
    identification,
    // 拡張識別子 (\2 など) を除いたもの
    model: identification.replace(/^\\\d/, "").trim(),
  };
}
