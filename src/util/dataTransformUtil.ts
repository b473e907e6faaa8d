export function hex2ascii(hexString: string): string {
  return Buffer.from(hexString, "hex").toString("ascii");
}

/**
 * 数値文字列の小数点以下の桁数を取得します。
 * 先頭の0や符号は桁数に影響しません。
 */
export function getDecimalPlaces(value: string): number {
  const decimalIndex = value.indexOf(".");
  if (decimalIndex === -1) return 0;
  return value.length - decimalIndex - 1;
}

export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/** P1の時刻サフィックスとUTCからのオフセット(時間) */
const TimezoneOffsets = new Map<string, number>([
  ["W", 1], // 冬時間 (CET)
  ["S", 2], // 夏時間 (CEST)
]);

/**
 * P1の時刻表記 (YYMMDDhhmmssX) をUNIX時間(秒)に変換します。
 * Xが無い場合や不明な場合はUTCとして扱います。
 *
 * @returns 変換できない場合はundefined
 */
export function parseP1Timestamp(value: string): number | undefined {
  const matcher = value.match(
    /^(?<year>\d{2})(?<month>\d{2})(?<day>\d{2})(?<hour>\d{2})(?<minute>\d{2})(?<second>\d{2})(?<suffix>[A-Z])?$/,
  );
  if (!matcher?.groups) {
    return undefined;
  }

  const { year, month, day, hour, minute, second, suffix } = matcher.groups;
  const fields = {
    year: 2000 + Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
  const date = new Date(
    Date.UTC(
      fields.year,
      fields.month - 1,
      fields.day,
      fields.hour,
      fields.minute,
      fields.second,
    ),
  );
  // 2月30日のように繰り上がった日付は不正とする
  if (
    date.getUTCMonth() !== fields.month - 1 ||
    date.getUTCDate() !== fields.day ||
    date.getUTCHours() !== fields.hour ||
    date.getUTCMinutes() !== fields.minute ||
    date.getUTCSeconds() !== fields.second
  ) {
    return undefined;
  }

  const offset = suffix === undefined ? 0 : (TimezoneOffsets.get(suffix) ?? 0);
  return date.getTime() / 1000 - offset * 3600;
}
