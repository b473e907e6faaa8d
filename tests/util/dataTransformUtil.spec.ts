import { crc16, formatCrc16 } from "@/util/crc16";
import {
  getDecimalPlaces,
  hex2ascii,
  parseP1Timestamp,
  roundTo,
} from "@/util/dataTransformUtil";

describe("hex2ascii", () => {
  test("正しく変換できる", () => {
    const actual = hex2ascii("3153414733313031303231363035");

    expect(actual).toBe("1SAG3101021605");
  });
});

describe("getDecimalPlaces", () => {
  test("小数点あり", () => {
    const actual = getDecimalPlaces("001234.567");

    expect(actual).toBe(3);
  });

  test("小数点なし", () => {
    const actual = getDecimalPlaces("0001");

    expect(actual).toBe(0);
  });
});

describe("roundTo", () => {
  test("指定した桁数に丸める", () => {
    const actual = roundTo(0.1 + 0.2, 1);

    expect(actual).toBe(0.3);
  });
});

describe("parseP1Timestamp", () => {
  test("夏時間はUTC+2として変換する", () => {
    const actual = parseP1Timestamp("241018143025S");

    expect(actual).toBe(1729254625);
  });

  test("冬時間はUTC+1として変換する", () => {
    const actual = parseP1Timestamp("240105080000W");

    expect(actual).toBe(1704438000);
  });

  test("サフィックスがない場合はUTCとして変換する", () => {
    const actual = parseP1Timestamp("240105080000");

    expect(actual).toBe(1704441600);
  });

  test("不明なサフィックスの場合はUTCとして変換する", () => {
    const actual = parseP1Timestamp("240105080000X");

    expect(actual).toBe(1704441600);
  });

  test("存在しない時刻はundefinedを返す", () => {
    const actual = parseP1Timestamp("240230250000W");

    expect(actual).toBeUndefined();
  });

  test("書式が不正な場合はundefinedを返す", () => {
    const actual = parseP1Timestamp("2401050800X");

    expect(actual).toBeUndefined();
  });
});

describe("crc16", () => {
  test("CRC-16/ARCのチェック値と一致する", () => {
    const actual = crc16(Buffer.from("123456789", "ascii"));

    expect(actual).toBe(0xbb3d);
  });

  test("空のデータは0を返す", () => {
    const actual = crc16(Buffer.alloc(0));

    expect(actual).toBe(0);
  });
});

describe("formatCrc16", () => {
  test("大文字4桁の16進数に変換する", () => {
    const actual = formatCrc16(0x1a);

    expect(actual).toBe("001A");
  });
});
