import defaultDefinitionsJson from "@/obis/obisDefinitions.json";

export const ObisValueTypes = [
  "number", // <値>*<単位>
  "timestamp", // YYMMDDhhmmssX
  "hexString", // 16進数表記のASCII文字列 (メーターのシリアル番号など)
  "string",
] as const;
export type ObisValueType = (typeof ObisValueTypes)[number];

export const DeviceClasses = [
  "energy",
  "power",
  "voltage",
  "current",
  "gas",
  "timestamp",
] as const;
export type DeviceClass = (typeof DeviceClasses)[number];

export const StateClasses = ["measurement", "total_increasing"] as const;
export type StateClass = (typeof StateClasses)[number];

export type ObisDefinition = {
  /** OBISコード (例: 1-0:1.8.1) */
  code: string;
  /** トピックに使用する識別子 */
  id: string;
  name: string;
  valueType: ObisValueType;
  deviceClass?: DeviceClass;
  stateClass?: StateClass;
  unit?: string;
  /** 表示精度 */
  precision?: number;
};

/** OBISコードをキーとした定義 */
export type ObisTable = ReadonlyMap<string, ObisDefinition>;

function isOneOf<T extends string>(
  choices: readonly T[],
  value: unknown,
): value is T {
  return choices.some((choice) => choice === value);
}

export function isObisDefinition(value: unknown): value is ObisDefinition {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  const obj = value as Record<string, unknown>;

  return (
    typeof obj.code === "string" &&
    /^\d+-\d+:\d+\.\d+\.\d+$/.test(obj.code) &&
    typeof obj.id === "string" &&
    /^[A-Za-z0-9_-]+$/.test(obj.id) &&
    typeof obj.name === "string" &&
    isOneOf(ObisValueTypes, obj.valueType) &&
    (obj.deviceClass === undefined || isOneOf(DeviceClasses, obj.deviceClass)) &&
    (obj.stateClass === undefined || isOneOf(StateClasses, obj.stateClass)) &&
    (obj.unit === undefined || typeof obj.unit === "string") &&
    (obj.precision === undefined ||
      (typeof obj.precision === "number" &&
        Number.isInteger(obj.precision) &&
        obj.precision >= 0))
  );
}

/**
 * OBISコード定義の配列を検証します。
 *
 * @throws 配列でない場合や不正な定義を含む場合
 */
export function parseObisDefinitions(value: unknown): ObisDefinition[] {
  if (!Array.isArray(value)) {
    throw new Error("OBIS definitions must be an array");
  }

  return value.map((definition: unknown, index) => {
    if (!isObisDefinition(definition)) {
      throw new Error(
        `Invalid OBIS definition at index ${index}: ${JSON.stringify(definition)}`,
      );
    }
    return definition;
  });
}

export const defaultObisDefinitions: readonly ObisDefinition[] =
  parseObisDefinitions(defaultDefinitionsJson);

/**
 * OBISコード表を作成します。
 * 同じOBISコードは後に指定した定義で上書きされます。
 *
 * @param definitions 定義の配列 (後のものほど優先)
 */
export function createObisTable(
  ...definitions: (readonly ObisDefinition[])[]
): ObisTable {
  const table = new Map<string, ObisDefinition>();
  definitions.flat().forEach((definition) => {
    table.set(definition.code, definition);
  });

  // idはトピックに使用するため重複を許可しない
  const codesById = new Map<string, string>();
  table.forEach(({ code, id }) => {
    const duplicated = codesById.get(id);
    if (duplicated !== undefined) {
      throw new Error(`Duplicate OBIS id "${id}": ${duplicated}, ${code}`);
    }
    codesById.set(id, code);
  });

  return table;
}
