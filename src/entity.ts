import type { DeviceClass, StateClass } from "@/obis/ObisDefinition";
import type { Reading } from "@/p1/Reading";

export type Entity = {
  id: string;
  name: string;
  domain: Domain;
  deviceClass?: DeviceClass;
  stateClass?: StateClass;
  unit?: string;
  unitPrecision?: number;
  /** 値を取得するOBISコード */
  code: string;
  converter: (reading: Reading) => string;
};

type Domain = "sensor";
