export type Reading = Readonly<{
  code: string;
  id: string;
  name: string;
  /** 数値、UNIX時間(秒)、または文字列 */
  value: number | string;
  /** 値として選択した括弧内の文字列 */
  raw: string;
  unit?: string;
  /** 小数点以下の桁数 */
  precision?: number;
  /** ガスメーターなど、値に計測時刻が付与されている場合のUNIX時間(秒) */
  capturedAt?: number;
}>;

/** 1電文分の読み取り結果 (OBISコードがキー) */
export type ReadingSet = Readonly<Partial<Record<string, Reading>>>;
